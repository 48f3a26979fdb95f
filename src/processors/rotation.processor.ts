import fs from 'fs/promises';
import path from 'path';
import {
  ArchiveBatch,
  CommitResult,
  RotationPlan,
  StagedThumbnail,
  VersionTag,
  VersionTagger,
} from '../types/dataset.types.js';
import { DatasetService, isNotFound } from '../services/dataset.service.js';
import { METADATA_FILE, appendCsvRows, toMetadataRow } from '../utils/metadata.js';
import { StorageWriteError, errorMessage } from '../utils/errors.js';

/**
 * Decide how incoming items are split between archives and the current collection.
 *
 * Fill-then-carry-over: while the current collection plus the remaining items reach the
 * limit, fill the current collection up to exactly `batchLimit`, archive it and start
 * over. Whatever is left stays in the fresh current collection. A current collection that
 * is already at or over the limit is archived as is (fill of 0).
 */
export function planRotation(currentCount: number, incomingCount: number, batchLimit: number): RotationPlan {
  if (!Number.isInteger(batchLimit) || batchLimit < 1) {
    throw new RangeError(`batchLimit must be a positive integer, got ${batchLimit}`);
  }

  const archives: number[] = [];
  let count = currentCount;
  let remaining = incomingCount;

  while (count + remaining >= batchLimit) {
    const take = Math.max(batchLimit - count, 0);
    archives.push(take);
    remaining -= take;
    count = 0;
  }

  return {
    state: archives.length > 0 ? 'RotationNeeded' : 'Collecting',
    archives,
    carryOver: remaining,
    finalCount: count + remaining,
  };
}

type UndoStep = () => Promise<void>;

export interface CommitOptions {
  items: StagedThumbnail[];
  nextBatchNumber: number;
  capturedAt?: Date;
}

export class RotationProcessor {
  constructor(
    private dataset: DatasetService,
    private tagger: VersionTagger,
    private batchLimit: number
  ) {}

  /**
   * Move staged thumbnails into the current collection, rotating whenever it reaches the limit.
   * On any failure the steps already applied are undone in reverse order and a
   * StorageWriteError is raised, so the dataset is left as it was before the commit.
   */
  async commit(options: CommitOptions): Promise<CommitResult> {
    const capturedAt = options.capturedAt ?? new Date();
    const currentCount = await this.dataset.countCurrent();
    const plan = planRotation(currentCount, options.items.length, this.batchLimit);
    const undo: UndoStep[] = [];
    const archived: ArchiveBatch[] = [];
    const tags: VersionTag[] = [];

    console.log(`📊 current/: ${currentCount}/${this.batchLimit} + ${options.items.length} new → ${plan.state}`);

    try {
      let cursor = 0;
      let batchNumber = options.nextBatchNumber;

      for (const take of plan.archives) {
        const batchName = this.dataset.batchName(batchNumber);
        await this.appendToCurrent(options.items.slice(cursor, cursor + take), batchName, capturedAt, undo);
        cursor += take;

        const batch = await this.archiveCurrent(batchNumber, undo);
        archived.push(batch);

        const tag = await this.tagger.createTag(batch);
        tags.push(tag);
        undo.push(() => this.tagger.revokeTag(tag));
        batchNumber++;
      }

      const carryOver = options.items.slice(cursor);
      if (carryOver.length > 0) {
        await this.appendToCurrent(carryOver, this.dataset.batchName(batchNumber), capturedAt, undo);
      }

    } catch (error) {
      console.error(`❌ Commit failed, rolling back ${undo.length} steps: ${errorMessage(error)}`);
      await this.rollback(undo);

      if (error instanceof StorageWriteError) {
        throw error;
      }
      throw new StorageWriteError(`Commit failed: ${errorMessage(error)}`);
    }

    for (const batch of archived) {
      console.log(`🔄 Rotated ${batch.imageCount} images into ${batch.name}`);
    }

    return {
      plan,
      archived,
      tags,
      currentCount: await this.dataset.countCurrent(),
      added: options.items.length,
    };
  }

  /**
   * Tag archive directories left without a manifest, e.g. by a process that died
   * between the archive rename and the tag.
   */
  async tagUntaggedBatches(): Promise<VersionTag[]> {
    const tags: VersionTag[] = [];

    for (const batch of await this.dataset.listUntaggedBatches()) {
      console.log(`🏷️ ${batch.name} has no version tag, tagging it now`);
      tags.push(await this.tagger.createTag(batch));
    }

    return tags;
  }

  /**
   * Move staged images into current/ and append their metadata rows
   */
  private async appendToCurrent(
    items: StagedThumbnail[],
    batchVersion: string,
    capturedAt: Date,
    undo: UndoStep[]
  ): Promise<void> {
    const currentDir = this.dataset.currentDir;

    for (const item of items) {
      const target = this.dataset.imagePath(currentDir, item.video.videoId);
      await fs.rename(item.path, target);
      undo.push(() => fs.rename(target, item.path));
    }

    const metadataPath = path.join(currentDir, METADATA_FILE);
    const previous = await readIfExists(metadataPath);
    const rows = items.map(item => toMetadataRow(item.video, batchVersion, capturedAt));

    await writeAtomically(metadataPath, appendCsvRows(previous, rows));
    undo.push(async () => {
      if (previous === null) {
        await fs.rm(metadataPath, { force: true });
      } else {
        await writeAtomically(metadataPath, previous);
      }
    });
  }

  /**
   * Freeze current/ into batches/batch_NNN/ with a single rename, then start an empty current/.
   */
  private async archiveCurrent(batchNumber: number, undo: UndoStep[]): Promise<ArchiveBatch> {
    const currentDir = this.dataset.currentDir;
    const batchDir = this.dataset.batchDir(batchNumber);

    if (await pathExists(batchDir)) {
      throw new StorageWriteError(`Archive ${batchDir} already exists`, batchDir);
    }

    const images = await this.dataset.listImages(currentDir);

    await fs.rename(currentDir, batchDir);
    undo.push(() => fs.rename(batchDir, currentDir));

    await fs.mkdir(currentDir);
    undo.push(() => fs.rm(currentDir, { recursive: true, force: true }));

    return {
      name: this.dataset.batchName(batchNumber),
      number: batchNumber,
      directory: batchDir,
      imageCount: images.length,
      videoIds: images.map(name => path.basename(name, path.extname(name))),
    };
  }

  private async rollback(undo: UndoStep[]): Promise<void> {
    for (const step of [...undo].reverse()) {
      try {
        await step();
      } catch (error) {
        console.error(`⚠️ Rollback step failed: ${errorMessage(error)}`);
      }
    }
  }
}

async function readIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}

async function writeAtomically(filePath: string, content: string): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await fs.writeFile(tempPath, content, 'utf-8');
  await fs.rename(tempPath, filePath);
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}
