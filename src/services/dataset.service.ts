import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ArchiveBatch, DatasetStatus } from '../types/dataset.types.js';
import { StorageWriteError, errorMessage } from '../utils/errors.js';

export const IMAGE_EXTENSION = '.jpg';

const BATCH_DIR_PATTERN = /^batch_(\d+)$/;
const BATCH_MARKER_PATTERN = /^batch_(\d+)\.(json|dvc)$/;

export const BatchManifestSchema = z.object({
  name: z.string(),
  number: z.number().int().positive(),
  createdAt: z.string(),
  imageCount: z.number().int().nonnegative(),
  videoIds: z.array(z.string()),
});

export type BatchManifest = z.infer<typeof BatchManifestSchema>;

/**
 * On-disk layout of the dataset:
 *   current/                  images being collected, plus metadata.csv
 *   batches/batch_NNN/        archived, immutable snapshots
 *   batches/batch_NNN.json    version tag manifest for each archive
 *   .staging/<run id>/        downloads waiting to be committed
 */
export class DatasetService {
  readonly rootDir: string;
  readonly currentDir: string;
  readonly batchesDir: string;
  readonly stagingRoot: string;

  constructor(rootDir: string) {
    this.rootDir = path.resolve(rootDir);
    this.currentDir = path.join(this.rootDir, 'current');
    this.batchesDir = path.join(this.rootDir, 'batches');
    this.stagingRoot = path.join(this.rootDir, '.staging');
  }

  async ensureLayout(): Promise<void> {
    for (const dir of [this.currentDir, this.batchesDir]) {
      try {
        await fs.mkdir(dir, { recursive: true });
      } catch (error) {
        throw new StorageWriteError(`Could not create ${dir}: ${errorMessage(error)}`, dir);
      }
    }
  }

  batchName(batchNumber: number): string {
    return `batch_${String(batchNumber).padStart(3, '0')}`;
  }

  batchDir(batchNumber: number): string {
    return path.join(this.batchesDir, this.batchName(batchNumber));
  }

  manifestPath(batchNumber: number): string {
    return path.join(this.batchesDir, `${this.batchName(batchNumber)}.json`);
  }

  imagePath(dir: string, videoId: string): string {
    return path.join(dir, `${videoId}${IMAGE_EXTENSION}`);
  }

  /**
   * Image file names in a directory, sorted. A missing directory has no images.
   */
  async listImages(dir: string = this.currentDir): Promise<string[]> {
    const entries = await readDirIfExists(dir);
    return entries.filter(name => name.endsWith(IMAGE_EXTENSION)).sort();
  }

  async countCurrent(): Promise<number> {
    return (await this.listImages()).length;
  }

  /**
   * Numbers of every batch ever created, from archive directories, manifests and legacy .dvc markers
   */
  async listBatchNumbers(): Promise<number[]> {
    const numbers = new Set<number>();

    for (const name of await readDirIfExists(this.batchesDir)) {
      const match = name.match(BATCH_DIR_PATTERN) ?? name.match(BATCH_MARKER_PATTERN);
      if (match) {
        numbers.add(parseInt(match[1], 10));
      }
    }

    return [...numbers].sort((a, b) => a - b);
  }

  async getNextBatchNumber(): Promise<number> {
    const numbers = await this.listBatchNumbers();
    return numbers.length > 0 ? numbers[numbers.length - 1] + 1 : 1;
  }

  async readManifest(batchNumber: number): Promise<BatchManifest | null> {
    let content: string;
    try {
      content = await fs.readFile(this.manifestPath(batchNumber), 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }

    return BatchManifestSchema.parse(JSON.parse(content));
  }

  /**
   * Every video id already in the dataset: current images, archived images and ids listed in manifests.
   */
  async getKnownVideoIds(): Promise<Set<string>> {
    const known = new Set<string>();
    const addImages = (names: string[]) => {
      for (const name of names) known.add(path.basename(name, IMAGE_EXTENSION));
    };

    addImages(await this.listImages(this.currentDir));

    for (const batchNumber of await this.listBatchNumbers()) {
      addImages(await this.listImages(this.batchDir(batchNumber)));

      const manifest = await this.readManifest(batchNumber);
      manifest?.videoIds.forEach(id => known.add(id));
    }

    return known;
  }

  async listBatches(): Promise<ArchiveBatch[]> {
    const batches: ArchiveBatch[] = [];

    for (const number of await this.listBatchNumbers()) {
      const manifest = await this.readManifest(number);
      const images = await this.listImages(this.batchDir(number));

      batches.push({
        name: this.batchName(number),
        number,
        directory: this.batchDir(number),
        imageCount: manifest?.imageCount ?? images.length,
        videoIds: manifest?.videoIds ?? images.map(name => path.basename(name, IMAGE_EXTENSION)),
        createdAt: manifest?.createdAt,
      });
    }

    return batches;
  }

  /**
   * Archive directories without a batch_NNN.json manifest
   */
  async listUntaggedBatches(): Promise<ArchiveBatch[]> {
    const untagged: ArchiveBatch[] = [];

    for (const number of await this.listBatchNumbers()) {
      const directory = this.batchDir(number);
      if (!(await isDirectory(directory)) || (await this.readManifest(number)) !== null) {
        continue;
      }

      const images = await this.listImages(directory);
      untagged.push({
        name: this.batchName(number),
        number,
        directory,
        imageCount: images.length,
        videoIds: images.map(name => path.basename(name, IMAGE_EXTENSION)),
      });
    }

    return untagged;
  }

  async getStatus(batchLimit: number): Promise<DatasetStatus> {
    const batches = await this.listBatches();
    const nextBatchNumber = await this.getNextBatchNumber();

    return {
      currentCount: await this.countCurrent(),
      batchLimit,
      batches,
      nextBatchName: this.batchName(nextBatchNumber),
    };
  }

  async createStagingArea(runId: string): Promise<string> {
    const dir = path.join(this.stagingRoot, runId);
    try {
      await fs.mkdir(dir, { recursive: true });
      return dir;
    } catch (error) {
      throw new StorageWriteError(`Could not create staging area: ${errorMessage(error)}`, dir);
    }
  }

  async removeStagingArea(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });

    // Leave no empty .staging behind
    const remaining = await readDirIfExists(this.stagingRoot);
    if (remaining.length === 0) {
      await fs.rm(this.stagingRoot, { recursive: true, force: true });
    }
  }
}

export function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

async function readDirIfExists(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir);
  } catch (error) {
    if (isNotFound(error)) return [];
    throw error;
  }
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch (error) {
    if (isNotFound(error)) return false;
    throw error;
  }
}
