import fs from 'fs/promises';
import { ArchiveBatch, VersionTag, VersionTagger } from '../types/dataset.types.js';
import { BatchManifest, DatasetService } from './dataset.service.js';
import { StorageWriteError, errorMessage } from '../utils/errors.js';

/**
 * Tags a batch by writing batches/batch_NNN.json next to it. The manifest is created
 * exclusively, so an existing tag is never overwritten. The dataset workflow pushes
 * manifests to the dataset repository as version tags.
 */
export class FileVersionTagger implements VersionTagger {
  constructor(private dataset: DatasetService, private now: () => Date = () => new Date()) {}

  async createTag(batch: ArchiveBatch): Promise<VersionTag> {
    const location = this.dataset.manifestPath(batch.number);
    const createdAt = this.now().toISOString();

    const manifest: BatchManifest = {
      name: batch.name,
      number: batch.number,
      createdAt,
      imageCount: batch.imageCount,
      videoIds: batch.videoIds,
    };

    try {
      await fs.writeFile(location, JSON.stringify(manifest, null, 2) + '\n', { flag: 'wx' });
    } catch (error) {
      throw new StorageWriteError(`Could not tag ${batch.name}: ${errorMessage(error)}`, location);
    }

    console.log(`🏷️ Tagged ${batch.name} (${batch.imageCount} images)`);

    return {
      name: `dataset-${batch.name}`,
      batchName: batch.name,
      createdAt,
      location,
    };
  }

  async revokeTag(tag: VersionTag): Promise<void> {
    await fs.rm(tag.location, { force: true });
  }
}
