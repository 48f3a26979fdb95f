// Dataset, rotation and tagging types

import { VideoRecord } from './youtube.types.js';

export interface ArchiveBatch {
  name: string; // batch_NNN
  number: number;
  directory: string;
  imageCount: number;
  videoIds: string[];
  createdAt?: string;
}

export interface VersionTag {
  name: string;
  batchName: string;
  createdAt: string;
  location: string;
}

/**
 * Creates the immutable marker for an archived batch. `revokeTag` only exists so a
 * failed run can take back a tag it created itself.
 */
export interface VersionTagger {
  createTag(batch: ArchiveBatch): Promise<VersionTag>;
  revokeTag(tag: VersionTag): Promise<void>;
}

export interface StagedThumbnail {
  video: VideoRecord;
  path: string;
}

export type RotationState = 'Collecting' | 'RotationNeeded';

export interface RotationPlan {
  state: RotationState;
  archives: number[]; // incoming items used to fill each archived batch, in order
  carryOver: number;
  finalCount: number;
}

export interface CommitResult {
  plan: RotationPlan;
  archived: ArchiveBatch[];
  tags: VersionTag[];
  currentCount: number;
  added: number;
}

export interface DatasetStatus {
  currentCount: number;
  batchLimit: number;
  batches: ArchiveBatch[];
  nextBatchName: string;
}
