export type RunStatus = 'running' | 'success' | 'failed';

export interface RunStats {
  runId: string;
  startedAt: Date;
  finishedAt?: Date;
  status: RunStatus;
  dryRun: boolean;
  stats: {
    videosFound: number;
    thumbnailsDownloaded: number;
    thumbnailsSkipped: number;
    thumbnailsFailed: number;
    imagesCommitted: number;
    currentCount: number;
    batchLimit: number;
    batchesCreated: string[];
    quotaUsed: number;
    totalProcessingTimeMs: number;
  };
  errors: string[];
}
