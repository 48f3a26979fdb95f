import { CollectorConfig } from '../config/collector.config.js';
import { DatabaseInterface } from '../db/database.js';
import { RotationProcessor, planRotation } from '../processors/rotation.processor.js';
import { ArchiveBatch, StagedThumbnail } from '../types/dataset.types.js';
import { RunStats } from '../types/run.types.js';
import { VideoCollector } from '../types/youtube.types.js';
import { UpstreamUnavailableError, errorMessage } from '../utils/errors.js';
import { DatasetService } from './dataset.service.js';
import { SlackService } from './slack.service.js';
import { ThumbnailService } from './thumbnail.service.js';
import { FileVersionTagger } from './version-tagger.service.js';
import { YouTubeService } from './youtube.service.js';

export interface OrchestratorDependencies {
  collector: VideoCollector & { getQuotaUsage?: () => { used: number } };
  downloader: ThumbnailService;
  dataset: DatasetService;
  rotation: RotationProcessor;
  slack?: SlackService;
  now: () => Date;
}

export class OrchestratorService {
  private config: CollectorConfig;
  private db: DatabaseInterface;
  private deps: OrchestratorDependencies;

  constructor(config: CollectorConfig, db: DatabaseInterface, deps: Partial<OrchestratorDependencies> = {}) {
    this.config = config;
    this.db = db;

    const dataset = deps.dataset ?? new DatasetService(config.datasetRoot);
    const now = deps.now ?? (() => new Date());

    this.deps = {
      collector: deps.collector ?? new YouTubeService(config.youtubeApiKey),
      downloader: deps.downloader ?? new ThumbnailService({ timeoutMs: config.downloadTimeoutMs }),
      dataset,
      rotation: deps.rotation ?? new RotationProcessor(dataset, new FileVersionTagger(dataset, now), config.batchLimit),
      slack: deps.slack ?? (config.slack ? new SlackService(config.slack.botToken, db) : undefined),
      now,
    };
  }

  /**
   * Main orchestration method - runs one collection
   */
  async runPipeline(): Promise<RunStats> {
    const startedAt = this.deps.now();
    const runId = `run_${startedAt.getTime()}`;
    const { dataset } = this.deps;

    const runStats: RunStats = {
      runId,
      startedAt,
      status: 'running',
      dryRun: this.config.dryRun,
      stats: {
        videosFound: 0,
        thumbnailsDownloaded: 0,
        thumbnailsSkipped: 0,
        thumbnailsFailed: 0,
        imagesCommitted: 0,
        currentCount: 0,
        batchLimit: this.config.batchLimit,
        batchesCreated: [],
        quotaUsed: 0,
        totalProcessingTimeMs: 0
      },
      errors: []
    };

    let stagingDir: string | null = null;

    try {
      console.log(`🚀 Starting thumbnail collection - Run ID: ${runId}`);
      await this.saveRunRecord(runStats);

      await dataset.ensureLayout();

      if (!this.config.dryRun) {
        await this.deps.rotation.tagUntaggedBatches();
      }

      // Step 1: Work out what the dataset already holds
      const knownIds = await dataset.getKnownVideoIds();
      const nextBatchNumber = await dataset.getNextBatchNumber();
      const currentCount = await dataset.countCurrent();
      runStats.stats.currentCount = currentCount;
      console.log(`🎯 Target version: ${dataset.batchName(nextBatchNumber)} (${knownIds.size} known videos, ${currentCount}/${this.config.batchLimit} in current/)`);

      // Step 2: Fetch candidates
      console.log('📡 Step 1: Fetching videos...');
      const videos = await this.deps.collector.fetchBatch({
        daysAgo: this.config.daysAgo,
        videosPerCategory: this.config.videosPerCategory,
        categories: this.config.categories,
        region: this.config.region,
        minSubscribers: this.config.minSubscribers,
        minViews: this.config.minViews,
        minDurationSeconds: this.config.minDurationSeconds,
        videoDuration: this.config.videoDuration,
        excludeIds: knownIds,
      });
      runStats.stats.videosFound = videos.length;

      if (videos.length === 0) {
        console.log('ℹ️ No new videos found today');
        return await this.finishRun(runStats, 'success');
      }

      console.log(`📹 Found ${videos.length} new videos`);

      if (this.config.dryRun) {
        const plan = planRotation(currentCount, videos.length, this.config.batchLimit);
        console.log('\n🧪 Dry run - skipping downloads and rotation');
        console.log(`📋 Would add ${videos.length} images → ${plan.state}, ${plan.archives.length} new batch(es), ${plan.finalCount} left in current/`);
        return await this.finishRun(runStats, 'success');
      }

      // Step 3: Download into the staging area
      console.log(`\n⬇️ Step 2: Downloading ${videos.length} thumbnails...`);
      stagingDir = await dataset.createStagingArea(runId);
      const downloads = await this.deps.downloader.downloadThumbnailsBulk(videos, stagingDir, {
        skipIfExistsIn: [dataset.currentDir],
      });

      runStats.stats.thumbnailsDownloaded = downloads.downloaded.length;
      runStats.stats.thumbnailsSkipped = downloads.skipped.length;
      runStats.stats.thumbnailsFailed = downloads.failed.length;
      runStats.errors.push(...downloads.failed.map(failure => `${failure.videoId}: ${failure.message}`));

      if (downloads.downloaded.length === 0 && downloads.failed.length > 0) {
        throw new UpstreamUnavailableError(`All ${downloads.failed.length} thumbnail downloads failed`);
      }

      // Step 4: Commit and rotate
      console.log('\n🔄 Step 3: Committing to current/...');
      const staged: StagedThumbnail[] = downloads.downloaded.map(item => ({ video: item.video, path: item.path }));
      const result = await this.deps.rotation.commit({
        items: staged,
        nextBatchNumber,
        capturedAt: this.deps.now(),
      });

      runStats.stats.imagesCommitted = result.added;
      runStats.stats.currentCount = result.currentCount;
      runStats.stats.batchesCreated = result.archived.map(batch => batch.name);

      // Committed: ledger errors from here on are warnings
      try {
        await this.saveBatchRecords(runId, result.archived);
      } catch (error) {
        console.warn(`⚠️ Could not record new batches in the ledger: ${errorMessage(error)}`);
        runStats.errors.push(`Ledger: ${errorMessage(error)}`);
      }

      if (result.archived.length === 0) {
        console.log('✅ Daily collection complete (no rotation needed)');
      }

      return await this.finishRun(runStats, 'success');

    } catch (error) {
      console.error('❌ Pipeline failed:', error);
      runStats.errors.push(errorMessage(error));
      return await this.finishRun(runStats, 'failed');

    } finally {
      if (stagingDir) {
        await this.cleanupStaging(stagingDir);
      }
    }
  }

  /**
   * Save run record to database
   */
  private async saveRunRecord(runStats: RunStats): Promise<void> {
    await this.db.run(`
      INSERT INTO runs (id, started_at, status, stats)
      VALUES (?, ?, ?, ?)
    `, [
      runStats.runId,
      runStats.startedAt.toISOString(),
      runStats.status,
      JSON.stringify(runStats.stats)
    ]);
  }

  private async saveBatchRecords(runId: string, batches: ArchiveBatch[]): Promise<void> {
    for (const batch of batches) {
      await this.db.run(`
        INSERT INTO batches (dataset_root, number, name, run_id, image_count, created_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `, [this.deps.dataset.rootDir, batch.number, batch.name, runId, batch.imageCount, this.deps.now().toISOString()]);
    }
  }

  private async cleanupStaging(stagingDir: string): Promise<void> {
    try {
      await this.deps.dataset.removeStagingArea(stagingDir);
    } catch (error) {
      console.warn(`⚠️ Could not remove staging area ${stagingDir}: ${errorMessage(error)}`);
    }
  }

  /**
   * Finish run, update database and post the report
   */
  private async finishRun(runStats: RunStats, status: 'success' | 'failed'): Promise<RunStats> {
    runStats.finishedAt = this.deps.now();
    runStats.status = status;
    runStats.stats.totalProcessingTimeMs = runStats.finishedAt.getTime() - runStats.startedAt.getTime();
    runStats.stats.quotaUsed = this.deps.collector.getQuotaUsage?.().used ?? 0;

    try {
      await this.db.run(`
        UPDATE runs
        SET finished_at = ?, status = ?, stats = ?, error_log = ?
        WHERE id = ?
      `, [
        runStats.finishedAt.toISOString(),
        status,
        JSON.stringify(runStats.stats),
        runStats.errors.length > 0 ? JSON.stringify(runStats.errors) : null,
        runStats.runId
      ]);
    } catch (error) {
      console.error('⚠️ Could not update run record:', errorMessage(error));
    }

    const duration = Math.round(runStats.stats.totalProcessingTimeMs / 1000);
    const statusIcon = status === 'success' ? '✅' : '❌';

    console.log(`\n${statusIcon} Pipeline ${status} - Run ID: ${runStats.runId}`);
    console.log(`⏱️ Duration: ${duration}s`);
    console.log(`📊 Final stats:`);
    console.log(`   ${runStats.stats.videosFound} videos found`);
    console.log(`   ${runStats.stats.thumbnailsDownloaded} downloaded, ${runStats.stats.thumbnailsSkipped} skipped, ${runStats.stats.thumbnailsFailed} failed`);
    console.log(`   ${runStats.stats.currentCount}/${runStats.stats.batchLimit} in current/`);
    console.log(`   ${runStats.stats.batchesCreated.length} batches created${runStats.stats.batchesCreated.length > 0 ? `: ${runStats.stats.batchesCreated.join(', ')}` : ''}`);

    if (this.deps.slack && this.config.slack && !runStats.dryRun) {
      await this.deps.slack.sendRunReport(runStats, this.config.slack.channelId);
    }

    return runStats;
  }
}
