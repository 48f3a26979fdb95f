import { describe, test, beforeEach, afterEach, expect, vi } from 'vitest';
import fs from 'fs/promises';
import { z } from 'zod';
import { CollectorConfig } from '../config/collector.config.js';
import { DatabaseInterface, createDatabase } from '../db/database.js';
import { DatasetService } from '../services/dataset.service.js';
import { OrchestratorService } from '../services/orchestrator.service.js';
import { ThumbnailService } from '../services/thumbnail.service.js';
import { FetchBatchOptions, VideoCollector, VideoRecord } from '../types/youtube.types.js';
import { UpstreamUnavailableError } from '../utils/errors.js';
import { jpegResponse, makeTempDir, makeVideo, seedImages } from './fixtures.js';

const RunRowSchema = z.object({
  id: z.string(),
  status: z.string(),
  error_log: z.string().nullable(),
});

class FakeCollector implements VideoCollector {
  calls: FetchBatchOptions[] = [];

  constructor(private result: VideoRecord[] | Error) {}

  async fetchBatch(options: FetchBatchOptions): Promise<VideoRecord[]> {
    this.calls.push(options);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

function makeConfig(root: string, overrides: Partial<CollectorConfig> = {}): CollectorConfig {
  return {
    youtubeApiKey: 'test-key',
    datasetRoot: root,
    batchLimit: 500,
    daysAgo: 7,
    videosPerCategory: 5,
    categories: ['20'],
    region: 'US',
    minSubscribers: 0,
    minViews: 0,
    minDurationSeconds: 0,
    videoDuration: 'medium',
    downloadTimeoutMs: 1000,
    runLedgerPath: ':memory:',
    dryRun: false,
    ...overrides,
  };
}

describe('OrchestratorService', () => {
  let root: string;
  let db: DatabaseInterface;
  let dataset: DatasetService;
  let clock: number;
  const downloader = new ThumbnailService({ fetchImpl: async () => jpegResponse() });

  const now = () => new Date(clock++ * 1000 + Date.UTC(2026, 9, 18));

  function newVideos(count: number, prefix = 'new'): VideoRecord[] {
    return Array.from({ length: count }, (_, i) => makeVideo(`${prefix}${i}`));
  }

  function orchestrator(collector: VideoCollector, overrides: Partial<CollectorConfig> = {}) {
    return new OrchestratorService(makeConfig(root, overrides), db, { collector, downloader, dataset, now });
  }

  async function runRow(runId: string) {
    const rows = await db.query('SELECT id, status, error_log FROM runs WHERE id = ?', [runId]);
    return RunRowSchema.parse(rows[0]);
  }

  beforeEach(async () => {
    root = await makeTempDir();
    db = await createDatabase(':memory:');
    dataset = new DatasetService(root);
    clock = 0;
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await db.close();
    await fs.rm(root, { recursive: true, force: true });
  });

  test('490 + 5 new thumbnails: no rotation, current holds 495', async () => {
    await seedImages(dataset.currentDir, 490);

    const result = await orchestrator(new FakeCollector(newVideos(5))).runPipeline();

    expect(result.status).toBe('success');
    expect(result.stats.currentCount).toBe(495);
    expect(result.stats.batchesCreated).toEqual([]);
    expect(await dataset.countCurrent()).toBe(495);
    expect(await dataset.listBatchNumbers()).toEqual([]);
    expect((await runRow(result.runId)).status).toBe('success');
  });

  test('498 + 5 new thumbnails: batch holds exactly 500, remainder stays in current', async () => {
    await seedImages(dataset.currentDir, 498);

    const result = await orchestrator(new FakeCollector(newVideos(5))).runPipeline();

    expect(result.status).toBe('success');
    expect(result.stats.batchesCreated).toEqual(['batch_001']);
    expect(await dataset.listImages(dataset.batchDir(1))).toHaveLength(500);
    expect(await dataset.listImages()).toEqual(['new2.jpg', 'new3.jpg', 'new4.jpg']);
    expect(result.stats.currentCount).toBe(3);

    const batches = await db.query('SELECT name, image_count FROM batches');
    expect(batches).toEqual([{ name: 'batch_001', image_count: 500 }]);
  });

  test('upstream failure aborts without touching the dataset', async () => {
    const existing = await seedImages(dataset.currentDir, 10);
    vi.spyOn(console, 'error').mockImplementation(() => {});

    const result = await orchestrator(new FakeCollector(new UpstreamUnavailableError('search failed: Backend Error'))).runPipeline();

    expect(result.status).toBe('failed');
    expect(result.errors).toEqual(['search failed: Backend Error']);
    expect(await dataset.listImages()).toEqual(existing.map(id => `${id}.jpg`));
    expect(await dataset.listBatchNumbers()).toEqual([]);
    await expect(fs.access(dataset.stagingRoot)).rejects.toThrow();

    const row = await runRow(result.runId);
    expect(row.status).toBe('failed');
    expect(row.error_log).toBe(JSON.stringify(['search failed: Backend Error']));
  });

  test('batch numbers keep increasing across repeated rotations', async () => {
    const config = { batchLimit: 4 };

    const first = await orchestrator(new FakeCollector(newVideos(5, 'a')), config).runPipeline();
    const second = await orchestrator(new FakeCollector(newVideos(8, 'b')), config).runPipeline();
    const third = await orchestrator(new FakeCollector(newVideos(2, 'c')), config).runPipeline();

    expect(first.stats.batchesCreated).toEqual(['batch_001']);
    expect(second.stats.batchesCreated).toEqual(['batch_002', 'batch_003']);
    expect(third.stats.batchesCreated).toEqual([]);
    expect(await dataset.listBatchNumbers()).toEqual([1, 2, 3]);
    expect(await dataset.listImages()).toEqual(['b7.jpg', 'c0.jpg', 'c1.jpg']);
  });

  test('passes known video ids to the collector', async () => {
    await seedImages(dataset.currentDir, 1, 'cur');
    await seedImages(dataset.batchDir(1), 1, 'old');
    const collector = new FakeCollector([]);

    const result = await orchestrator(collector).runPipeline();

    expect(result.status).toBe('success');
    expect([...(collector.calls[0].excludeIds ?? [])].sort()).toEqual(['cur_0000', 'old_0000']);
  });

  test('continues past individual download failures', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const flaky = new ThumbnailService({
      fetchImpl: async (url: string) => (url.includes('/new1/') ? new Response('', { status: 500 }) : jpegResponse()),
    });
    const service = new OrchestratorService(makeConfig(root), db, {
      collector: new FakeCollector(newVideos(3)),
      downloader: flaky,
      dataset,
      now,
    });

    const result = await service.runPipeline();

    expect(result.status).toBe('success');
    expect(result.stats.thumbnailsFailed).toBe(1);
    expect(await dataset.listImages()).toEqual(['new0.jpg', 'new2.jpg']);
  });

  test('fails the run when every download fails', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const broken = new ThumbnailService({ fetchImpl: async () => new Response('', { status: 503 }) });
    const service = new OrchestratorService(makeConfig(root), db, {
      collector: new FakeCollector(newVideos(2)),
      downloader: broken,
      dataset,
      now,
    });

    const result = await service.runPipeline();

    expect(result.status).toBe('failed');
    expect(result.errors[result.errors.length - 1]).toBe('All 2 thumbnail downloads failed');
    expect(await dataset.countCurrent()).toBe(0);
  });

  test('separate dataset roots keep separate batch numbering in one ledger', async () => {
    const otherRoot = await makeTempDir();
    const otherDataset = new DatasetService(otherRoot);

    try {
      const first = await orchestrator(new FakeCollector(newVideos(2, 'a')), { batchLimit: 2 }).runPipeline();
      const second = await new OrchestratorService(makeConfig(otherRoot, { batchLimit: 2 }), db, {
        collector: new FakeCollector(newVideos(2, 'b')),
        downloader,
        dataset: otherDataset,
        now,
      }).runPipeline();

      expect(first.status).toBe('success');
      expect(second.status).toBe('success');
      expect(second.stats.batchesCreated).toEqual(['batch_001']);

      const rows = await db.query('SELECT dataset_root, name FROM batches');
      expect(rows).toHaveLength(2);
      expect(rows).toEqual(expect.arrayContaining([
        { dataset_root: dataset.rootDir, name: 'batch_001' },
        { dataset_root: otherDataset.rootDir, name: 'batch_001' },
      ]));
    } finally {
      await fs.rm(otherRoot, { recursive: true, force: true });
    }
  });

  test('a ledger error after the commit keeps the run successful', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const ledger: DatabaseInterface = {
      query: (sql, params) => db.query(sql, params),
      run: async (sql, params) => {
        if (sql.includes('INSERT INTO batches')) throw new Error('disk I/O error');
        return db.run(sql, params);
      },
      exec: sql => db.exec(sql),
      close: () => db.close(),
    };
    const service = new OrchestratorService(makeConfig(root, { batchLimit: 2 }), ledger, {
      collector: new FakeCollector(newVideos(3)),
      downloader,
      dataset,
      now,
    });

    const result = await service.runPipeline();

    expect(result.status).toBe('success');
    expect(result.stats.batchesCreated).toEqual(['batch_001']);
    expect(result.errors).toEqual(['Ledger: disk I/O error']);
    expect(await dataset.listImages(dataset.batchDir(1))).toEqual(['new0.jpg', 'new1.jpg']);
    expect((await runRow(result.runId)).status).toBe('success');
  });

  test('a staging cleanup error after the commit keeps the run successful', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    class StickyStagingDataset extends DatasetService {
      async removeStagingArea(dir: string): Promise<void> {
        throw new Error(`EBUSY: resource busy, rmdir '${dir}'`);
      }
    }
    const sticky = new StickyStagingDataset(root);
    const service = new OrchestratorService(makeConfig(root), db, {
      collector: new FakeCollector(newVideos(2)),
      downloader,
      dataset: sticky,
      now,
    });

    const result = await service.runPipeline();

    expect(result.status).toBe('success');
    expect(await sticky.listImages()).toEqual(['new0.jpg', 'new1.jpg']);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test('tags archives left without a manifest before collecting', async () => {
    const ids = await seedImages(dataset.batchDir(1), 3, 'orphan');

    const result = await orchestrator(new FakeCollector(newVideos(1))).runPipeline();

    expect(result.status).toBe('success');
    expect((await dataset.readManifest(1))?.videoIds).toEqual(ids);
    expect(await dataset.listImages()).toEqual(['new0.jpg']);
  });

  test('dry run changes nothing', async () => {
    await seedImages(dataset.currentDir, 499);

    const result = await orchestrator(new FakeCollector(newVideos(5)), { dryRun: true }).runPipeline();

    expect(result.status).toBe('success');
    expect(result.dryRun).toBe(true);
    expect(await dataset.countCurrent()).toBe(499);
    expect(await dataset.listBatchNumbers()).toEqual([]);
  });
});
