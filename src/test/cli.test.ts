import { describe, test, beforeEach, afterEach, expect, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { buildProgram, collect, status } from '../index.js';
import { DatasetService } from '../services/dataset.service.js';
import { ThumbnailService } from '../services/thumbnail.service.js';
import { FetchBatchOptions, VideoCollector, VideoRecord } from '../types/youtube.types.js';
import { UpstreamUnavailableError } from '../utils/errors.js';
import { jpegResponse, makeTempDir, makeVideo, seedImages } from './fixtures.js';

class FakeCollector implements VideoCollector {
  calls = 0;

  constructor(private result: VideoRecord[] | Error) {}

  async fetchBatch(_options: FetchBatchOptions): Promise<VideoRecord[]> {
    this.calls++;
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

const env = {
  YOUTUBE_API_KEY: 'test-key',
  RUN_LEDGER_PATH: ':memory:',
  BATCH_LIMIT: '2',
  CATEGORIES: '20',
  REGION: 'US',
};

describe('collect', () => {
  let root: string;
  let dataset: DatasetService;
  const downloader = new ThumbnailService({ fetchImpl: async () => jpegResponse() });

  beforeEach(async () => {
    root = await makeTempDir();
    dataset = new DatasetService(root);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  test('exits 0 when there is nothing new', async () => {
    const code = await collect({ root }, { collector: new FakeCollector([]), downloader }, env);

    expect(code).toBe(0);
  });

  test('exits 0 after a run that rotates', async () => {
    const videos = ['a', 'b', 'c'].map(id => makeVideo(id));

    const code = await collect({ root }, { collector: new FakeCollector(videos), downloader }, env);

    expect(code).toBe(0);
    expect(await dataset.listImages(dataset.batchDir(1))).toEqual(['a.jpg', 'b.jpg']);
    expect(await dataset.listImages()).toEqual(['c.jpg']);
  });

  test('exits 1 when the API is unavailable and leaves current/ alone', async () => {
    const existing = await seedImages(dataset.currentDir, 1);
    const collector = new FakeCollector(new UpstreamUnavailableError('search failed: Backend Error', 503));

    const code = await collect({ root }, { collector, downloader }, env);

    expect(code).toBe(1);
    expect(await dataset.listImages()).toEqual(existing.map(id => `${id}.jpg`));
    expect(await dataset.listBatchNumbers()).toEqual([]);
  });

  test('exits 1 when the commit cannot write to the dataset', async () => {
    // a directory where metadata.csv should be makes the metadata append fail
    await fs.mkdir(path.join(dataset.currentDir, 'metadata.csv'), { recursive: true });

    const code = await collect({ root }, { collector: new FakeCollector([makeVideo('a')]), downloader }, env);

    expect(code).toBe(1);
    expect(await dataset.listImages()).toEqual([]);
  });

  test('exits 1 on a configuration error without collecting', async () => {
    const collector = new FakeCollector([]);

    const code = await collect({ root }, { collector, downloader }, { RUN_LEDGER_PATH: ':memory:' });

    expect(code).toBe(1);
    expect(collector.calls).toBe(0);
  });
});

describe('status', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  test('prints the current count and the next version', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const dataset = new DatasetService(root);
    await seedImages(dataset.batchDir(1), 2);
    await seedImages(dataset.currentDir, 1);

    const code = await status({ root });

    expect(code).toBe(0);
    expect(log).toHaveBeenCalledWith('📦 Batches: 1');
    expect(log).toHaveBeenCalledWith('🎯 Next version: batch_002');
  });
});

describe('buildProgram', () => {
  test('registers collect as the default command next to status', () => {
    const program = buildProgram();

    expect(program.commands.map(command => command.name())).toEqual(['collect', 'status']);
  });
});
