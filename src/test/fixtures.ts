import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { VideoRecord } from '../types/youtube.types.js';

export function makeVideo(videoId: string, overrides: Partial<VideoRecord> = {}): VideoRecord {
  return {
    videoId,
    title: `Test video ${videoId}`,
    categoryId: '20',
    categoryName: 'Gaming',
    publishedAt: '2026-10-15T12:00:00.000Z',
    thumbnailUrl: `https://img.example.test/${videoId}/hqdefault.jpg`,
    videoUrl: `https://www.youtube.com/watch?v=${videoId}`,
    views: 1000,
    likes: 100,
    comments: 10,
    channelId: 'channel1',
    channelTitle: 'Test Channel',
    channelSubscribers: 50000,
    channelTotalViews: 100000,
    channelVideoCount: 100,
    tags: [],
    descriptionLength: 0,
    durationSeconds: 300,
    definition: 'hd',
    language: 'en',
    ...overrides,
  };
}

export async function makeTempDir(prefix = 'thumbs-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Write `count` placeholder images named img_0000.jpg... into dir
 */
export async function seedImages(dir: string, count: number, prefix = 'img'): Promise<string[]> {
  await fs.mkdir(dir, { recursive: true });
  const ids: string[] = [];
  for (let i = 0; i < count; i++) {
    const id = `${prefix}_${String(i).padStart(4, '0')}`;
    await fs.writeFile(path.join(dir, `${id}.jpg`), 'jpg');
    ids.push(id);
  }
  return ids;
}

export function jpegResponse(body = 'fake_image_data'): Response {
  return new Response(body, { status: 200, headers: { 'content-type': 'image/jpeg' } });
}
