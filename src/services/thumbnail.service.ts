import fs from 'fs/promises';
import path from 'path';
import { VideoRecord } from '../types/youtube.types.js';
import { IMAGE_EXTENSION } from './dataset.service.js';
import { PartialDownloadFailure, StorageWriteError, errorMessage } from '../utils/errors.js';

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface ThumbnailServiceOptions {
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export interface DownloadedThumbnail {
  video: VideoRecord;
  path: string;
  bytes: number;
}

export interface BulkDownloadResult {
  downloaded: DownloadedThumbnail[];
  skipped: string[];
  failed: PartialDownloadFailure[];
}

export class ThumbnailService {
  private timeoutMs: number;
  private fetchImpl: FetchLike;

  constructor(options: ThumbnailServiceOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15000;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  /**
   * Download one thumbnail to <outputDir>/<videoId>.jpg
   */
  async downloadThumbnail(url: string, videoId: string, outputDir: string): Promise<{ path: string; bytes: number }> {
    const response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.timeoutMs) });

    if (!response.ok) {
      throw new PartialDownloadFailure(videoId, `HTTP ${response.status} for ${url}`);
    }

    const contentType = response.headers.get('content-type');
    if (contentType && !contentType.startsWith('image/')) {
      throw new PartialDownloadFailure(videoId, `Unexpected content type ${contentType} for ${url}`);
    }

    const data = Buffer.from(await response.arrayBuffer());
    if (data.length === 0) {
      throw new PartialDownloadFailure(videoId, `Empty image body for ${url}`);
    }

    const filePath = path.join(outputDir, `${videoId}${IMAGE_EXTENSION}`);
    const tempPath = `${filePath}.part`;

    try {
      await fs.mkdir(outputDir, { recursive: true });
      await fs.writeFile(tempPath, data);
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw new StorageWriteError(`Could not write ${filePath}: ${errorMessage(error)}`, filePath);
    }

    return { path: filePath, bytes: data.length };
  }

  /**
   * Download thumbnails one by one. A failed download is recorded and skipped;
   * storage errors abort the whole batch.
   */
  async downloadThumbnailsBulk(
    videos: VideoRecord[],
    outputDir: string,
    options: { skipIfExistsIn?: string[] } = {}
  ): Promise<BulkDownloadResult> {
    const result: BulkDownloadResult = { downloaded: [], skipped: [], failed: [] };
    const lookIn = [outputDir, ...(options.skipIfExistsIn ?? [])];

    for (const video of videos) {
      if (await existsInAny(lookIn, `${video.videoId}${IMAGE_EXTENSION}`)) {
        result.skipped.push(video.videoId);
        continue;
      }

      try {
        const { path: filePath, bytes } = await this.downloadThumbnail(video.thumbnailUrl, video.videoId, outputDir);
        result.downloaded.push({ video, path: filePath, bytes });
      } catch (error) {
        if (error instanceof StorageWriteError) {
          throw error;
        }

        const failure = error instanceof PartialDownloadFailure
          ? error
          : new PartialDownloadFailure(video.videoId, errorMessage(error));
        console.warn(`⚠️ Thumbnail download failed for ${video.videoId}: ${failure.message}`);
        result.failed.push(failure);
      }
    }

    console.log(`⬇️ Thumbnails: ${result.downloaded.length} downloaded, ${result.skipped.length} skipped, ${result.failed.length} failed`);

    return result;
  }
}

async function existsInAny(dirs: string[], fileName: string): Promise<boolean> {
  for (const dir of dirs) {
    try {
      await fs.access(path.join(dir, fileName));
      return true;
    } catch {
      // not in this directory
    }
  }
  return false;
}
