import { google, youtube_v3 } from 'googleapis';
import {
  ChannelStatistics,
  FetchBatchOptions,
  QuotaUsage,
  VideoCollector,
  VideoRecord,
  YouTubeApi,
} from '../types/youtube.types.js';
import { DEFAULT_CATEGORIES, categoryName, resolveRegions } from '../config/collector.config.js';
import { classifyUpstreamError } from '../utils/errors.js';

const THUMBNAIL_PREFERENCE = ['maxres', 'standard', 'high', 'medium', 'default'] as const;

// Quota cost per call
const SEARCH_COST = 100;
const LIST_COST = 1;

export class YouTubeService implements VideoCollector {
  private youtube: YouTubeApi;
  private quotaUsed: number = 0;
  private maxQuota: number = 10000; // Daily quota limit
  private channelCache = new Map<string, ChannelStatistics>();
  private now: () => Date;

  constructor(apiKey: string, api?: YouTubeApi, now: () => Date = () => new Date()) {
    this.youtube = api ?? google.youtube({
      version: 'v3',
      auth: apiKey,
    });
    this.now = now;
  }

  /**
   * Fetch up to `videosPerCategory` new videos for each category, published within the last `daysAgo` days.
   * Any API failure aborts the whole batch so the caller never acts on a partial result.
   */
  async fetchBatch(options: FetchBatchOptions): Promise<VideoRecord[]> {
    const categories = options.categories ?? DEFAULT_CATEGORIES;
    const regions = resolveRegions(options.region ?? 'US');
    const publishedAfter = new Date(this.now().getTime() - options.daysAgo * 24 * 60 * 60 * 1000);
    const seen = new Set(options.excludeIds ?? []);
    const batch: VideoRecord[] = [];

    for (const categoryId of categories) {
      const picked: VideoRecord[] = [];

      for (const regionCode of regions) {
        if (picked.length >= options.videosPerCategory) break;

        const videoIds = await this.searchVideoIds({
          categoryId,
          regionCode,
          publishedAfter,
          videoDuration: options.videoDuration ?? 'medium',
          maxResults: Math.min(50, options.videosPerCategory * 4),
        });

        const freshIds = videoIds.filter(id => !seen.has(id));
        if (freshIds.length === 0) continue;

        const items = await this.getVideoDetails(freshIds);
        const channels = await this.getChannelStatistics(
          items.map(item => item.snippet?.channelId).filter((id): id is string => Boolean(id))
        );

        for (const item of items) {
          if (picked.length >= options.videosPerCategory) break;

          const record = this.toVideoRecord(item, categoryId, channels);
          if (!record || seen.has(record.videoId)) continue;

          if (!this.passesFilters(item, record, options, publishedAfter)) continue;

          seen.add(record.videoId);
          picked.push(record);
        }
      }

      console.log(`  📊 ${categoryName(categoryId)}: ${picked.length}/${options.videosPerCategory} videos`);
      batch.push(...picked);
    }

    return batch;
  }

  /**
   * Search for video ids in one category and region
   */
  async searchVideoIds(params: {
    categoryId: string;
    regionCode: string;
    publishedAfter: Date;
    videoDuration: string;
    maxResults: number;
  }): Promise<string[]> {
    try {
      this.quotaUsed += SEARCH_COST;

      const response = await this.youtube.search.list({
        part: ['id'],
        type: ['video'],
        order: 'viewCount',
        videoCategoryId: params.categoryId,
        regionCode: params.regionCode,
        publishedAfter: params.publishedAfter.toISOString(),
        videoDuration: params.videoDuration,
        maxResults: params.maxResults,
      });

      const videoIds: string[] = [];
      for (const item of response.data.items ?? []) {
        const videoId = item.id?.videoId;
        if (videoId && !videoIds.includes(videoId)) {
          videoIds.push(videoId);
        }
      }

      return videoIds;

    } catch (error) {
      const upstream = classifyUpstreamError(
        error,
        `search failed for category ${params.categoryId} in ${params.regionCode}`
      );
      console.error(`❌ ${upstream.message}`);
      throw upstream;
    }
  }

  /**
   * Get snippet, statistics and duration for up to 50 videos per request
   */
  async getVideoDetails(videoIds: string[]): Promise<youtube_v3.Schema$Video[]> {
    const videos: youtube_v3.Schema$Video[] = [];
    const batchSize = 50;

    try {
      for (let i = 0; i < videoIds.length; i += batchSize) {
        this.quotaUsed += LIST_COST;

        const response = await this.youtube.videos.list({
          part: ['snippet', 'statistics', 'contentDetails'],
          id: videoIds.slice(i, i + batchSize),
        });

        videos.push(...(response.data.items ?? []));
      }

      return videos;

    } catch (error) {
      const upstream = classifyUpstreamError(error, 'video details request failed');
      console.error(`❌ ${upstream.message}`);
      throw upstream;
    }
  }

  /**
   * Get subscriber and view counts for channels not already looked up this run
   */
  async getChannelStatistics(channelIds: string[]): Promise<Map<string, ChannelStatistics>> {
    const missing = [...new Set(channelIds)].filter(id => !this.channelCache.has(id));
    const batchSize = 50;

    try {
      for (let i = 0; i < missing.length; i += batchSize) {
        this.quotaUsed += LIST_COST;

        const response = await this.youtube.channels.list({
          part: ['statistics'],
          id: missing.slice(i, i + batchSize),
        });

        for (const channel of response.data.items ?? []) {
          if (!channel.id) continue;
          this.channelCache.set(channel.id, {
            subscribers: channel.statistics?.hiddenSubscriberCount
              ? 0
              : toCount(channel.statistics?.subscriberCount),
            totalViews: toCount(channel.statistics?.viewCount),
            videoCount: toCount(channel.statistics?.videoCount),
          });
        }
      }

      return this.channelCache;

    } catch (error) {
      const upstream = classifyUpstreamError(error, 'channel statistics request failed');
      console.error(`❌ ${upstream.message}`);
      throw upstream;
    }
  }

  private toVideoRecord(
    item: youtube_v3.Schema$Video,
    requestedCategoryId: string,
    channels: Map<string, ChannelStatistics>
  ): VideoRecord | null {
    const snippet = item.snippet;
    if (!item.id || !snippet) return null;

    const thumbnailUrl = pickThumbnailUrl(snippet.thumbnails);
    if (!thumbnailUrl) {
      console.warn(`⏭️ Skipping "${snippet.title}": no thumbnail`);
      return null;
    }

    const categoryId = snippet.categoryId || requestedCategoryId;
    const channelId = snippet.channelId || '';
    const channel = channels.get(channelId);

    return {
      videoId: item.id,
      title: snippet.title || '',
      categoryId,
      categoryName: categoryName(categoryId),
      publishedAt: new Date(snippet.publishedAt || 0).toISOString(),
      thumbnailUrl,
      videoUrl: `https://www.youtube.com/watch?v=${item.id}`,
      views: toCount(item.statistics?.viewCount),
      likes: toCount(item.statistics?.likeCount),
      comments: toCount(item.statistics?.commentCount),
      channelId,
      channelTitle: snippet.channelTitle || '',
      channelSubscribers: channel?.subscribers ?? 0,
      channelTotalViews: channel?.totalViews ?? 0,
      channelVideoCount: channel?.videoCount ?? 0,
      tags: snippet.tags ?? [],
      descriptionLength: (snippet.description || '').length,
      durationSeconds: parseDuration(item.contentDetails?.duration || ''),
      definition: item.contentDetails?.definition || '',
      language: snippet.defaultAudioLanguage || snippet.defaultLanguage || '',
    };
  }

  private passesFilters(
    item: youtube_v3.Schema$Video,
    record: VideoRecord,
    options: FetchBatchOptions,
    publishedAfter: Date
  ): boolean {
    // Skip live streams and premieres
    const liveBroadcastContent = item.snippet?.liveBroadcastContent || 'none';
    if (liveBroadcastContent !== 'none') {
      console.log(`⏭️ Skipping live/premiere: "${record.title}"`);
      return false;
    }

    if (record.durationSeconds < (options.minDurationSeconds ?? 0)) {
      console.log(`⏭️ Skipping short video: "${record.title}" (${record.durationSeconds}s)`);
      return false;
    }

    if (new Date(record.publishedAt) < publishedAfter) return false;
    if (record.views < (options.minViews ?? 0)) return false;
    if (record.channelSubscribers < (options.minSubscribers ?? 0)) return false;

    return true;
  }

  /**
   * Get current quota usage
   */
  getQuotaUsage(): QuotaUsage {
    return {
      used: this.quotaUsed,
      remaining: this.maxQuota - this.quotaUsed,
      percentage: (this.quotaUsed / this.maxQuota) * 100,
    };
  }
}

export function pickThumbnailUrl(thumbnails: youtube_v3.Schema$ThumbnailDetails | undefined): string | null {
  if (!thumbnails) return null;

  for (const key of THUMBNAIL_PREFERENCE) {
    const url = thumbnails[key]?.url;
    if (url) return url;
  }

  return null;
}

/**
 * Parse ISO 8601 duration (PT4M13S) to seconds
 */
export function parseDuration(isoDuration: string): number {
  const match = isoDuration.match(/P(?:(\d+)D)?T?(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?/);
  if (!match) return 0;

  const days = parseInt(match[1] || '0');
  const hours = parseInt(match[2] || '0');
  const minutes = parseInt(match[3] || '0');
  const seconds = parseInt(match[4] || '0');

  return days * 86400 + hours * 3600 + minutes * 60 + seconds;
}

function toCount(value: string | null | undefined): number {
  const parsed = parseInt(value || '0', 10);
  return Number.isFinite(parsed) ? parsed : 0;
}
