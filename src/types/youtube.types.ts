// YouTube API types and interfaces

import type { youtube_v3 } from 'googleapis';

export interface VideoRecord {
  videoId: string;
  title: string;
  categoryId: string;
  categoryName: string;
  publishedAt: string; // ISO 8601
  thumbnailUrl: string;
  videoUrl: string;
  views: number;
  likes: number;
  comments: number;
  channelId: string;
  channelTitle: string;
  channelSubscribers: number;
  channelTotalViews: number;
  channelVideoCount: number;
  tags: string[];
  descriptionLength: number;
  durationSeconds: number;
  definition: string; // "hd" | "sd"
  language: string;
}

export interface ChannelStatistics {
  subscribers: number;
  totalViews: number;
  videoCount: number;
}

export type VideoDurationFilter = 'any' | 'short' | 'medium' | 'long';

export interface FetchBatchOptions {
  daysAgo: number;
  videosPerCategory: number;
  categories?: string[];
  region?: string; // preset (US, EU, US_EU) or a single region code
  minSubscribers?: number;
  minViews?: number;
  minDurationSeconds?: number;
  videoDuration?: VideoDurationFilter;
  excludeIds?: Iterable<string>;
}

export interface VideoCollector {
  fetchBatch(options: FetchBatchOptions): Promise<VideoRecord[]>;
}

/**
 * The slice of the googleapis YouTube client the collector calls.
 */
export interface YouTubeApi {
  search: {
    list(params: youtube_v3.Params$Resource$Search$List): Promise<{ data: youtube_v3.Schema$SearchListResponse }>;
  };
  videos: {
    list(params: youtube_v3.Params$Resource$Videos$List): Promise<{ data: youtube_v3.Schema$VideoListResponse }>;
  };
  channels: {
    list(params: youtube_v3.Params$Resource$Channels$List): Promise<{ data: youtube_v3.Schema$ChannelListResponse }>;
  };
}

export interface QuotaUsage {
  used: number;
  remaining: number;
  percentage: number;
}
