import { VideoRecord } from '../types/youtube.types.js';
import { calculateMetrics } from './metrics.js';

export const METADATA_FILE = 'metadata.csv';

export const METADATA_COLUMNS = [
  'video_id',
  'title',
  'category_id',
  'category_name',
  'views',
  'likes',
  'comments',
  'channel_id',
  'channel_subscribers',
  'channel_total_views',
  'channel_video_count',
  'tags',
  'description_len',
  'duration_seconds',
  'definition',
  'language',
  'published_at',
  'captured_at',
  'video_url',
  'thumbnail_url',
  'viral_ratio',
  'title_length',
  'is_clickbait',
  'batch_version',
] as const;

export type MetadataColumn = typeof METADATA_COLUMNS[number];
export type MetadataRow = Record<MetadataColumn, string | number>;

export function toMetadataRow(video: VideoRecord, batchVersion: string, capturedAt: Date): MetadataRow {
  const metrics = calculateMetrics(video);

  return {
    video_id: video.videoId,
    title: video.title,
    category_id: video.categoryId,
    category_name: video.categoryName,
    views: video.views,
    likes: video.likes,
    comments: video.comments,
    channel_id: video.channelId,
    channel_subscribers: video.channelSubscribers,
    channel_total_views: video.channelTotalViews,
    channel_video_count: video.channelVideoCount,
    tags: video.tags.join('|'),
    description_len: video.descriptionLength,
    duration_seconds: video.durationSeconds,
    definition: video.definition,
    language: video.language,
    published_at: video.publishedAt,
    captured_at: capturedAt.toISOString(),
    video_url: video.videoUrl,
    thumbnail_url: video.thumbnailUrl,
    viral_ratio: Number(metrics.viralRatio.toFixed(4)),
    title_length: metrics.titleLength,
    is_clickbait: metrics.isClickbait,
    batch_version: batchVersion,
  };
}

export function escapeCsvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function formatCsvRow(row: MetadataRow): string {
  return METADATA_COLUMNS.map(column => escapeCsvField(row[column])).join(',');
}

export function csvHeader(): string {
  return METADATA_COLUMNS.join(',');
}

/**
 * Append rows to existing CSV content, writing the header when starting a new file.
 */
export function appendCsvRows(existing: string | null, rows: MetadataRow[]): string {
  const lines = rows.map(formatCsvRow);

  if (existing === null || existing.trim() === '') {
    return [csvHeader(), ...lines].join('\n') + '\n';
  }

  const base = existing.endsWith('\n') ? existing : `${existing}\n`;
  return lines.length > 0 ? `${base}${lines.join('\n')}\n` : base;
}
