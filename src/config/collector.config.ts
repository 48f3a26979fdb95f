import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';

// YouTube video category ids used as topic buckets
export const CATEGORY_NAMES: Record<string, string> = {
  '1': 'Film & Animation',
  '2': 'Autos & Vehicles',
  '10': 'Music',
  '15': 'Pets & Animals',
  '17': 'Sports',
  '19': 'Travel & Events',
  '20': 'Gaming',
  '22': 'People & Blogs',
  '23': 'Comedy',
  '24': 'Entertainment',
  '25': 'News & Politics',
  '26': 'Howto & Style',
  '27': 'Education',
  '28': 'Science & Technology',
};

export const DEFAULT_CATEGORIES = ['1', '2', '10', '15', '17', '20', '22', '23', '24', '25', '26', '27', '28'];

export const REGION_PRESETS: Record<string, string[]> = {
  US: ['US'],
  EU: ['GB', 'DE', 'FR', 'ES', 'IT'],
  US_EU: ['US', 'GB', 'DE', 'FR', 'ES', 'IT'],
};

export const BATCH_LIMIT = 500;

const booleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .optional()
  .transform(value => value === 'true' || value === '1');

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value.trim() : undefined));

export const EnvSchema = z.object({
  YOUTUBE_API_KEY: optionalString,
  DATASET_ROOT: z.string().default('.'),
  BATCH_LIMIT: z.coerce.number().int().positive().default(BATCH_LIMIT),
  DAYS_AGO: z.coerce.number().int().positive().default(7),
  VIDEOS_PER_CATEGORY: z.coerce.number().int().positive().max(50).default(5),
  CATEGORIES: optionalString.transform(value =>
    value ? value.split(',').map(id => id.trim()).filter(id => id.length > 0) : DEFAULT_CATEGORIES
  ),
  REGION: z.string().default('US_EU'),
  MIN_SUBSCRIBERS: z.coerce.number().int().nonnegative().default(10000),
  MIN_VIEWS: z.coerce.number().int().nonnegative().default(100),
  MIN_DURATION_SECONDS: z.coerce.number().int().nonnegative().default(60),
  VIDEO_DURATION: z.enum(['any', 'short', 'medium', 'long']).default('medium'),
  DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  RUN_LEDGER_PATH: z.string().default('./data/collector.sqlite3'),
  DRY_RUN: booleanFlag,
  SLACK_BOT_TOKEN: optionalString,
  SLACK_CHANNEL_ID: optionalString,
});

export interface CollectorConfig {
  youtubeApiKey: string;
  datasetRoot: string;
  batchLimit: number;
  daysAgo: number;
  videosPerCategory: number;
  categories: string[];
  region: string;
  minSubscribers: number;
  minViews: number;
  minDurationSeconds: number;
  videoDuration: 'any' | 'short' | 'medium' | 'long';
  downloadTimeoutMs: number;
  runLedgerPath: string;
  dryRun: boolean;
  slack?: {
    botToken: string;
    channelId: string;
  };
}

export interface ConfigOverrides {
  daysAgo?: number;
  videosPerCategory?: number;
  datasetRoot?: string;
  dryRun?: boolean;
}

/**
 * Build the run configuration from the environment plus CLI overrides.
 * The API key is only required when the caller is going to talk to YouTube.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
  options: { requireApiKey?: boolean } = {}
): CollectorConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n   ${issues.join('\n   ')}`, issues);
  }

  const vars = parsed.data;
  const requireApiKey = options.requireApiKey ?? true;

  if (requireApiKey && !vars.YOUTUBE_API_KEY) {
    throw new ConfigError(
      'YouTube API key not found. Set the YOUTUBE_API_KEY environment variable.',
      ['YOUTUBE_API_KEY']
    );
  }

  const region = vars.REGION.trim().toUpperCase();
  if (!REGION_PRESETS[region] && !/^[A-Z]{2}$/.test(region)) {
    throw new ConfigError(`Unknown region "${vars.REGION}"`, ['REGION']);
  }

  const config: CollectorConfig = {
    youtubeApiKey: vars.YOUTUBE_API_KEY ?? '',
    datasetRoot: overrides.datasetRoot ?? vars.DATASET_ROOT,
    batchLimit: vars.BATCH_LIMIT,
    daysAgo: overrides.daysAgo ?? vars.DAYS_AGO,
    videosPerCategory: overrides.videosPerCategory ?? vars.VIDEOS_PER_CATEGORY,
    categories: vars.CATEGORIES,
    region,
    minSubscribers: vars.MIN_SUBSCRIBERS,
    minViews: vars.MIN_VIEWS,
    minDurationSeconds: vars.MIN_DURATION_SECONDS,
    videoDuration: vars.VIDEO_DURATION,
    downloadTimeoutMs: vars.DOWNLOAD_TIMEOUT_MS,
    runLedgerPath: vars.RUN_LEDGER_PATH,
    dryRun: overrides.dryRun ?? vars.DRY_RUN,
  };

  if (vars.SLACK_BOT_TOKEN && vars.SLACK_CHANNEL_ID) {
    config.slack = {
      botToken: vars.SLACK_BOT_TOKEN,
      channelId: vars.SLACK_CHANNEL_ID,
    };
  }

  return config;
}

export function resolveRegions(region: string): string[] {
  const key = region.trim().toUpperCase();
  return REGION_PRESETS[key] ?? [key];
}

export function categoryName(categoryId: string): string {
  return CATEGORY_NAMES[categoryId] ?? 'Unknown';
}
