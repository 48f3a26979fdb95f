#!/usr/bin/env node
import 'dotenv/config';
import { pathToFileURL } from 'url';
import { Command, InvalidArgumentError } from 'commander';
import { CollectorConfig, ConfigOverrides, loadConfig } from './config/collector.config.js';
import { closeDatabase, getDatabase } from './db/database.js';
import { DatasetService } from './services/dataset.service.js';
import { OrchestratorDependencies, OrchestratorService } from './services/orchestrator.service.js';
import { ConfigError } from './utils/errors.js';

interface CollectOptions {
  daysAgo?: number;
  videosPerCategory?: number;
  root?: string;
  dryRun?: boolean;
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Run one collection and return the process exit code: 0 when the run succeeded
 * (with or without rotation), 1 on configuration, upstream or storage errors.
 */
export async function collect(
  options: CollectOptions,
  deps: Partial<OrchestratorDependencies> = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  const overrides: ConfigOverrides = {
    daysAgo: options.daysAgo,
    videosPerCategory: options.videosPerCategory,
    datasetRoot: options.root,
    dryRun: options.dryRun,
  };

  let config: CollectorConfig;
  try {
    config = loadConfig(env, overrides);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }

  const db = await getDatabase(config.runLedgerPath);
  const orchestrator = new OrchestratorService(config, db, deps);

  try {
    const result = await orchestrator.runPipeline();

    if (result.status === 'success') {
      console.log('\n🎉 Thumbnail collection completed successfully!');
      return 0;
    }

    console.error('\n💥 Thumbnail collection failed');
    console.error('Errors:', result.errors);
    return 1;

  } finally {
    await closeDatabase();
  }
}

export async function status(options: { root?: string }): Promise<number> {
  const config = loadConfig(process.env, { datasetRoot: options.root }, { requireApiKey: false });
  const dataset = new DatasetService(config.datasetRoot);
  const summary = await dataset.getStatus(config.batchLimit);

  console.log(`📁 Dataset: ${dataset.rootDir}`);
  console.log(`📊 current/: ${summary.currentCount}/${summary.batchLimit}`);
  console.log(`📦 Batches: ${summary.batches.length}`);
  for (const batch of summary.batches) {
    console.log(`   ${batch.name}: ${batch.imageCount} images${batch.createdAt ? ` (${batch.createdAt})` : ''}`);
  }
  console.log(`🎯 Next version: ${summary.nextBatchName}`);

  return 0;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('thumbnail-collector')
    .description('Collect YouTube thumbnails into a rotating, size-capped dataset')
    .version('0.1.0');

  program
    .command('collect', { isDefault: true })
    .description('Run the daily collection')
    .option('--days-ago <n>', 'Only consider videos published in the last n days', positiveInt)
    .option('--videos-per-category <n>', 'Videos to collect per category', positiveInt)
    .option('--root <path>', 'Dataset root containing current/ and batches/')
    .option('--dry-run', 'Fetch and plan without downloading or rotating')
    .action(async (options: CollectOptions) => {
      process.exitCode = await collect(options);
    });

  program
    .command('status')
    .description('Show the current collection and archived batches')
    .option('--root <path>', 'Dataset root containing current/ and batches/')
    .action(async (options: { root?: string }) => {
      process.exitCode = await status(options);
    });

  return program;
}

async function main() {
  try {
    await buildProgram().parseAsync(process.argv);
  } catch (error) {
    console.error('💥 Fatal error:', error);
    process.exit(1);
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}

export { main };
