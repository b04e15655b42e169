/**
 * Distill command
 * sft-distill <archive> <author-id>
 */

import { Command, InvalidArgumentError } from 'commander';
import { existsSync } from 'fs';
import { resolve } from 'path';
import type { LoadProgress } from '../../archive/index.js';
import { getConfig, windowMs } from '../../config/index.js';
import {
  assembleDataset,
  defaultOutputPath,
  writeDataset,
  type WriteResult,
} from '../../dataset/index.js';
import { parseU64 } from '../../utils/index.js';
import { createLogger } from '../../utils/logger.js';

/** Options for the distill command */
export interface DistillOptions {
  output?: string;
  maxLines?: number;
  windowMinutes?: number;
  skipInvalid?: boolean;
}

/**
 * Parse the target author id argument
 */
export function parseAuthorId(value: string): bigint {
  const id = parseU64(value.trim());
  if (id === null) {
    throw new InvalidArgumentError('Expected an unsigned 64-bit integer id.');
  }
  return id;
}

function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

function parsePositiveNumber(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new InvalidArgumentError('Expected a positive number.');
  }
  return n;
}

/**
 * Build the dataset and write it; throws on any fatal error
 */
export async function runDistill(
  archive: string,
  authorId: bigint,
  options: DistillOptions = {}
): Promise<WriteResult> {
  const config = getConfig();
  const logger = createLogger({ module: 'cli' });

  const root = resolve(archive);
  if (!existsSync(root)) {
    throw new Error(`Archive directory not found: ${root}`);
  }

  const outputPath = resolve(options.output ?? defaultOutputPath(authorId, config.outputDir));
  const maxLines = options.maxLines ?? config.maxContextLines;
  const maxGapMs = options.windowMinutes !== undefined
    ? Math.round(options.windowMinutes * 60_000)
    : windowMs(config);

  const onProgress = (progress: LoadProgress) => {
    const position = `(${progress.current}/${progress.total})`;
    switch (progress.phase) {
      case 'parsing':
        logger.info(`Starting parsing on ${progress.source.path} ${position}`);
        break;
      case 'parsed':
        logger.info(
          `Completed parsing on ${progress.source.path} ${position}, took ${progress.durationMs}ms`
        );
        break;
      case 'invalid':
        logger.warn(`Skipped invalid file ${progress.source.path} ${position}`);
        break;
    }
  };

  const { pairs, stats } = await assembleDataset({
    root,
    targetAuthor: authorId,
    window: { maxLines, maxGapMs },
    onInvalidFile: options.skipInvalid ? 'skip' : config.onInvalidFile,
    onProgress,
  });

  logger.info(
    `Completed all parsing in ${Math.floor(stats.durationMs / 1000)} seconds, ` +
      `have ${stats.messageCount} messages from ${stats.sequenceCount} channels ` +
      `(${stats.channelCount} channels, ${stats.threadCount} threads)`
  );
  if (stats.invalidFiles.length > 0) {
    logger.warn(`${stats.invalidFiles.length} invalid files were left out`);
  }

  const result = await writeDataset(pairs, outputPath);
  logger.info(`Wrote ${result.pairCount} pairs to ${result.outputPath}`);
  return result;
}

/**
 * Attach the distill arguments, options and action to a program
 */
export function configureDistillCommand(program: Command): void {
  program
    .argument('<archive>', 'Export root holding one directory per channel')
    .argument('<author-id>', 'Id of the author whose messages become replies', parseAuthorId)
    .option('-o, --output <path>', 'Dataset file (default: <outputDir>/prompt-<author-id>.json)')
    .option('--max-lines <n>', 'Most context lines per prompt', parsePositiveInt)
    .option('--window-minutes <n>', 'How far back from the reference time context may reach', parsePositiveNumber)
    .option('--skip-invalid', 'Skip malformed message files instead of aborting')
    .action(async (archive: string, authorId: bigint, options: DistillOptions) => {
      try {
        await runDistill(archive, authorId, options);
      } catch (err) {
        createLogger({ module: 'cli' }).error(
          { err },
          `Failed to build dataset: ${err instanceof Error ? err.message : String(err)}`
        );
        process.exitCode = 1;
      }
    });
}
