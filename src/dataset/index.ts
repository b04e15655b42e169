/**
 * Dataset assembly
 * Drives the archive loader and the windower, and writes the pair collection
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { discoverSources } from '../archive/discovery.js';
import { readSequences, type InvalidFile, type LoadOptions } from '../archive/loader.js';
import { elapsedMs } from '../utils/index.js';
import {
  DEFAULT_WINDOW_OPTIONS,
  windowReplies,
  type PromptReplyPair,
  type WindowOptions,
} from '../window/index.js';

export interface AssembleOptions extends LoadOptions {
  /** Export root holding one directory per channel */
  root: string;
  targetAuthor: bigint;
  window?: WindowOptions;
}

/**
 * Aggregate counts for one run
 */
export interface DatasetStats {
  /** Message files found, including any rejected under the 'skip' policy */
  filesProcessed: number;
  sequenceCount: number;
  channelCount: number;
  threadCount: number;
  messageCount: number;
  pairCount: number;
  /** Candidates passed over for a missing file or threads directory */
  skippedCount: number;
  invalidFiles: InvalidFile[];
  durationMs: number;
}

export interface AssembleResult {
  pairs: PromptReplyPair[];
  stats: DatasetStats;
}

export interface WriteResult {
  outputPath: string;
  pairCount: number;
  bytesWritten: number;
}

/**
 * Default dataset location for a target author: <dir>/prompt-<id>.json
 */
export function defaultOutputPath(targetAuthor: bigint, dir = '.'): string {
  return join(dir, `prompt-${targetAuthor}.json`);
}

/**
 * Build the pair collection for one author across the whole archive.
 * Each sequence is windowed as soon as it is loaded and then dropped.
 */
export async function assembleDataset(options: AssembleOptions): Promise<AssembleResult> {
  const start = performance.now();
  const windowOptions = options.window ?? DEFAULT_WINDOW_OPTIONS;
  const { sources, skipped } = await discoverSources(options.root);
  const invalidFiles: InvalidFile[] = [];
  const pairs: PromptReplyPair[] = [];

  let channelCount = 0;
  let threadCount = 0;
  let messageCount = 0;

  for await (const sequence of readSequences(sources, options, invalidFiles)) {
    if (sequence.source.kind === 'channel') {
      channelCount++;
    } else {
      threadCount++;
    }
    messageCount += sequence.messages.length;
    for (const pair of windowReplies(sequence.messages, options.targetAuthor, windowOptions)) {
      pairs.push(pair);
    }
  }

  return {
    pairs,
    stats: {
      filesProcessed: sources.length,
      sequenceCount: channelCount + threadCount,
      channelCount,
      threadCount,
      messageCount,
      pairCount: pairs.length,
      skippedCount: skipped.length,
      invalidFiles,
      durationMs: elapsedMs(start),
    },
  };
}

/**
 * Serialize pairs as a single JSON array, replacing any existing file
 */
export async function writeDataset(
  pairs: readonly PromptReplyPair[],
  outputPath: string
): Promise<WriteResult> {
  const content = JSON.stringify(pairs.map(({ prompt, reply }) => ({ prompt, reply })));

  await mkdir(dirname(outputPath), { recursive: true });
  await writeFile(outputPath, content, 'utf-8');

  return {
    outputPath,
    pairCount: pairs.length,
    bytesWritten: Buffer.byteLength(content, 'utf-8'),
  };
}
