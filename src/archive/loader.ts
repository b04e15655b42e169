/**
 * Archive loader
 * Turns discovered message files into independent time-ordered sequences
 */

import type { InvalidFilePolicy } from '../config/index.js';
import { elapsedMs } from '../utils/index.js';
import { createLogger } from '../utils/logger.js';
import { discoverSources, type SkippedCandidate } from './discovery.js';
import { ArchiveParseError, parseMessageFile } from './parser.js';
import type { MessageSequence, SourceFile } from './types.js';

/**
 * Progress events emitted while loading
 */
export type LoadProgress =
  | { phase: 'parsing'; current: number; total: number; source: SourceFile }
  | {
      phase: 'parsed';
      current: number;
      total: number;
      source: SourceFile;
      messageCount: number;
      durationMs: number;
    }
  | { phase: 'invalid'; current: number; total: number; source: SourceFile; error: ArchiveParseError };

export interface LoadOptions {
  /** 'fail' aborts on the first malformed file, 'skip' leaves it out */
  onInvalidFile?: InvalidFilePolicy;
  onProgress?: (progress: LoadProgress) => void;
}

/**
 * A file left out under the 'skip' policy
 */
export interface InvalidFile {
  path: string;
  error: string;
}

export interface LoadResult {
  sequences: MessageSequence[];
  skipped: SkippedCandidate[];
  invalidFiles: InvalidFile[];
  messageCount: number;
  durationMs: number;
}

/**
 * Read one messages file into a sorted sequence
 */
export async function loadSource(source: SourceFile): Promise<MessageSequence> {
  const start = performance.now();
  const messages = await parseMessageFile(source.path);
  return {
    source,
    messages,
    durationMs: elapsedMs(start),
  };
}

/**
 * Load sources one at a time, in order.
 * Files rejected under the 'skip' policy are appended to `invalidFiles`.
 */
export async function* readSequences(
  sources: readonly SourceFile[],
  options: LoadOptions = {},
  invalidFiles: InvalidFile[] = []
): AsyncGenerator<MessageSequence> {
  const logger = createLogger({ module: 'loader' });
  const policy = options.onInvalidFile ?? 'fail';
  const total = sources.length;

  for (const [index, source] of sources.entries()) {
    const current = index + 1;
    options.onProgress?.({ phase: 'parsing', current, total, source });

    let sequence: MessageSequence;
    try {
      sequence = await loadSource(source);
    } catch (err) {
      if (policy === 'fail' || !(err instanceof ArchiveParseError)) {
        throw err;
      }
      logger.warn({ path: source.path }, err.message);
      invalidFiles.push({ path: source.path, error: err.message });
      options.onProgress?.({ phase: 'invalid', current, total, source, error: err });
      continue;
    }

    options.onProgress?.({
      phase: 'parsed',
      current,
      total,
      source,
      messageCount: sequence.messages.length,
      durationMs: sequence.durationMs,
    });
    yield sequence;
  }
}

/**
 * Discover and load every channel and thread under the root.
 * All sequences are held in memory; see assembleDataset for the streaming path.
 */
export async function loadArchive(root: string, options: LoadOptions = {}): Promise<LoadResult> {
  const start = performance.now();
  const { sources, skipped } = await discoverSources(root);
  const invalidFiles: InvalidFile[] = [];
  const sequences: MessageSequence[] = [];
  let messageCount = 0;

  for await (const sequence of readSequences(sources, options, invalidFiles)) {
    sequences.push(sequence);
    messageCount += sequence.messages.length;
  }

  return {
    sequences,
    skipped,
    invalidFiles,
    messageCount,
    durationMs: elapsedMs(start),
  };
}
