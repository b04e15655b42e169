/**
 * Archive discovery
 * Finds channel and thread message files under an export root
 */

import { existsSync } from 'fs';
import { readdir } from 'fs/promises';
import { join } from 'path';
import { createLogger } from '../utils/logger.js';
import {
  CHANNEL_MESSAGES_FILE,
  THREADS_DIR,
  THREAD_MESSAGES_FILE,
  type SourceFile,
} from './types.js';

/**
 * A candidate directory that was passed over
 */
export interface SkippedCandidate {
  /** What was missing: a channel file, a thread file or the threads directory */
  missing: 'channel-messages' | 'thread-messages' | 'threads';
  path: string;
}

export interface DiscoveryResult {
  /** Channel files first, then thread files */
  sources: SourceFile[];
  skipped: SkippedCandidate[];
}

const MISSING_LABELS: Record<SkippedCandidate['missing'], string> = {
  'channel-messages': CHANNEL_MESSAGES_FILE,
  'thread-messages': THREAD_MESSAGES_FILE,
  threads: `${THREADS_DIR}/`,
};

/**
 * List immediate subdirectory names, sorted
 */
async function listDirectories(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

/**
 * Find every channel_messages.json and threads/<thread>/thread_messages.json
 * below the root. Missing files are reported, not raised.
 */
export async function discoverSources(root: string): Promise<DiscoveryResult> {
  const logger = createLogger({ module: 'discovery' });
  const channels = await listDirectories(root);
  const channelSources: SourceFile[] = [];
  const threadSources: SourceFile[] = [];
  const skipped: SkippedCandidate[] = [];

  const skip = (candidate: SkippedCandidate) => {
    skipped.push(candidate);
    logger.warn(
      { path: candidate.path },
      `Found no ${MISSING_LABELS[candidate.missing]} in ${candidate.path}, skipping`
    );
  };

  for (const channel of channels) {
    const channelDir = join(root, channel);

    const messagesPath = join(channelDir, CHANNEL_MESSAGES_FILE);
    if (existsSync(messagesPath)) {
      channelSources.push({ kind: 'channel', path: messagesPath, channel, thread: null });
    } else {
      skip({ missing: 'channel-messages', path: channelDir });
    }

    const threadsDir = join(channelDir, THREADS_DIR);
    if (!existsSync(threadsDir)) {
      skip({ missing: 'threads', path: channelDir });
      continue;
    }

    for (const thread of await listDirectories(threadsDir)) {
      const threadDir = join(threadsDir, thread);
      const threadPath = join(threadDir, THREAD_MESSAGES_FILE);
      if (existsSync(threadPath)) {
        threadSources.push({ kind: 'thread', path: threadPath, channel, thread });
      } else {
        skip({ missing: 'thread-messages', path: threadDir });
      }
    }
  }

  return {
    sources: [...channelSources, ...threadSources],
    skipped,
  };
}
