/**
 * Reply context windowing
 * Builds prompt/reply pairs from one time-ordered channel or thread
 */

import type { MessageRecord } from '../archive/types.js';

/**
 * A training pair: what others said, and what the target author answered
 */
export interface PromptReplyPair {
  prompt: string;
  reply: string;
}

export interface WindowOptions {
  /** Most context lines collected for one reply */
  maxLines: number;
  /** Oldest a context line may be, measured back from the reference time */
  maxGapMs: number;
}

export const DEFAULT_WINDOW_OPTIONS: WindowOptions = {
  maxLines: 5,
  maxGapMs: 10 * 60_000,
};

/**
 * Find where the reply's context starts.
 * A reference is only looked up in messages[0, index - 1); the message right
 * before the reply is not a lookup target, and an unknown id falls back to it.
 */
function resolveAnchor(messages: readonly MessageRecord[], index: number): { cursor: number; referenceTime: number } {
  const reply = messages[index];
  const fallback = { cursor: index - 1, referenceTime: reply.timestamp.getTime() };
  if (reply.reference === null) return fallback;

  for (let r = 0; r < index - 1; r++) {
    if (messages[r].id === reply.reference) {
      return { cursor: r, referenceTime: messages[r].timestamp.getTime() };
    }
  }
  return fallback;
}

/**
 * Build the prompt for the message at `index`, or null when it gets none.
 * Context is collected walking backward from the anchor and stops at the
 * target author's own message, at the line cap, past the time window, or on
 * reaching index 0 (which is never itself collected).
 */
export function buildPrompt(
  messages: readonly MessageRecord[],
  index: number,
  targetAuthor: bigint,
  options: WindowOptions = DEFAULT_WINDOW_OPTIONS
): string | null {
  if (index <= 0 || index >= messages.length) return null;

  const { cursor: start, referenceTime } = resolveAnchor(messages, index);
  let cursor = start;
  const lines: string[] = [];

  while (
    cursor !== 0 &&
    lines.length < options.maxLines &&
    messages[cursor].author !== targetAuthor &&
    referenceTime - messages[cursor].timestamp.getTime() <= options.maxGapMs
  ) {
    // Empty messages still use up a step
    const { content } = messages[cursor];
    if (content !== '') lines.push(content);
    cursor--;
  }

  if (lines.length === 0) return null;
  return lines.reverse().join('\n');
}

/**
 * Produce a pair for every non-empty message by the target author that has context
 */
export function windowReplies(
  messages: readonly MessageRecord[],
  targetAuthor: bigint,
  options: WindowOptions = DEFAULT_WINDOW_OPTIONS
): PromptReplyPair[] {
  const pairs: PromptReplyPair[] = [];

  messages.forEach((message, index) => {
    if (message.author !== targetAuthor || message.content === '') return;

    const prompt = buildPrompt(messages, index, targetAuthor, options);
    if (prompt !== null) {
      pairs.push({ prompt, reply: message.content });
    }
  });

  return pairs;
}
