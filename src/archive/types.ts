/**
 * Chat archive type definitions
 * Based on the channel_messages.json / thread_messages.json files of a channel export
 */

import { z } from 'zod';
import { U64_MAX } from '../utils/index.js';

/** File holding a channel's top-level messages */
export const CHANNEL_MESSAGES_FILE = 'channel_messages.json';

/** Directory holding a channel's threads */
export const THREADS_DIR = 'threads';

/** File holding one thread's messages */
export const THREAD_MESSAGES_FILE = 'thread_messages.json';

/**
 * Unsigned 64-bit id, written as a decimal string or a plain number
 */
export const SnowflakeSchema = z
  .union([
    z.string().regex(/^\d+$/, 'Expected a decimal id'),
    z
      .number()
      .int()
      .nonnegative()
      .refine(Number.isSafeInteger, 'Numeric id exceeds 2^53; write it as a string'),
  ])
  .transform((raw, ctx) => {
    const value = BigInt(raw);
    if (value > U64_MAX) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Id does not fit in 64 bits',
      });
      return z.NEVER;
    }
    return value;
  });

const ZONED_TIMESTAMP = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parse an ISO-8601 timestamp carrying a zone designator into epoch milliseconds.
 * Fractional seconds past the millisecond are truncated.
 */
export function parseTimestamp(text: string): number | null {
  if (!ZONED_TIMESTAMP.test(text)) return null;
  const ms = Date.parse(text.replace(/(\.\d{3})\d+/, '$1'));
  return Number.isNaN(ms) ? null : ms;
}

/**
 * Timestamp as a Date, normalized to an absolute instant
 */
export const TimestampSchema = z.string().transform((raw, ctx) => {
  const ms = parseTimestamp(raw);
  if (ms === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid timestamp: ${raw}`,
    });
    return z.NEVER;
  }
  return new Date(ms);
});

/**
 * Message author, only the id is read
 */
export const RawAuthorSchema = z.object({
  id: SnowflakeSchema,
});

/**
 * Reply reference, only the referenced message id is read
 */
export const RawMessageReferenceSchema = z.object({
  message_id: SnowflakeSchema.nullable().optional(),
});

/**
 * A single message as it appears in the export
 */
export const RawMessageSchema = z.object({
  id: SnowflakeSchema,
  content: z.string(),
  timestamp: TimestampSchema,
  author: RawAuthorSchema,
  message_reference: RawMessageReferenceSchema.nullable().optional(),
});
export type RawMessage = z.infer<typeof RawMessageSchema>;

/**
 * A messages file - array of messages in export order
 */
export const MessageFileSchema = z.array(RawMessageSchema);
export type MessageFile = z.infer<typeof MessageFileSchema>;

/**
 * Normalized message
 */
export interface MessageRecord {
  id: bigint;
  /** Empty when the message carries no text, e.g. attachments only */
  content: string;
  timestamp: Date;
  author: bigint;
  /** Id of the message this one replies to */
  reference: bigint | null;
}

export type SourceKind = 'channel' | 'thread';

/**
 * A messages file found in the archive
 */
export interface SourceFile {
  kind: SourceKind;
  path: string;
  /** Channel directory name */
  channel: string;
  /** Thread directory name, null for channel files */
  thread: string | null;
}

/**
 * One channel's or thread's messages, ordered by time
 */
export interface MessageSequence {
  source: SourceFile;
  messages: readonly MessageRecord[];
  durationMs: number;
}

/**
 * Flatten a raw message into a record
 */
export function toMessageRecord(raw: RawMessage): MessageRecord {
  return {
    id: raw.id,
    content: raw.content,
    timestamp: raw.timestamp,
    author: raw.author.id,
    reference: raw.message_reference?.message_id ?? null,
  };
}
