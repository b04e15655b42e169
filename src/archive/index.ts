/**
 * Chat archive module
 * Finds, parses and orders channel and thread message files
 */

export {
  discoverSources,
  type DiscoveryResult,
  type SkippedCandidate,
} from './discovery.js';

export {
  ArchiveParseError,
  parseMessages,
  parseMessageFile,
  sortByTimestamp,
} from './parser.js';

export {
  loadArchive,
  loadSource,
  readSequences,
  type InvalidFile,
  type LoadOptions,
  type LoadProgress,
  type LoadResult,
} from './loader.js';

export {
  CHANNEL_MESSAGES_FILE,
  THREADS_DIR,
  THREAD_MESSAGES_FILE,
  MessageFileSchema,
  RawMessageSchema,
  SnowflakeSchema,
  TimestampSchema,
  parseTimestamp,
  toMessageRecord,
  type MessageFile,
  type MessageRecord,
  type MessageSequence,
  type RawMessage,
  type SourceFile,
  type SourceKind,
} from './types.js';
