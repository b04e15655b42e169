/**
 * Messages file parser
 * Parses channel and thread message files into time-ordered records
 */

import { readFile } from 'fs/promises';
import type { ZodIssue } from 'zod';
import {
  MessageFileSchema,
  toMessageRecord,
  type MessageRecord,
} from './types.js';

/**
 * A messages file that could not be read as an array of messages
 */
export class ArchiveParseError extends Error {
  constructor(
    message: string,
    public readonly path: string | null = null,
    public readonly issues: ZodIssue[] = []
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ArchiveParseError';
  }
}

/**
 * Format the first few schema issues as "[0].author.id: Required"
 */
function describeIssues(issues: ZodIssue[], limit = 5): string {
  const lines = issues.slice(0, limit).map((issue) => {
    const path = issue.path
      .map((part) => (typeof part === 'number' ? `[${part}]` : `.${part}`))
      .join('');
    return `  - ${path || '(root)'}: ${issue.message}`;
  });
  if (issues.length > limit) {
    lines.push(`  ... and ${issues.length - limit} more`);
  }
  return lines.join('\n');
}

/**
 * Stable ascending sort by timestamp; equal timestamps keep file order
 */
export function sortByTimestamp(records: readonly MessageRecord[]): MessageRecord[] {
  return [...records].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

/**
 * Parse a messages file's JSON content into records in file order
 * @throws ArchiveParseError on invalid JSON or a message missing a required field
 */
export function parseMessages(jsonContent: string, sourcePath: string | null = null): MessageRecord[] {
  let rawData: unknown;
  try {
    rawData = JSON.parse(jsonContent);
  } catch (err) {
    throw new ArchiveParseError(
      `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`,
      sourcePath
    );
  }

  const result = MessageFileSchema.safeParse(rawData);
  if (!result.success) {
    throw new ArchiveParseError(
      `Schema validation failed:\n${describeIssues(result.error.issues)}`,
      sourcePath,
      result.error.issues
    );
  }

  return result.data.map(toMessageRecord);
}

/**
 * Read, parse and sort a messages file
 */
export async function parseMessageFile(filePath: string): Promise<MessageRecord[]> {
  const content = await readFile(filePath, 'utf-8');
  return sortByTimestamp(parseMessages(content, filePath));
}
