/**
 * Reply context windowing tests
 */

import { describe, it, expect } from 'vitest';
import type { MessageRecord } from '../archive/types.js';
import { buildPrompt, windowReplies, DEFAULT_WINDOW_OPTIONS } from './index.js';

const TARGET = 100n;
const ALICE = 1n;
const BOB = 2n;
const CAROL = 3n;

const BASE = Date.UTC(2024, 2, 1, 12, 0, 0);
const MIN = 60_000;

function msg(
  id: number,
  author: bigint,
  atMs: number,
  content: string,
  reference: number | null = null
): MessageRecord {
  return {
    id: BigInt(id),
    author,
    timestamp: new Date(BASE + atMs),
    content,
    reference: reference === null ? null : BigInt(reference),
  };
}

describe('windowReplies', () => {
  it('should pair a reply with the messages before it, oldest first', () => {
    const messages = [
      msg(1, ALICE, 0, 'hi'),
      msg(2, BOB, 1 * MIN, 'yo'),
      msg(3, CAROL, 2 * MIN, 'anyone here?'),
      msg(4, TARGET, 3 * MIN, 'sup'),
    ];

    expect(windowReplies(messages, TARGET)).toEqual([
      { prompt: 'yo\nanyone here?', reply: 'sup' },
    ]);
  });

  it('should never collect the first message of the sequence', () => {
    const messages = [
      msg(1, ALICE, 0, 'hi'),
      msg(2, BOB, 1 * MIN, 'yo'),
      msg(3, TARGET, 2 * MIN, 'sup'),
      msg(4, TARGET, 3 * MIN, 'ok'),
    ];

    // "ok" stops at the target's own "sup" and gets no context
    expect(windowReplies(messages, TARGET)).toEqual([
      { prompt: 'yo', reply: 'sup' },
    ]);
  });

  it('should produce nothing for a reply at index 0', () => {
    const messages = [
      msg(1, TARGET, 0, 'first!'),
      msg(2, ALICE, 1 * MIN, 'welcome'),
    ];

    expect(windowReplies(messages, TARGET)).toEqual([]);
    expect(buildPrompt(messages, 0, TARGET)).toBeNull();
  });

  it('should produce nothing for a reply with empty content', () => {
    const messages = [
      msg(1, ALICE, 0, 'pad'),
      msg(2, BOB, 1 * MIN, 'look at this'),
      msg(3, TARGET, 2 * MIN, ''),
    ];

    expect(windowReplies(messages, TARGET)).toEqual([]);
  });

  it('should produce nothing when only index 0 precedes the reply', () => {
    const messages = [
      msg(1, ALICE, 0, 'hello'),
      msg(2, TARGET, 1 * MIN, 'hi alice'),
    ];

    expect(windowReplies(messages, TARGET)).toEqual([]);
  });

  it('should stop at the target author\'s own messages', () => {
    const messages = [
      msg(1, ALICE, 0, 'a'),
      msg(2, BOB, 1 * MIN, 'b'),
      msg(3, TARGET, 2 * MIN, 'mine'),
      msg(4, CAROL, 3 * MIN, 'c'),
      msg(5, TARGET, 4 * MIN, 'reply'),
    ];

    expect(windowReplies(messages, TARGET)).toEqual([
      { prompt: 'b', reply: 'mine' },
      { prompt: 'c', reply: 'reply' },
    ]);
  });

  it('should cap the prompt at five lines', () => {
    const messages = [
      ...Array.from({ length: 8 }, (_, i) => msg(i + 1, i % 2 === 0 ? ALICE : BOB, i * 1000, `m${i}`)),
      msg(9, TARGET, 9000, 'done'),
    ];

    expect(windowReplies(messages, TARGET)).toEqual([
      { prompt: 'm3\nm4\nm5\nm6\nm7', reply: 'done' },
    ]);
  });

  it('should honour a custom line cap', () => {
    const messages = [
      msg(1, ALICE, 0, 'pad'),
      msg(2, ALICE, 1000, 'one'),
      msg(3, BOB, 2000, 'two'),
      msg(4, CAROL, 3000, 'three'),
      msg(5, TARGET, 4000, 'reply'),
    ];

    expect(windowReplies(messages, TARGET, { ...DEFAULT_WINDOW_OPTIONS, maxLines: 2 })).toEqual([
      { prompt: 'two\nthree', reply: 'reply' },
    ]);
  });

  it('should skip empty messages but still step past them', () => {
    const messages = [
      msg(1, ALICE, 0, 'pad'),
      msg(2, BOB, 1 * MIN, 'one'),
      msg(3, CAROL, 2 * MIN, ''),
      msg(4, ALICE, 3 * MIN, 'two'),
      msg(5, TARGET, 4 * MIN, 'reply'),
    ];

    expect(windowReplies(messages, TARGET)).toEqual([
      { prompt: 'one\ntwo', reply: 'reply' },
    ]);
  });

  it('should produce nothing when every prior message is empty', () => {
    const messages = [
      msg(1, ALICE, 0, 'pad'),
      msg(2, BOB, 1 * MIN, ''),
      msg(3, CAROL, 2 * MIN, ''),
      msg(4, TARGET, 3 * MIN, 'nice pics'),
    ];

    expect(windowReplies(messages, TARGET)).toEqual([]);
  });

  describe('time window', () => {
    it('should drop messages older than ten minutes before the reply', () => {
      const messages = [
        msg(1, ALICE, 0, 'pad'),
        msg(2, BOB, 1 * MIN, 'old'),
        msg(3, CAROL, 15 * MIN, 'new'),
        msg(4, TARGET, 20 * MIN, 'reply'),
      ];

      expect(windowReplies(messages, TARGET)).toEqual([
        { prompt: 'new', reply: 'reply' },
      ]);
    });

    it('should include a message exactly ten minutes old', () => {
      const messages = [
        msg(1, ALICE, 0, 'pad'),
        msg(2, BOB, 10 * MIN, 'edge'),
        msg(3, TARGET, 20 * MIN, 'reply'),
      ];

      expect(buildPrompt(messages, 2, TARGET)).toBe('edge');
    });

    it('should exclude a message one millisecond past the window', () => {
      const messages = [
        msg(1, ALICE, 0, 'pad'),
        msg(2, BOB, 10 * MIN - 1, 'too old'),
        msg(3, TARGET, 20 * MIN, 'reply'),
      ];

      expect(buildPrompt(messages, 2, TARGET)).toBeNull();
    });

    it('should honour a custom window', () => {
      const messages = [
        msg(1, ALICE, 0, 'pad'),
        msg(2, BOB, 1 * MIN, 'a'),
        msg(3, CAROL, 3 * MIN, 'b'),
        msg(4, TARGET, 4 * MIN, 'reply'),
      ];

      expect(buildPrompt(messages, 3, TARGET, { maxLines: 5, maxGapMs: 2 * MIN })).toBe('b');
    });
  });

  describe('reference resolution', () => {
    it('should anchor the window at the referenced message', () => {
      const messages = [
        msg(1, ALICE, 0, 'pad'),
        msg(2, BOB, 12 * MIN, 'earlier'),
        msg(3, CAROL, 14 * MIN, 'question'),
        msg(4, ALICE, 28 * MIN, 'chatter'),
        msg(5, TARGET, 34 * MIN, 'answer', 3),
      ];

      // "earlier" is 22 minutes before the reply but 2 minutes before the reference
      expect(windowReplies(messages, TARGET)).toEqual([
        { prompt: 'earlier\nquestion', reply: 'answer' },
      ]);
    });

    it('should fall back to the previous message for an unknown reference', () => {
      const messages = [
        msg(1, ALICE, 0, 'pad'),
        msg(2, BOB, 1 * MIN, 'a'),
        msg(3, TARGET, 2 * MIN, 'reply', 999),
      ];

      expect(buildPrompt(messages, 2, TARGET)).toBe('a');
    });

    it('should not resolve a reference to the message right before the reply', () => {
      const messages = [
        msg(1, ALICE, 0, 'pad'),
        msg(2, ALICE, 1 * MIN, 'a'),
        msg(3, BOB, 10 * MIN, 'b'),
        msg(4, TARGET, 12 * MIN, 'reply', 3),
      ];

      // Anchored at the reply's own time, "a" is 11 minutes old
      expect(buildPrompt(messages, 3, TARGET)).toBe('b');
    });

    it('should not resolve a reference to a later message', () => {
      const messages = [
        msg(1, ALICE, 0, 'pad'),
        msg(2, BOB, 1 * MIN, 'a'),
        msg(3, TARGET, 2 * MIN, 'reply', 4),
        msg(4, CAROL, 3 * MIN, 'later'),
      ];

      expect(buildPrompt(messages, 2, TARGET)).toBe('a');
    });

    it('should produce nothing when the reference is the target\'s own message', () => {
      const messages = [
        msg(1, ALICE, 0, 'pad'),
        msg(2, TARGET, 1 * MIN, 'mine'),
        msg(3, BOB, 2 * MIN, 'x'),
        msg(4, TARGET, 3 * MIN, 'reply', 2),
      ];

      expect(buildPrompt(messages, 3, TARGET)).toBeNull();
    });

    it('should produce nothing when the reference is the first message', () => {
      const messages = [
        msg(1, ALICE, 0, 'question'),
        msg(2, BOB, 1 * MIN, 'x'),
        msg(3, CAROL, 2 * MIN, 'y'),
        msg(4, TARGET, 3 * MIN, 'reply', 1),
      ];

      expect(buildPrompt(messages, 3, TARGET)).toBeNull();
    });
  });

  it('should keep its bounds on a long mixed conversation', () => {
    // Deterministic pseudo-random conversation
    let seed = 7;
    const next = () => {
      seed = (seed * 16807) % 2147483647;
      return seed / 2147483647;
    };
    const authors = [ALICE, BOB, CAROL, TARGET];
    const messages: MessageRecord[] = [];
    let at = 0;
    for (let i = 0; i < 400; i++) {
      at += Math.floor(next() * 6 * MIN);
      const author = authors[Math.floor(next() * authors.length)];
      const content = next() < 0.1 ? '' : `${author === TARGET ? 'T' : 'O'}${i}`;
      const reference = next() < 0.2 && i > 0 ? Math.floor(next() * i) + 1 : null;
      messages.push(msg(i + 1, author, at, content, reference));
    }
    const byContent = new Map(messages.map((m) => [m.content, m]));
    const indexOf = new Map(messages.map((m, index) => [m.content, index]));

    // Time the window is measured from: the referenced message when it
    // resolves within messages[0, index - 1), otherwise the reply itself
    const anchorTime = (index: number): number => {
      const reply = messages[index];
      const target = messages.slice(0, Math.max(index - 1, 0)).find((m) => m.id === reply.reference);
      return (reply.reference !== null && target ? target : reply).timestamp.getTime();
    };

    const pairs = windowReplies(messages, TARGET);

    expect(pairs.length).toBeGreaterThan(0);
    for (const pair of pairs) {
      const lines = pair.prompt.split('\n');
      const replyIndex = indexOf.get(pair.reply) ?? -1;
      expect(messages[replyIndex]?.author).toBe(TARGET);
      expect(lines.length).toBeLessThanOrEqual(5);
      const anchor = anchorTime(replyIndex);
      for (const line of lines) {
        const sourceIndex = indexOf.get(line) ?? -1;
        const source = messages[sourceIndex];
        expect(source?.author).not.toBe(TARGET);
        expect(source?.content).not.toBe('');
        expect(sourceIndex).toBeGreaterThan(0);
        expect(sourceIndex).toBeLessThan(replyIndex);
        expect(anchor - source.timestamp.getTime()).toBeGreaterThanOrEqual(0);
        expect(anchor - source.timestamp.getTime()).toBeLessThanOrEqual(DEFAULT_WINDOW_OPTIONS.maxGapMs);
      }
      const times = lines.map((line) => byContent.get(line)?.timestamp.getTime() ?? NaN);
      expect([...times].sort((a, b) => a - b)).toEqual(times);
    }
  });
});
