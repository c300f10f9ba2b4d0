import type { LogEvent } from '../../types/event.ts';
import type { LineParser } from '../../types/parser.ts';

export const FIXED_TIME = new Date('2024-03-01T12:00:00.000Z');

/**
 * Emits one event per line; `key=value` pairs separated by spaces become
 * fields, anything else ends up under `line`. Every line it sees is recorded.
 */
export class FakeParser implements LineParser {
  public seen: string[] = [];

  async *processLines(lines: AsyncIterable<string>): AsyncIterable<LogEvent> {
    for await (const line of lines) {
      this.seen.push(line);
      yield { timestamp: FIXED_TIME, data: toFields(line) };
    }
  }
}

export function toFields(line: string): Record<string, string> {
  const pairs = line.split(' ').filter((part) => part.includes('='));
  if (pairs.length === 0) return { line };
  return Object.fromEntries(
    pairs.map((pair) => {
      const at = pair.indexOf('=');
      return [pair.slice(0, at), pair.slice(at + 1)];
    }),
  );
}

/** Yields events for the first `failAfter` lines, then throws. */
export class FailingParser implements LineParser {
  constructor(private readonly failAfter: number) {}

  async *processLines(lines: AsyncIterable<string>): AsyncIterable<LogEvent> {
    let count = 0;
    for await (const line of lines) {
      if (count >= this.failAfter) {
        throw new Error('parser blew up');
      }
      count++;
      yield { timestamp: FIXED_TIME, data: { line } };
    }
  }
}
