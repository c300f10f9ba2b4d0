import type { LogEvent } from './event.ts';

/**
 * Turns a stream of raw lines into a stream of events. The returned iterable
 * must finish once `lines` is exhausted and every pending event is emitted.
 * Lines may be coalesced (multi-line statements) or dropped.
 */
export interface LineParser {
  processLines(lines: AsyncIterable<string>): AsyncIterable<LogEvent>;
}
