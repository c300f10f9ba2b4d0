import type { EventData, LogEvent } from '../types/event.ts';
import type { LineParser } from '../types/parser.ts';
import { log } from '../utils/logger.ts';

export const DEFAULT_TIME_FIELDS: readonly string[] = ['timestamp', 'time', 'ts'];

export interface JsonLinesParserOptions {
  /** Fields checked, in order, for the event time. The one used is removed from data. */
  timeFields?: readonly string[];
  now?: () => Date;
}

const isRecord = (value: unknown): value is EventData =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// epoch values below 1e12 are taken as seconds
function toDate(value: unknown): Date | undefined {
  let date: Date | undefined;
  if (typeof value === 'number') {
    date = new Date(value < 1e12 ? value * 1000 : value);
  } else if (typeof value === 'string' && value.trim() !== '') {
    date = new Date(value);
  }
  return date && !Number.isNaN(date.getTime()) ? date : undefined;
}

/**
 * One JSON object per line. Lines that aren't JSON objects are skipped.
 */
export class JsonLinesParser implements LineParser {
  private readonly timeFields: readonly string[];
  private readonly now: () => Date;

  constructor(options: JsonLinesParserOptions = {}) {
    this.timeFields = options.timeFields ?? DEFAULT_TIME_FIELDS;
    this.now = options.now ?? (() => new Date());
  }

  parseLine(line: string): LogEvent | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      log.debug('Skipping line that is not valid JSON', { line });
      return null;
    }
    if (!isRecord(parsed)) {
      log.debug('Skipping line that is not a JSON object', { line });
      return null;
    }

    const data: EventData = { ...parsed };
    for (const field of this.timeFields) {
      if (!Object.hasOwn(data, field)) continue;
      const timestamp = toDate(data[field]);
      if (timestamp) {
        delete data[field];
        return { timestamp, data };
      }
    }
    return { timestamp: this.now(), data };
  }

  async *processLines(lines: AsyncIterable<string>): AsyncIterable<LogEvent> {
    for await (const line of lines) {
      const event = this.parseLine(line);
      if (event) yield event;
    }
  }
}
