import type { LogEvent } from '../types/event.ts';
import { sha256Hex } from '../utils/hash.ts';
import type { Enricher } from './core.ts';

/**
 * Replaces each configured sensitive field with the hex SHA-256 digest of its
 * string form. Only parsed fields are scrubbed; extra fields are added later.
 */
export const scrubSensitiveFields = (): Enricher<LogEvent, LogEvent> => {
  return (event, ctx) => {
    if (!ctx.scrubQuery) return event;

    const present = ctx.scrubFields.filter((field) => Object.hasOwn(event.data, field));
    if (present.length === 0) return event;

    const data = { ...event.data };
    for (const field of present) {
      data[field] = sha256Hex(data[field]);
    }
    return { ...event, data };
  };
};
