import { FieldMergeError } from '../errors.ts';
import type { FieldValue, LogEvent } from '../types/event.ts';
import type { Enricher, MergedEvent } from './core.ts';

type Normalized = { ok: true; value: FieldValue } | { ok: false; reason: string };

const isPlainObject = (value: object): boolean => {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/**
 * Coerces a parsed value into something the sinks can carry as a flat field.
 * Dates become ISO strings; arrays and plain objects become JSON strings.
 */
export function normalizeFieldValue(value: unknown): Normalized {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return { ok: true, value };
    case 'number':
      return Number.isFinite(value)
        ? { ok: true, value }
        : { ok: false, reason: `non-finite number ${value}` };
    case 'undefined':
      return { ok: false, reason: 'value is undefined' };
    case 'object': {
      if (value === null) return { ok: true, value: null };
      if (value instanceof Date) {
        return Number.isNaN(value.getTime())
          ? { ok: false, reason: 'invalid date' }
          : { ok: true, value: value.toISOString() };
      }
      if (!Array.isArray(value) && !isPlainObject(value)) {
        return { ok: false, reason: `unsupported ${value.constructor?.name ?? 'object'} value` };
      }
      try {
        return { ok: true, value: JSON.stringify(value) };
      } catch (err) {
        return { ok: false, reason: err instanceof Error ? err.message : String(err) };
      }
    }
    default:
      return { ok: false, reason: `unsupported ${typeof value} value` };
  }
}

function addAll(
  target: Record<string, FieldValue>,
  fields: Readonly<Record<string, unknown>>,
  rejected: FieldMergeError[],
): void {
  for (const [field, raw] of Object.entries(fields)) {
    const normalized = normalizeFieldValue(raw);
    if (normalized.ok) {
      // a parsed "__proto__" key must land as an own field, not hit the setter
      Object.defineProperty(target, field, {
        value: normalized.value,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    } else {
      rejected.push(new FieldMergeError(field, normalized.reason));
    }
  }
}

/**
 * Extra fields go in first so anything parsed from the log line wins on a
 * key collision. A field that can't be carried is left out and reported.
 */
export const mergeExtraFields = (): Enricher<LogEvent, MergedEvent> => {
  return (event, ctx) => {
    const data: Record<string, FieldValue> = {};
    const rejected: FieldMergeError[] = [];
    addAll(data, ctx.addFields, rejected);
    addAll(data, event.data, rejected);
    return { timestamp: event.timestamp, data, rejected, source: event };
  };
};
