// config/secret-interpolate.ts
import type { SecretSource } from './secret-source.ts';

const TOKEN = /\$\{(?<source>[a-z]+):(?<key>[A-Za-z0-9_\-./]+)\}/g;

type Missing = { source: string; key: string; placeholder: string };

async function replaceTokens(
  input: string,
  sources: Record<string, SecretSource>,
  missing: Missing[],
): Promise<string> {
  const out: string[] = [];
  let last = 0;
  for (const match of input.matchAll(TOKEN)) {
    const placeholder = match[0];
    const index = match.index ?? 0;
    const source = match.groups?.source ?? '';
    const key = match.groups?.key ?? '';
    const src = sources[source];
    if (!src) throw new Error(`Unknown secret source '${source}' in ${placeholder}`);

    const value = await src.get(key);
    if (value == null || value === '') {
      missing.push({ source, key, placeholder });
    }
    out.push(input.slice(last, index), value ?? '');
    last = index + placeholder.length;
  }
  out.push(input.slice(last));
  return out.join('');
}

async function walk(
  value: unknown,
  sources: Record<string, SecretSource>,
  missing: Missing[],
): Promise<unknown> {
  if (typeof value === 'string') return replaceTokens(value, sources, missing);
  if (Array.isArray(value)) {
    return Promise.all(value.map((item) => walk(item, sources, missing)));
  }
  if (value !== null && typeof value === 'object') {
    const entries = await Promise.all(
      Object.entries(value).map(async ([k, v]) => [k, await walk(v, sources, missing)] as const),
    );
    return Object.fromEntries(entries);
  }
  return value;
}

/**
 * Interpolate `${env:VAR_NAME}` tokens inside string values of an arbitrary
 * JSON-like object. Keys are left alone.
 */
export async function interpolate(
  obj: unknown,
  sources: Record<string, SecretSource>,
): Promise<{ value: unknown; missing: Missing[] }> {
  const missing: Missing[] = [];
  const value = await walk(obj, sources, missing);
  return { value, missing };
}

// Convenience wrapper: throw if anything is missing
export async function interpolateStrict(
  obj: unknown,
  sources: Record<string, SecretSource>,
): Promise<unknown> {
  const { value, missing } = await interpolate(obj, sources);
  if (missing.length) {
    // Group by source to make it scannable
    const bySource = new Map<string, Set<string>>();
    for (const m of missing) {
      const keys = bySource.get(m.source) ?? new Set<string>();
      keys.add(m.key);
      bySource.set(m.source, keys);
    }
    const lines: string[] = [];
    for (const [source, keys] of bySource) {
      lines.push(`- ${source}: ${Array.from(keys).sort().join(', ')}`);
    }
    throw new Error(
      [
        'Missing required secrets for config interpolation:',
        ...lines,
        'Define them in your environment (e.g., .env).',
      ].join('\n'),
    );
  }
  return value;
}
