// config/secret-interpolate.ts
import type { SecretSource } from './secret-source.ts';

const TOKEN = /\$\{(?<source>[a-z]+):(?<key>[A-Za-z0-9_\-./]+)\}/g;

type Missing = { source: string; key: string; placeholder: string };

/**
 * Replace `${source:KEY}` tokens in every string of a JSON-like value.
 * Unresolved tokens become empty strings and are reported in `missing`.
 */
export async function interpolate(
  obj: unknown,
  sources: Record<string, SecretSource>,
): Promise<{ value: unknown; missing: Missing[] }> {
  const missing: Missing[] = [];

  const walk = async (node: unknown): Promise<unknown> => {
    if (typeof node === 'string') return replaceTokens(node, sources, missing);
    if (Array.isArray(node)) return Promise.all(node.map(walk));
    if (node !== null && typeof node === 'object') {
      const out: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(node)) out[k] = await walk(v);
      return out;
    }
    return node;
  };

  return { value: await walk(obj), missing };
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
        'Missing required values for config interpolation:',
        ...lines,
        'Define them in your environment (e.g., .env).',
      ].join('\n'),
    );
  }
  return value;
}

async function replaceTokens(
  str: string,
  sources: Record<string, SecretSource>,
  missing: Missing[],
): Promise<string> {
  const out: string[] = [];
  let last = 0;
  for (const m of str.matchAll(TOKEN)) {
    const source = m.groups?.source ?? '';
    const key = m.groups?.key ?? '';
    const src = sources[source];
    if (!src) throw new Error(`Unknown secret source '${source}' in ${m[0]}`);

    out.push(str.slice(last, m.index));
    const val = await src.get(key);
    if (val == null || val === '') {
      missing.push({ source, key, placeholder: m[0] });
    } else {
      out.push(val);
    }
    last = (m.index ?? 0) + m[0].length;
  }
  out.push(str.slice(last));
  return out.join('');
}
