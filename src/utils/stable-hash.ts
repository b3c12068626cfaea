import crypto from 'crypto';

function stableSort(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(stableSort);
  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => [k, stableSort(v)]),
    );
  }
  return value;
}

export function md5HashCanonical(value: unknown, len?: number): string {
  const canon = stableSort(value);
  const json = JSON.stringify(canon);
  const md5 = crypto.createHash('md5').update(json).digest('hex');
  return len ? md5.slice(0, len) : md5;
}
