// Currency marks, thousands separators and whitespace that appear around
// extracted price/count literals ("4,562円", "¥ 4562", "$1,200.00").
const NUMERIC_NOISE = /[\s,'_]|円|yen|[¥$€£₩]|JPY|KRW|USD|EUR/gi;

/** Parses an extracted numeric literal; null when nothing numeric remains. */
export function normalizeNumeric(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value !== 'string') return null;

  const cleaned = value.replace(NUMERIC_NOISE, '');
  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) return null;
  return Number(cleaned);
}

export function normalizeText(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value).trim().replace(/\s+/g, ' ');
}
