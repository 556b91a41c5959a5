const UNIT_MS = new Map<string, number>([
  ['ns', 1e-6],
  ['us', 1e-3],
  ['ms', 1],
  ['s', 1000],
  ['sec', 1000],
  ['secs', 1000],
  ['m', 60_000],
  ['min', 60_000],
  ['mins', 60_000],
  ['h', 3_600_000],
  ['hr', 3_600_000],
  ['hrs', 3_600_000],
  ['d', 86_400_000],
]);

const PART_RE = /(\d+(?:\.\d+)?)([a-z]+)/g;

/**
 * Parses durations such as `500ms`, `1s` or `1m 30s` into milliseconds.
 * Returns `undefined` for anything else.
 */
export function parseDuration(raw: string): number | undefined {
  const compact = raw.replace(/\s+/g, '').toLowerCase();
  if (compact === '') return undefined;

  let consumed = 0;
  let total = 0;
  for (const match of compact.matchAll(PART_RE)) {
    if (match.index !== consumed) return undefined;
    const [text, amount, unit] = match;
    const factor = UNIT_MS.get(unit);
    if (factor === undefined) return undefined;
    total += Number(amount) * factor;
    consumed += text.length;
  }

  return consumed === compact.length ? total : undefined;
}
