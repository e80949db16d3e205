/**
 * Text normalisation shared by every identity comparison.
 */

// ── Normalisation helpers ──────────────────────────────────────────

/** Strip diacritics, keep letters and digits only, lowercase. "Amélie" → "amelie" */
export function normalizeTitle(s: string | null | undefined): string {
  if (!s || s.trim() === '') return '';
  return s
    .normalize('NFD')
    .replace(/\p{Mn}/gu, '')
    .replace(/[^\p{L}\p{N}]/gu, '')
    .toLowerCase();
}

/** Same as normalizeTitle, but whitespace survives and digits do not */
export function normalizePersonName(s: string | null | undefined): string {
  if (!s || s.trim() === '') return '';
  return s
    .normalize('NFD')
    .replace(/\p{Mn}/gu, '')
    .replace(/[^\p{L}\s]/gu, '')
    .toLowerCase();
}

/** Word-order independent form of an already normalised name */
export function sortNameWords(normalizedName: string): string {
  return normalizedName
    .split(/\s+/)
    .filter(w => w !== '')
    .sort()
    .join(' ');
}

/** First standalone 4-digit group: "1985 (TV)" → "1985" */
export function extractYear(value: string | null | undefined): string | undefined {
  if (!value) return undefined;
  const m = /\b(\d{4})\b/.exec(value);
  return m ? m[1] : undefined;
}

/** All standalone 4-digit groups, in order of appearance */
export function extractAllYears(value: string | null | undefined): string[] {
  if (!value) return [];
  return [...value.matchAll(/\b(\d{4})\b/g)].map(m => m[1]);
}

function parseIntStrict(value: string): number | undefined {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return undefined;
  return Number.parseInt(trimmed, 10);
}

/** Equal strings, or both integers no more than `tolerance` apart */
export function yearsMatch(a: string, b: string, tolerance: number): boolean {
  if (a === b) return true;
  const ya = parseIntStrict(a);
  const yb = parseIntStrict(b);
  if (ya === undefined || yb === undefined) return false;
  return Math.abs(ya - yb) <= tolerance;
}
