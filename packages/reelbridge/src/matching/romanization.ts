/**
 * Czech → English romanization of Japanese and Korean names.
 *
 * The regional database transcribes Japanese names with the Polivka system
 * ("Tacuja Jošihara") and Korean names phonetically ("Pak Čan-uk"); IMDb uses
 * modified Hepburn and Revised Romanization. Rules live in
 * data/romanization-rules.json, each table ordered longest pattern first.
 */

import fs from 'node:fs';

export interface RomanizationRule {
  from: string;
  to: string;
}

export interface RomanizationTables {
  japanese: RomanizationRule[];
  korean: RomanizationRule[];
}

const RULES_FILE = new URL('../../data/romanization-rules.json', import.meta.url);

function isRuleList(value: unknown): value is RomanizationRule[] {
  return Array.isArray(value) && value.every(
    (r: unknown) => typeof r === 'object' && r !== null &&
      'from' in r && typeof r.from === 'string' && r.from !== '' &&
      'to' in r && typeof r.to === 'string'
  );
}

export function loadRomanizationTables(file: URL = RULES_FILE): RomanizationTables {
  const doc: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  if (typeof doc !== 'object' || doc === null || !('japanese' in doc) || !('korean' in doc)) {
    throw new Error(`Romanization rules file ${file.pathname} must define "japanese" and "korean"`);
  }
  const { japanese, korean } = doc;
  if (!isRuleList(japanese) || !isRuleList(korean)) {
    throw new Error(`Romanization rules file ${file.pathname} has a malformed rule`);
  }
  return { japanese, korean };
}

const TABLES = loadRomanizationTables();

/**
 * Walk the input once; at each position the first rule (in table order) whose
 * pattern starts there wins, otherwise one character is copied through.
 */
export function applyRules(input: string, rules: readonly RomanizationRule[]): string {
  if (!input || input.trim() === '') return input;

  let out = '';
  let i = 0;
  while (i < input.length) {
    const rule = rules.find(r => input.startsWith(r.from, i));
    if (rule) {
      out += rule.to;
      i += rule.from.length;
    } else {
      out += input[i];
      i++;
    }
  }
  return out;
}

/** Polivka → modified Hepburn. Expects lowercase input. */
export function japaneseToHepburn(czechName: string): string {
  return applyRules(czechName, TABLES.japanese);
}

/** Czech phonetic → Revised Romanization. Expects lowercase input. */
export function koreanToRevised(czechName: string): string {
  return applyRules(czechName, TABLES.korean);
}

/** Edit distance, two rolling rows */
export function levenshtein(s: string, t: string): number {
  if (s === t) return 0;
  const n = s.length;
  const m = t.length;
  if (n === 0) return m;
  if (m === 0) return n;

  let previous = new Array<number>(m + 1);
  let current = new Array<number>(m + 1);
  for (let j = 0; j <= m; j++) previous[j] = j;

  for (let x = 1; x <= n; x++) {
    current[0] = x;
    for (let y = 1; y <= m; y++) {
      const cost = s[x - 1] === t[y - 1] ? 0 : 1;
      current[y] = Math.min(current[y - 1] + 1, previous[y] + 1, previous[y - 1] + cost);
    }
    [previous, current] = [current, previous];
  }
  return previous[m];
}

/**
 * Romanize with both tables and keep the output that moved furthest from the
 * input (Japanese wins ties). Pure-ASCII input is returned as is: short
 * digraphs such as "co" occur inside Western names ("scorsese").
 */
export function transliterateToEnglish(czechName: string): string {
  if (!czechName || czechName.trim() === '') return czechName;
  if (!/[^\x00-\x7F]/.test(czechName)) return czechName;

  const japanese = japaneseToHepburn(czechName);
  const korean = koreanToRevised(czechName);
  const japaneseDiff = levenshtein(czechName, japanese);
  const koreanDiff = levenshtein(czechName, korean);

  if (japaneseDiff === 0 && koreanDiff === 0) return czechName;
  return japaneseDiff >= koreanDiff ? japanese : korean;
}
