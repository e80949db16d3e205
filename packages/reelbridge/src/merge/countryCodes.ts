/**
 * Country name → ISO 3166 alpha-2 code.
 * Names come from data/country-codes.json (code → Czech and English aliases),
 * historical states included: CS, SU, YU, DD keep their withdrawn codes and
 * states without one get a user-assigned X* code.
 */

import fs from 'node:fs';

const TABLE_FILE = new URL('../../data/country-codes.json', import.meta.url);

export function loadCountryAliases(file: URL = TABLE_FILE): Map<string, string> {
  const doc: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
  if (typeof doc !== 'object' || doc === null || Array.isArray(doc)) {
    throw new Error(`Country table ${file.pathname} must map codes to alias lists`);
  }

  const aliases = new Map<string, string>();
  for (const [code, names] of Object.entries(doc)) {
    if (!/^[A-Z]{2}$/.test(code) || !Array.isArray(names)) {
      throw new Error(`Country table ${file.pathname}: bad entry "${code}"`);
    }
    for (const name of names) {
      if (typeof name !== 'string') continue;
      aliases.set(name.trim().toLocaleLowerCase('cs'), code);
    }
  }
  return aliases;
}

const ALIASES = loadCountryAliases();

export function mapCountryToIso(name: string): string | undefined {
  const trimmed = name.trim();
  if (trimmed === '') return undefined;
  const code = ALIASES.get(trimmed.toLocaleLowerCase('cs'));
  if (code) return code;
  return /^[A-Za-z]{2}$/.test(trimmed) ? trimmed.toUpperCase() : undefined;
}

/** Unknown names are dropped; codes are deduplicated in first-seen order */
export function mapCountriesToIso(names: readonly string[]): string[] {
  const codes: string[] = [];
  for (const name of names) {
    const code = mapCountryToIso(name);
    if (code && !codes.includes(code)) codes.push(code);
  }
  return codes;
}
