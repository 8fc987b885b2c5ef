/**
 * Name Variant Generator
 *
 * Turns a free-form person name into the handful of forms the filing corpus
 * actually uses. Ownership filings print the reporting owner as
 * "LAST FIRST MIDDLE", people type "First Last", and some filers use
 * "Last, First".
 *
 * Example: "Mr. Gale E. Klappa Jr." generates:
 * - Gale Klappa (first_last)
 * - Klappa, Gale (last_comma_first)
 * - KLAPPA GALE (filing_caps)
 * - KLAPPA GALE E (filing_caps_middle)
 * - Gale E Klappa (full)
 *
 * Variant count feeds straight into search fanout, so output is capped.
 */

import nicknameTable from './data/nicknames.json';
import type { NameVariant, NameVariantKind } from './types';

export const MAX_NAME_VARIANTS = 8;

const HONORIFICS = new Set([
  'mr', 'mrs', 'ms', 'miss', 'dr', 'prof', 'sir', 'dame', 'lord', 'lady',
  'rev', 'hon', 'father', 'sister', 'brother',
]);

const SUFFIXES = new Set([
  'jr', 'sr', 'ii', 'iii', 'iv', 'v', 'esq', 'md', 'phd', 'jd', 'cpa',
  'cfa', 'mba', 'pe', 'rn',
]);

const FORMAL_TO_NICKNAMES = new Map<string, string[]>(Object.entries(nicknameTable));

const NICKNAME_TO_FORMAL = new Map<string, string>();
for (const [formal, nicknames] of FORMAL_TO_NICKNAMES) {
  for (const nickname of nicknames) {
    // First formal name listed wins for shared nicknames ("chris")
    if (!NICKNAME_TO_FORMAL.has(nickname)) {
      NICKNAME_TO_FORMAL.set(nickname, formal);
    }
  }
}

export interface ParsedName {
  /** Lowercase tokens in "first middle... last" order */
  tokens: string[];
  first: string;
  middles: string[];
  last: string | null;
}

/**
 * Lowercase comparable tokens. Diacritics, periods and apostrophes are
 * dropped; hyphenated surnames stay one token.
 */
export function tokenizeName(text: string): string[] {
  return text
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/['’]/g, '')
    .replace(/[^a-z0-9-]+/g, ' ')
    .split(' ')
    .map((token) => token.replace(/^-+|-+$/g, ''))
    .filter((token) => token.length > 0);
}

/**
 * Tokens that carry identity. Single letters are middle initials.
 */
export function significantTokens(tokens: string[]): string[] {
  return tokens.filter((token) => token.length > 1);
}

/**
 * Map a nickname to its formal first name ("bill" -> "william")
 */
export function canonicalToken(token: string): string {
  return NICKNAME_TO_FORMAL.get(token) ?? token;
}

function stripAffixes(tokens: string[]): string[] {
  const words = tokens.filter((token) => !/^\d+$/.test(token));
  while (words.length > 0 && HONORIFICS.has(words[0])) {
    words.shift();
  }
  while (words.length > 0 && SUFFIXES.has(words[words.length - 1])) {
    words.pop();
  }
  return words;
}

/**
 * Tokens of a name as printed on a filing ("KLAPPA GALE E JR"), with
 * honorifics and suffixes removed the same way queries are parsed. A name
 * made only of affixes keeps its raw tokens.
 */
export function comparableTokens(name: string): string[] {
  const tokens = tokenizeName(name);
  const stripped = stripAffixes(tokens);
  return stripped.length > 0 ? stripped : tokens;
}

/**
 * Parse a raw name into ordered tokens, undoing "Last, First" ordering.
 * Returns null when nothing name-like is left.
 */
export function parseName(raw: string): ParsedName | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;

  let tokens: string[];
  const commaIndex = trimmed.indexOf(',');

  if (commaIndex >= 0) {
    const left = stripAffixes(tokenizeName(trimmed.slice(0, commaIndex)));
    const right = stripAffixes(tokenizeName(trimmed.slice(commaIndex + 1)));
    // "Gale Klappa, Jr." is a suffix, not "Last, First"
    tokens = left.length === 0 || right.length === 0 ? [...left, ...right] : [...right, ...left];
  } else {
    tokens = tokenizeName(trimmed);
  }

  tokens = stripAffixes(tokens);
  if (tokens.length === 0) return null;

  if (tokens.length === 1) {
    return { tokens, first: tokens[0], middles: [], last: null };
  }

  return {
    tokens,
    first: tokens[0],
    middles: tokens.slice(1, -1),
    last: tokens[tokens.length - 1],
  };
}

function titleCase(token: string): string {
  return token
    .split('-')
    .map((part) => (part ? part[0].toUpperCase() + part.slice(1) : part))
    .join('-');
}

/**
 * Canonical "First Middle Last" display string for a raw query.
 * Empty string when the query has no usable name.
 */
export function canonicalQueryName(raw: string): string {
  const parsed = parseName(raw);
  return parsed ? parsed.tokens.map(titleCase).join(' ') : '';
}

/**
 * Generate the bounded, deterministic set of name variants for a raw name.
 * An empty array means the input is not a usable name.
 */
export function normalizeName(raw: string): NameVariant[] {
  const parsed = parseName(raw);
  if (!parsed) return [];

  const variants: NameVariant[] = [];
  const seen = new Set<string>();

  const addVariant = (form: string, kind: NameVariantKind) => {
    if (variants.length >= MAX_NAME_VARIANTS || seen.has(form)) return;
    seen.add(form);
    variants.push({ form, kind, tokens: tokenizeName(form) });
  };

  const { first, middles, last } = parsed;

  if (!last) {
    addVariant(titleCase(first), 'single');
    addVariant(first.toUpperCase(), 'filing_caps');
    return variants;
  }

  addVariant(`${titleCase(first)} ${titleCase(last)}`, 'first_last');
  addVariant(`${titleCase(last)}, ${titleCase(first)}`, 'last_comma_first');
  addVariant(`${last.toUpperCase()} ${first.toUpperCase()}`, 'filing_caps');

  if (middles.length > 0) {
    const initials = middles.map((middle) => middle[0].toUpperCase()).join(' ');
    addVariant(`${last.toUpperCase()} ${first.toUpperCase()} ${initials}`, 'filing_caps_middle');
    addVariant(
      [first, ...middles, last].map(titleCase).join(' '),
      'full'
    );
  }

  // Nickname <-> formal first name
  const formal = NICKNAME_TO_FORMAL.get(first);
  const alternate = formal ?? FORMAL_TO_NICKNAMES.get(first)?.[0];
  if (alternate) {
    addVariant(`${titleCase(alternate)} ${titleCase(last)}`, 'nickname');
    addVariant(`${last.toUpperCase()} ${alternate.toUpperCase()}`, 'nickname');
  }

  return variants;
}
