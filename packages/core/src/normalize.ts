/**
 * Content normalization: turns raw posting text into a comparable canonical form.
 * Every function here is pure; identical input always yields identical output.
 */

import type { JobSource } from '@reconciler/schemas';
import usStates from './data/us-states.json';

export type SalaryPeriod = 'YEAR' | 'HOUR';

export interface SalaryRange {
  min: number;
  max: number;
  currency: string;
  period: SalaryPeriod;
}

export interface NormalizedContent {
  /** Normalized description; empty when the posting carries no usable text. */
  text: string;
  title: string;
  titleTokens: string[];
  descriptionTokens: string[];
  locationTokens: string[];
  salary: SalaryRange | null;
  comparable: boolean;
}

const US_STATES = new Map<string, string>(Object.entries(usStates));

const CITY_ALIASES = new Map<string, string>([
  ['sf', 'san francisco'],
  ['san fran', 'san francisco'],
  ['nyc', 'new york'],
  ['new york city', 'new york'],
  ['bay area', 'san francisco bay area'],
]);

const REMOTE_PATTERN = /\b(remote|anywhere|worldwide|work from home|wfh)\b/;

// Each pattern swallows the whole sentence carrying the marker.
const BOILERPLATE_PATTERNS: RegExp[] = [
  /[^.!?\n]*\bequal\s+(?:employment\s+)?opportunit(?:y|ies)\b[^.!?\n]*[.!?]?/g,
  /[^.!?\n]*\bwithout\s+regard\s+to\b[^.!?\n]*[.!?]?/g,
  /[^.!?\n]*\breasonable\s+accommodations?\b[^.!?\n]*[.!?]?/g,
  /[^.!?\n]*\be-?verify\b[^.!?\n]*[.!?]?/g,
  /[^.!?\n]*\b(?:applicant\s+)?privacy\s+(?:notice|policy)\b[^.!?\n]*[.!?]?/g,
  /[^.!?\n]*\bpowered\s+by\s+(?:greenhouse|lever|workday|smartrecruiters|ashby|workable|icims|jobvite)\b[^.!?\n]*[.!?]?/g,
  /[^.!?\n]*\b(?:apply\s+now|click\s+(?:here\s+)?to\s+apply)\b[^.!?\n]*[.!?]?/g,
];

const HTML_ENTITIES: Array<[RegExp, string]> = [
  [/&nbsp;/g, ' '],
  [/&amp;/g, '&'],
  [/&quot;/g, '"'],
  [/&#39;|&apos;/g, "'"],
  [/&lt;/g, ' '],
  [/&gt;/g, ' '],
];

// Every replacement is shorter than its match, so this always terminates
function decodeEntities(text: string): string {
  let out = text;
  for (;;) {
    let next = out;
    for (const [pattern, replacement] of HTML_ENTITIES) {
      next = next.replace(pattern, replacement);
    }
    if (next === out) return out;
    out = next;
  }
}

function stripTags(text: string): string {
  return text.replace(/<[^>]*>/g, ' ');
}

function stripBoilerplate(text: string): string {
  let out = text;
  for (const pattern of BOILERPLATE_PATTERNS) {
    out = out.replace(pattern, ' ');
  }
  return out;
}

function cleanCharacters(text: string): string {
  return text
    .replace(/[‘’]/g, "'")
    .replace(/[^\p{L}\p{N}\s$%.,;:()/&+'-]/gu, ' ')
    .replace(/(^|\s)[-+]+(?=\s|$)/g, '$1')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Lowercase, drop markup, strip EEO / ATS boilerplate, drop bullets and stray symbols,
 * collapse whitespace. Runs to a fixpoint so that `normalizeText(normalizeText(x)) === normalizeText(x)`.
 */
export function normalizeText(raw: unknown): string {
  if (typeof raw !== 'string' || !raw.trim()) return '';

  // No pass lengthens the text, so the loop reaches a fixpoint
  let text = raw.toLowerCase();
  for (;;) {
    const next = cleanCharacters(stripBoilerplate(stripTags(decodeEntities(text))));
    if (next === text) return next;
    text = next;
  }
}

/**
 * Word tokens of already-normalized text.
 */
export function tokenize(normalized: string): string[] {
  return normalized.match(/[\p{L}\p{N}]+/gu) ?? [];
}

const AMOUNT = String.raw`(\d{1,3}(?:,\d{3})+|\d+(?:\.\d+)?)\s*(k)?`;
const CURRENCY = String.raw`(\$|usd|eur|€|gbp|£)`;
const SALARY_PATTERN = new RegExp(
  String.raw`${CURRENCY}\s*${AMOUNT}(?:\s*(?:-|–|—|to)\s*(?:\$|usd|eur|€|gbp|£)?\s*${AMOUNT})?`,
  'i',
);
const HOURLY_PATTERN = /per\s+hour|\/\s*h(?:ou)?r\b|hourly/i;

function currencyCode(symbol: string): string {
  switch (symbol.toLowerCase()) {
    case '€':
    case 'eur':
      return 'EUR';
    case '£':
    case 'gbp':
      return 'GBP';
    default:
      return 'USD';
  }
}

function parseAmount(digits: string, thousands: string | undefined): number {
  const value = Number.parseFloat(digits.replace(/,/g, ''));
  return thousands ? value * 1000 : value;
}

/**
 * Extract a salary range ("$150k–180k", "$150,000 - $180,000", "$45/hr", "USD 120000 to 140000").
 * Returns null when nothing salary-like is present.
 */
export function extractSalaryRange(text: string | null | undefined): SalaryRange | null {
  if (!text) return null;
  const match = SALARY_PATTERN.exec(text);
  if (!match) return null;

  const [, symbol, firstDigits, firstK, secondDigits, secondK] = match;
  let low = parseAmount(firstDigits, firstK);
  const high = secondDigits ? parseAmount(secondDigits, secondK) : low;
  // "$150–180k": the suffix on the upper bound applies to both
  if (secondK && !firstK && low < 1000) low *= 1000;
  if (!Number.isFinite(low) || !Number.isFinite(high)) return null;

  return {
    min: Math.min(low, high),
    max: Math.max(low, high),
    currency: currencyCode(symbol),
    period: HOURLY_PATTERN.test(text) ? 'HOUR' : 'YEAR',
  };
}

/**
 * Location tokens: parts split on separators, US state codes expanded,
 * city aliases resolved, remote markers collapsed to "remote". Sorted and unique.
 */
export function extractLocationTokens(text: string | null | undefined): string[] {
  if (!text) return [];
  const tokens = new Set<string>();

  for (const rawPart of text.split(/[,;|/()]|\s[-–—]\s/)) {
    const part = rawPart.trim();
    if (!part) continue;

    if (/^[A-Za-z]{2}$/.test(part)) {
      const state = US_STATES.get(part.toUpperCase());
      if (state) {
        tokens.add(state.toLowerCase());
        continue;
      }
    }

    const lower = part
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s]/gu, ' ')
      .replace(/\s+/g, ' ')
      .trim();
    if (!lower) continue;
    if (REMOTE_PATTERN.test(lower)) {
      tokens.add('remote');
      continue;
    }
    tokens.add(CITY_ALIASES.get(lower) ?? lower);
  }

  return [...tokens].sort();
}

/**
 * Normalize the comparable parts of a posting. A posting whose description normalizes
 * to nothing is marked non-comparable rather than rejected.
 */
export function normalizeSource(source: JobSource): NormalizedContent {
  const text = normalizeText(source.descriptionText);
  const title = normalizeText(source.title);

  return {
    text,
    title,
    titleTokens: tokenize(title),
    descriptionTokens: tokenize(text),
    locationTokens: extractLocationTokens(source.locationText),
    salary: extractSalaryRange(source.salaryText) ?? extractSalaryRange(source.descriptionText),
    comparable: text.length > 0,
  };
}
