import type { Entity } from '../types/job.js';

const MONTHS = 'Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|Jun(?:e)?|Jul(?:y)?|Aug(?:ust)?|Sep(?:tember)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?';

const DATE_PATTERNS: readonly RegExp[] = [
  // Jan 22 2013, January 22nd, 2013
  new RegExp(`\\b(?:${MONTHS})\\s+\\d{1,2}(?:st|nd|rd|th)?,?\\s+\\d{4}\\b`, 'gi'),
  // 01/22/2013, 22-01-2013
  /\b\d{1,2}[-/]\d{1,2}[-/]\d{2,4}\b/g,
  // 2013-01-22
  /\b\d{4}-\d{2}-\d{2}\b/g,
];

const MONEY_PATTERNS: readonly RegExp[] = [
  /\$\s*(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{2})?/g,
  /\b\d+(?:\.\d+)?%/g,
];

export const DATE_CONFIDENCE = 0.9;
export const MONEY_CONFIDENCE = 0.95;

const MONTH_INDEX: Partial<Record<string, number>> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

function matchAll(text: string, patterns: readonly RegExp[]): string[] {
  const found: string[] = [];
  const seen = new Set<string>();
  for (const pattern of patterns) {
    for (const match of text.matchAll(pattern)) {
      const value = match[0];
      if (seen.has(value)) continue;
      seen.add(value);
      found.push(value);
    }
  }
  return found;
}

export function extractDates(text: string): Entity[] {
  return matchAll(text, DATE_PATTERNS).map(match => ({
    type: 'date',
    text: match,
    value: parseDate(match),
    confidence: DATE_CONFIDENCE,
  }));
}

export function extractMoney(text: string): Entity[] {
  return matchAll(text, MONEY_PATTERNS).map(match => ({
    type: 'money',
    text: match,
    value: parseAmount(match),
    confidence: MONEY_CONFIDENCE,
  }));
}

function isoDate(year: number, month: number, day: number): string | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Normalises a matched date to YYYY-MM-DD. Slashes read month first, dashes day
 * first. Two-digit years and impossible dates give null.
 */
export function parseDate(raw: string): string | null {
  const text = raw.trim();

  const named = /^([A-Za-z]+)\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})$/i.exec(text);
  if (named) {
    const month = MONTH_INDEX[named[1].slice(0, 3).toLowerCase()];
    return month === undefined ? null : isoDate(Number(named[3]), month, Number(named[2]));
  }

  const slashed = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(text);
  if (slashed) return isoDate(Number(slashed[3]), Number(slashed[1]), Number(slashed[2]));

  const dashed = /^(\d{1,2})-(\d{1,2})-(\d{4})$/.exec(text);
  if (dashed) return isoDate(Number(dashed[3]), Number(dashed[2]), Number(dashed[1]));

  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text);
  if (iso) return isoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]));

  return null;
}

export function parseAmount(raw: string): number | null {
  const cleaned = raw.replace(/[$,%\s]/g, '');
  if (!cleaned) return null;
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}
