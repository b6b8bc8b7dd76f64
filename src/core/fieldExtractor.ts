/**
 * fieldExtractor.ts — Pull integers and short labels out of router pages.
 *
 * The router's pages are loosely structured HTML.  Numeric fields are
 * located textually: an optional anchor selects the lines to search, a unit
 * suffix delimits the number, and an occurrence index picks among several
 * matches.  A missing field is `null`, never 0; defaults belong to the
 * reporters.
 */

import * as cheerio from 'cheerio';
import type { FieldSpec } from './types';

// ── Patterns ───────────────────────────────────────────────

const DEGREE_ALTERNATIVES = '(?:°|&deg;|&#176;)';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build the `<digits><unit>` pattern.  Whitespace (or `&nbsp;`) may sit
 * between the number and its unit, so " dB" and "dB" behave the same.
 */
function valuePattern(unit: string): RegExp {
  const unitSource = escapeRegExp(unit.trim())
    .split('°')
    .join(DEGREE_ALTERNATIVES);
  return new RegExp(`(-?\\d+)(?:\\s|&nbsp;)*${unitSource}`, 'g');
}

// ── Public API ─────────────────────────────────────────────

/**
 * Every line containing `anchor`, in document order, joined by newlines.
 * Returns null when no line contains it.
 */
export function extractRegion(text: string, anchor: string): string | null {
  const lines = text.split(/\r?\n/).filter((line) => line.includes(anchor));
  return lines.length > 0 ? lines.join('\n') : null;
}

/**
 * Locate a numeric field.
 *
 * @example
 *   extractField('… 42 dB … 17 dB …', { anchor: null, unit: 'dB', occurrence: 2 }) // 17
 */
export function extractField(text: string, spec: FieldSpec): number | null {
  if (spec.occurrence < 1) return null;

  const region = spec.anchor === null ? text : extractRegion(text, spec.anchor);
  if (region === null) return null;

  const pattern = valuePattern(spec.unit);
  let seen = 0;
  for (const match of region.matchAll(pattern)) {
    seen += 1;
    if (seen === spec.occurrence) {
      return parseInt(match[1], 10);
    }
  }
  return null;
}

/**
 * Trimmed text of the first `<span>` whose id or class is `anchor`, or null
 * when the page has no such span.
 */
export function extractElementText(html: string, anchor: string): string | null {
  const $ = cheerio.load(html);
  const span = $('span')
    .filter((_, el) => $(el).attr('id') === anchor || $(el).hasClass(anchor))
    .first();

  if (span.length === 0) return null;
  return span.text().trim();
}
