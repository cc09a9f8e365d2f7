/**
 * News Reader — Text Helpers
 *
 * HTML stripping and whitespace normalization shared by the
 * normalizer, the HTML adapter and the extractor.
 */

import * as cheerio from 'cheerio';

const BLOCK_BOUNDARY = /<\/(?:p|div|li|ul|ol|h[1-6]|tr|td|th|blockquote|section|article|figcaption)>|<br\s*\/?>/gi;

/**
 * Collapse runs of whitespace into single spaces and trim.
 */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Strip markup, decode entities and collapse whitespace.
 * Block boundaries become spaces so adjacent paragraphs don't fuse.
 */
export function cleanText(input: string): string {
  if (!/[<&]/.test(input)) {
    return collapseWhitespace(input);
  }

  const $ = cheerio.load(input.replace(BLOCK_BOUNDARY, '$& '));
  $('script, style, noscript').remove();
  return collapseWhitespace($.root().text());
}

/**
 * Cut text to at most `max` characters, marking the cut with an ellipsis.
 */
export function truncate(text: string, max: number): string {
  if (text.length <= max) return text;
  return `${text.slice(0, Math.max(0, max - 1)).trimEnd()}…`;
}
