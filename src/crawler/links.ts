/**
 * HTML link extraction
 */

import * as cheerio from 'cheerio';
import { resolveLink } from '../utils/url.js';

/**
 * Extract absolute URLs from <a href> in document order
 * Skips mailto:, tel:, javascript: and data: links; duplicates keep their first position
 */
export function extractLinks(html: string, pageUrl: string): string[] {
  const $ = cheerio.load(html);
  const links = new Set<string>();

  $('a[href]').each((_, el) => {
    const href = $(el).attr('href') ?? '';
    const resolved = resolveLink(href, pageUrl);
    if (resolved) links.add(resolved);
  });

  return Array.from(links);
}
