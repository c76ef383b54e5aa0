/**
 * Bulletin index parsers
 * Category list (undergraduate, graduate, ...) and per-category A-Z subject list
 */

import * as cheerio from 'cheerio';
import { ParseError } from '../errors.js';

/**
 * Category links from the course-descriptions landing page
 */
export function parseCategoryLinks(html: string, baseUrl: string): string[] {
  const $ = cheerio.load(html);
  const list = $('ul[id="/university-course-descriptions/"]').first();
  if (list.length === 0) {
    throw new ParseError(baseUrl, 'Category list not found on bulletin index');
  }

  const hrefs = list.find('li a').map((_, a) => $(a).attr('href') ?? '').get();
  return resolveLinks(hrefs, baseUrl);
}

/**
 * Subject page links from a category's A-Z sitemap
 */
export function parseSubjectLinks(html: string, pageUrl: string): string[] {
  const $ = cheerio.load(html);
  const sitemap = $('div.az_sitemap').first();
  if (sitemap.length === 0) {
    throw new ParseError(pageUrl, `A-Z subject list not found on ${pageUrl}`);
  }

  const hrefs = sitemap.find('ul li a').map((_, a) => $(a).attr('href') ?? '').get();
  return resolveLinks(hrefs, pageUrl);
}

function resolveLinks(hrefs: string[], base: string): string[] {
  const links = new Set<string>();
  for (const href of hrefs) {
    const trimmed = href.trim();
    // "#A", "#B" jump links in the A-Z header
    if (!trimmed || trimmed.startsWith('#')) continue;
    try {
      links.add(new URL(trimmed, base).toString());
    } catch {
      continue;
    }
  }
  return [...links];
}
