/**
 * Course Block Parser
 * Extracts raw course field-sets from a bulletin subject page
 *
 * Two markup eras are recognized:
 * - current: .courseblocktitle_bubble with .course_code / .course_codetitle / .course_credits
 * - legacy:  a single .courseblocktitle header ("CMPSC 121: Title (3 credits)")
 */

import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { ParseError } from '../errors.js';
import type { RawCourseFields } from '../types.js';

// First match wins; a page with none of these has an unknown layout
const CONTAINER_SELECTORS = ['div.sc_sccoursedescs', '#courseinventorycontainer'] as const;
// Wraps every bulletin page, so it only counts when it holds course blocks
const PAGE_WRAPPER = '#textcontainer';

const PREREQUISITE_LABEL = /^(?:enforced\s+)?prerequisites?(?:\s+at\s+enrollment)?\s*:?\s*/i;
const COREQUISITE_LABEL = /^(?:enforced\s+)?(?:corequisites?|concurrent)\b/i;
const CROSS_LIST_LABEL = /^cross[-\s]?list(?:ed|ing)?(?:\s+courses?)?(?:\s+with)?\s*:?\s*/i;

type TextField = 'header' | 'code' | 'title' | 'creditText' | 'description' | 'prerequisiteText' | 'crossListText';

/**
 * Parse a subject page into one raw field-set per course block
 */
export function parseCoursePage(html: string, sourceUrl: string): RawCourseFields[] {
  const $ = cheerio.load(html);
  const container = findContainer($);

  if (!container) {
    throw new ParseError(sourceUrl, `No course container found on ${sourceUrl} (layout changed?)`);
  }

  const courses: RawCourseFields[] = [];
  container.find('div.courseblock').each((_, el) => {
    courses.push(extractCourseBlock($, $(el), sourceUrl));
  });

  return courses;
}

function findContainer($: CheerioAPI): Cheerio<Element> | null {
  for (const selector of CONTAINER_SELECTORS) {
    const match = $(selector).first();
    if (match.length > 0) return match;
  }

  const wrapper = $(PAGE_WRAPPER).first();
  return wrapper.find('div.courseblock').length > 0 ? wrapper : null;
}

function extractCourseBlock($: CheerioAPI, block: Cheerio<Element>, sourceUrl: string): RawCourseFields {
  const fields: RawCourseFields = { attributes: [], sourceUrl };

  const bubble = block.find('.courseblocktitle_bubble').first();
  if (bubble.length > 0) {
    const codeEl = bubble.find('.course_code').first();
    const spans = codeEl.find('span');
    // Subject and number live in separate spans
    const code = spans.length > 0
      ? spans.map((_, span) => $(span).text().trim()).get().join(' ')
      : codeEl.text();

    setText(fields, 'code', code);
    setText(fields, 'title', bubble.find('.course_codetitle').first().text());
    setText(fields, 'creditText', bubble.find('.course_credits').first().text());
  } else {
    setText(fields, 'header', block.find('.courseblocktitle').first().text());
    setText(fields, 'creditText', block.find('.credits, .coursecredits').first().text());
  }

  const desc = block.find('.courseblockdesc').first();
  const descParagraph = desc.find('p').first();
  setText(fields, 'description', descParagraph.length > 0 ? descParagraph.text() : desc.text());

  const prerequisites: string[] = [];
  block.find('p.courseblockextra, .courseblockextra p').each((_, el) => {
    const text = $(el).text().replace(/\s+/g, ' ').trim();
    if (!text || /objective/i.test(text)) return;

    if (PREREQUISITE_LABEL.test(text)) {
      prerequisites.push(text.replace(PREREQUISITE_LABEL, ''));
    } else if (COREQUISITE_LABEL.test(text)) {
      prerequisites.push(text);
    } else if (CROSS_LIST_LABEL.test(text)) {
      setText(fields, 'crossListText', text.replace(CROSS_LIST_LABEL, ''));
    } else {
      fields.attributes.push(text);
    }
  });
  setText(fields, 'prerequisiteText', prerequisites.filter(p => p.length > 0).join('; '));

  return fields;
}

function setText(fields: RawCourseFields, key: TextField, text: string): void {
  const trimmed = text.trim();
  if (trimmed.length > 0) {
    fields[key] = trimmed;
  }
}
