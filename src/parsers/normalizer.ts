/**
 * Course Normalizer
 * Turns a raw field-set into a canonical CourseRecord
 *
 * Hard failures (record skipped): no subject, no course number, no title.
 * Soft failures (record kept, warning recorded): unparseable or reversed credits.
 */

import { ValidationError } from '../errors.js';
import type { CourseRecord, RawCourseFields } from '../types.js';
import { formatCredits, parseCredits } from './creditParser.js';
import { extractCourseCodes, unambiguousPrerequisiteCodes } from './prerequisiteParser.js';

export type NormalizeResult =
  | { ok: true; record: CourseRecord; warnings: string[] }
  | { ok: false; error: ValidationError };

// "CMPSC 121", "A B E 100", "MATH 140H", "ENGL 15S"
const CODE_PATTERN = /^([A-Z][A-Z&]*(?: [A-Z&]+)*) (\d{1,4}[A-Z]{0,3})$/;
// "CMPSC 121: Title", "CMPSC 121 — Title", "A B E 100. Title"
const HEADER_PATTERN = /^([A-Z][A-Z&]*(?: [A-Z&]+)*) (\d{1,4}[A-Z]{0,3})\b\s*(?:[:.–—-]\s*)?(.*)$/;
// Legacy headers carry credits at the end: "Title (3 credits)"
const TRAILING_CREDITS = /\s*\(([^()]*\bcredits?\b[^()]*)\)\s*$/i;

/**
 * Trim and collapse whitespace (including non-breaking spaces)
 */
export function cleanText(text: string | undefined): string {
  return (text ?? '').replace(/\s+/g, ' ').trim();
}

interface CourseIdentity {
  subjectCode: string;
  courseNumber: string;
  title: string;
  creditText: string | undefined;
}

function resolveIdentity(raw: RawCourseFields): CourseIdentity | ValidationError {
  const code = cleanText(raw.code).toUpperCase();

  if (code) {
    const match = code.match(CODE_PATTERN);
    if (!match) {
      return new ValidationError('courseNumber', `Unrecognized course code "${code}"`);
    }
    return {
      subjectCode: match[1],
      courseNumber: match[2],
      title: cleanText(raw.title),
      creditText: raw.creditText,
    };
  }

  const header = cleanText(raw.header);
  if (!header) {
    return new ValidationError('subjectCode', 'Missing course code');
  }

  const match = header.match(HEADER_PATTERN);
  if (!match) {
    return new ValidationError('subjectCode', `Unrecognized course header "${header}"`);
  }

  let title = match[3];
  let creditText = raw.creditText;
  const credits = title.match(TRAILING_CREDITS);
  if (credits) {
    title = title.slice(0, credits.index).trim();
    creditText = creditText ?? credits[1];
  }

  return {
    subjectCode: match[1],
    courseNumber: match[2],
    title: cleanText(title) || cleanText(raw.title),
    creditText,
  };
}

/**
 * Normalize one raw field-set; observedAt becomes the record's lastSeenAt
 */
export function normalizeCourse(raw: RawCourseFields, observedAt: string): NormalizeResult {
  const identity = resolveIdentity(raw);
  if (identity instanceof ValidationError) {
    return { ok: false, error: identity };
  }

  const { subjectCode, courseNumber, title } = identity;
  if (!title) {
    return {
      ok: false,
      error: new ValidationError('title', `Missing title for ${subjectCode} ${courseNumber}`),
    };
  }

  const warnings: string[] = [];
  let description = cleanText(raw.description);

  const credits = parseCredits(identity.creditText);
  if (credits.warning) {
    warnings.push(credits.warning);
  }
  if (!credits.parsed) {
    const rawCredits = cleanText(identity.creditText);
    if (rawCredits) {
      description = description ? `${description} Credits: ${rawCredits}` : `Credits: ${rawCredits}`;
    }
  }

  const prerequisites = cleanText(raw.prerequisiteText);

  return {
    ok: true,
    warnings,
    record: {
      subjectCode,
      courseNumber,
      title,
      description,
      credits: credits.credits,
      prerequisites,
      prerequisiteCodes: unambiguousPrerequisiteCodes(prerequisites),
      crossListings: extractCourseCodes(cleanText(raw.crossListText)),
      attributes: raw.attributes.map(cleanText).filter(a => a.length > 0),
      sourceUrl: cleanText(raw.sourceUrl),
      lastSeenAt: observedAt,
    },
  };
}

/**
 * Render a record back into the field-set the parser would have produced
 */
export function toRawFields(record: CourseRecord): RawCourseFields {
  const fields: RawCourseFields = {
    code: `${record.subjectCode} ${record.courseNumber}`,
    title: record.title,
    creditText: formatCredits(record.credits),
    attributes: [...record.attributes],
    sourceUrl: record.sourceUrl,
  };
  if (record.description) fields.description = record.description;
  if (record.prerequisites) fields.prerequisiteText = record.prerequisites;
  if (record.crossListings.length > 0) fields.crossListText = record.crossListings.join(', ');
  return fields;
}
