/**
 * Prerequisite Parser
 * Pulls referenced course codes out of free-text prerequisite notes
 *
 * Examples:
 * - "CMPSC 121"                        -> ["CMPSC 121"] (unambiguous)
 * - "CMPSC 121 and MATH 140"           -> ["CMPSC 121", "MATH 140"] (unambiguous)
 * - "MATH 140 or MATH 140H"            -> ["MATH 140", "MATH 140H"] (alternatives)
 * - "E E 210; Concurrent: MATH 250"    -> ["E E 210", "MATH 250"]
 * - "Permission of program"            -> [] (consent clause)
 */

// Subject: 1-5 capitals, optionally followed by spaced letter groups ("A B E", "E E")
const COURSE_CODE_REGEX = /\b([A-Z]{1,5}(?: [A-Z]{1,2})*) ?(\d{1,3}[A-Z]?)\b/g;
const CONSENT_REGEX = /consent|permission|approval|equivalent/i;
const ALTERNATIVE_REGEX = /\bor\b/i;

export interface PrerequisiteResult {
  courses: string[];
  raw: string;
  hasConsentClause: boolean;
  hasAlternatives: boolean;
}

/**
 * Parse prerequisite text into referenced course codes
 */
export function parsePrerequisites(text: string): PrerequisiteResult {
  const normalized = text.replace(/\s+/g, ' ').trim();
  if (normalized === '' || normalized.toLowerCase() === 'none') {
    return { courses: [], raw: normalized, hasConsentClause: false, hasAlternatives: false };
  }

  return {
    courses: extractCourseCodes(normalized),
    raw: normalized,
    hasConsentClause: CONSENT_REGEX.test(normalized),
    hasAlternatives: ALTERNATIVE_REGEX.test(normalized),
  };
}

/**
 * Course codes are only trusted when the text is a plain list of requirements
 */
export function unambiguousPrerequisiteCodes(text: string): string[] {
  const result = parsePrerequisites(text);
  if (result.hasConsentClause || result.hasAlternatives) {
    return [];
  }
  return result.courses;
}

export function extractCourseCodes(text: string): string[] {
  const courses: string[] = [];
  for (const match of text.matchAll(COURSE_CODE_REGEX)) {
    const code = `${match[1]} ${match[2]}`;
    if (!courses.includes(code)) {
      courses.push(code);
    }
  }
  return courses;
}
