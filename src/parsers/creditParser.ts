/**
 * Credit Parser
 *
 * Examples:
 * - "3 Credits"                   -> { min: 3, max: 3 }
 * - "1.5 Credits"                 -> { min: 1.5, max: 1.5 }
 * - "1 to 3 credits", "1-3", "1–3" -> { min: 1, max: 3 }
 * - "1-12 Credits/Maximum of 12"  -> { min: 1, max: 12 }
 * - "3 Credits/Maximum of 6"      -> { min: 3, max: 3 }
 * - "variable"                    -> unparsed, { min: 0, max: 0 }
 */

import type { CreditRange } from '../types.js';

const CREDIT_RANGE = /(\d+(?:\.\d+)?)\s*(?:-|–|—|to)\s*(\d+(?:\.\d+)?)/i;
const CREDIT_VALUE = /(\d+(?:\.\d+)?)/;

export interface CreditParseResult {
  credits: CreditRange;
  parsed: boolean;
  warning: string | null;
}

export function parseCredits(text: string | undefined): CreditParseResult {
  const raw = (text ?? '').replace(/\s+/g, ' ').trim();

  const range = raw.match(CREDIT_RANGE);
  if (range) {
    const a = parseFloat(range[1]);
    const b = parseFloat(range[2]);
    if (a > b) {
      return {
        credits: { min: b, max: a },
        parsed: true,
        warning: `Credit range "${raw}" is reversed`,
      };
    }
    return { credits: { min: a, max: b }, parsed: true, warning: null };
  }

  const single = raw.match(CREDIT_VALUE);
  if (single) {
    const value = parseFloat(single[1]);
    return { credits: { min: value, max: value }, parsed: true, warning: null };
  }

  return {
    credits: { min: 0, max: 0 },
    parsed: false,
    warning: raw ? `Unparseable credits "${raw}"` : 'Missing credits',
  };
}

/**
 * Render a credit range the way the parser reads it back
 */
export function formatCredits(credits: CreditRange): string {
  return credits.min === credits.max ? `${credits.min}` : `${credits.min}-${credits.max}`;
}
