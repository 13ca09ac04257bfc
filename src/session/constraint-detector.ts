/**
 * Best-effort dietary and allergy annotator.
 *
 * Runs on every inbound message; matches are appended to the session constraints.
 * Missing a phrasing is expected, a false positive only adds a harmless constraint.
 */

interface ConstraintPattern {
  pattern: RegExp;
  format: (match: RegExpMatchArray) => string;
}

const WORD = '([\\p{L}\\p{N}_]+)';

const group = (match: RegExpMatchArray, index = 1): string => (match[index] ?? '').trim();

const CONSTRAINT_PATTERNS: ConstraintPattern[] = [
  { pattern: /حساسية.*من (.+)/iu, format: (m) => `حساسية من ${group(m)}` },
  { pattern: /(نباتي|vegan)/iu, format: () => 'نظام غذائي: نباتي' },
  { pattern: /بدون (.+) في كل/iu, format: (m) => `قيد عام: بدون ${group(m)}` },
  { pattern: /(حلال فقط|halal only)/iu, format: () => 'حلال فقط' },
];

/** Matched text is kept verbatim after the label */
const SAFETY_PATTERNS: Array<{ pattern: RegExp; label: string }> = [
  { pattern: new RegExp(`حساسية\\s+(?:من\\s+)?${WORD}`, 'iu'), label: 'حساسية' },
  { pattern: /عندي\s+حساسية/iu, label: 'حساسية' },
  { pattern: new RegExp(`ما\\s*(?:أ|ا)كل\\s+${WORD}`, 'iu'), label: 'لا يأكل' },
  { pattern: new RegExp(`بدون\\s+${WORD}`, 'iu'), label: 'بدون' },
];

/**
 * Constraints mentioned in a message, in detection order, without duplicates.
 */
export function detectConstraints(message: string): string[] {
  const found: string[] = [];
  const push = (constraint: string) => {
    if (!found.includes(constraint)) {
      found.push(constraint);
    }
  };

  for (const { pattern, format } of CONSTRAINT_PATTERNS) {
    const match = message.match(pattern);
    if (match) {
      push(format(match));
    }
  }

  for (const { pattern, label } of SAFETY_PATTERNS) {
    const match = message.match(pattern);
    if (match) {
      push(`${label}: ${match[0].trim()}`);
    }
  }

  return found;
}
