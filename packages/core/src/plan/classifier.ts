import type { NamedFamily, TemplateFamily } from './templates';

const FAMILY_KEYWORDS: Array<[NamedFamily, string[]]> = [
  ['product', ['product', 'launch', 'app', 'software', 'platform', 'mobile']],
  ['event', ['event', 'meeting', 'conference', 'workshop', 'party', 'gathering']],
  ['learning', ['learn', 'study', 'course', 'training', 'skill', 'master']],
  // "study" also appears above, so it never reaches this family.
  ['research', ['research', 'paper', 'thesis', 'study', 'analysis', 'report']],
];

const SUBJECT_VOCABULARY = new Set([
  'python',
  'java',
  'javascript',
  'programming',
  'coding',
  'data',
  'science',
  'machine',
  'learning',
]);

export const DEFAULT_SUBJECT = 'the subject';

export interface Classification {
  family: TemplateFamily;
  /** Set for the learning family only. */
  subject: string | null;
}

/**
 * Picks the template family for a goal. Keywords match as substrings of the
 * lower-cased goal ("happy" contains "app"), and families are tried in a
 * fixed order.
 */
export function classify(goal: string): Classification {
  const lower = goal.toLowerCase();
  for (const [family, keywords] of FAMILY_KEYWORDS) {
    if (keywords.some((keyword) => lower.includes(keyword))) {
      return { family, subject: family === 'learning' ? extractSubject(goal) : null };
    }
  }
  return { family: 'generic', subject: null };
}

/**
 * First whitespace-delimited word of the goal that is exactly a known
 * subject, capitalised. Punctuation is not stripped: "Python," is no match.
 */
export function extractSubject(goal: string): string {
  for (const word of goal.split(/\s+/)) {
    if (SUBJECT_VOCABULARY.has(word.toLowerCase())) {
      return capitalize(word);
    }
  }
  return DEFAULT_SUBJECT;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}
