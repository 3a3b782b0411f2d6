/**
 * Pulse30 — Core Subject Extraction
 *
 * Default strategy for the discussion recall retry: strips question framing,
 * qualifier words and trailing facets from a topic so the retry searches the
 * bare subject ("best Claude Code tips 2026" -> "Claude Code").
 */

export type CoreSubjectStrategy = (topic: string) => string;

const LEADING_PHRASES = [
  'what are people saying about',
  'what do people think about',
  'what is new with',
  "what's new with",
  'best practices for',
  'latest news on',
  'latest news about',
  'news about',
  'opinions on',
  'reviews of',
  'tips for',
  'how to use',
  'how to',
];

const TRAILING_PHRASES = [
  'best practices',
  'use cases',
  'news',
  'tips',
  'tricks',
  'reviews',
  'review',
  'tutorials',
  'tutorial',
  'updates',
  'prompting',
  'prompts',
  'workflows',
  'workflow',
  'examples',
];

const QUALIFIERS = new Set([
  'best',
  'latest',
  'new',
  'newest',
  'top',
  'recent',
  'good',
  'great',
]);

const YEAR = /^(19|20)\d{2}$/;

function splitWords(phrase: string): string[] {
  return phrase.split(/\s+/).filter(Boolean);
}

function startsWithPhrase(words: string[], phrase: string[]): boolean {
  if (words.length <= phrase.length) return false;
  return phrase.every((p, i) => words[i]?.toLowerCase() === p);
}

function endsWithPhrase(words: string[], phrase: string[]): boolean {
  if (words.length <= phrase.length) return false;
  const offset = words.length - phrase.length;
  return phrase.every((p, i) => words[offset + i]?.toLowerCase() === p);
}

/**
 * Reduce a topic to its core subject. Returns the trimmed topic when nothing
 * can be stripped without emptying it.
 */
export const extractCoreSubject: CoreSubjectStrategy = (topic) => {
  const original = splitWords(topic.trim().replace(/[?!.]+$/, ''));
  let words = original;

  for (const phrase of LEADING_PHRASES.map(splitWords)) {
    if (startsWithPhrase(words, phrase)) {
      words = words.slice(phrase.length);
      break;
    }
  }

  const filtered = words.filter(w => !QUALIFIERS.has(w.toLowerCase()) && !YEAR.test(w));
  if (filtered.length > 0) words = filtered;

  let changed = true;
  while (changed) {
    changed = false;
    for (const phrase of TRAILING_PHRASES.map(splitWords)) {
      if (endsWithPhrase(words, phrase)) {
        words = words.slice(0, words.length - phrase.length);
        changed = true;
      }
    }
  }

  return words.length > 0 ? words.join(' ') : topic.trim();
};
