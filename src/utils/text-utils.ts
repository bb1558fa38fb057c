/**
 * Shared text helpers for strategies and metrics.
 *
 * Word handling is Unicode-aware so the bilingual lexicons (accented Italian
 * words in particular) match the same way English ones do.
 */

const WORD_CHAR = '[\\p{L}\\p{N}_]';

/**
 * Lower-case a word and strip every character that is not a letter, digit
 * or underscore.
 */
export function normalizeWord(word: string): string {
  return word.toLowerCase().replace(/[^\p{L}\p{N}_]/gu, '');
}

/**
 * Whitespace-separated words of a text, normalized, without empties.
 */
export function normalizedWords(text: string): string[] {
  return text
    .split(/\s+/)
    .map(normalizeWord)
    .filter((word) => word.length > 0);
}

export function wordSet(text: string): Set<string> {
  return new Set(normalizedWords(text));
}

/**
 * Jaccard similarity of two sets: |A ∩ B| / |A ∪ B|, 0 when either is empty.
 */
export function jaccard<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number {
  if (a.size === 0 || b.size === 0) {
    return 0;
  }
  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) {
      intersection++;
    }
  }
  const union = a.size + b.size - intersection;
  return union > 0 ? intersection / union : 0;
}

/**
 * Word-set Jaccard similarity of two texts.
 */
export function textJaccard(a: string, b: string): number {
  return jaccard(wordSet(a), wordSet(b));
}

const NUMBERED_MARKER = /^\d+[.)]$/;

/**
 * Split text into sentences, keeping each sentence's terminal punctuation.
 * A `1.` marker at the start of a line stays with the sentence after it.
 */
export function splitSentences(text: string): string[] {
  const sentences: string[] = [];
  let marker = '';

  for (const match of text.matchAll(/[^.!?]+[.!?]*|[.!?]+/g)) {
    const raw = match[0];
    const sentence = raw.trim();
    if (sentence.length === 0) {
      continue;
    }

    const start = (match.index ?? 0) + raw.length - raw.trimStart().length;
    if (NUMBERED_MARKER.test(sentence) && /(?:^|\n)[ \t]*$/.test(text.slice(0, start))) {
      marker = marker ? `${marker} ${sentence}` : sentence;
      continue;
    }

    sentences.push(marker ? `${marker} ${sentence}` : sentence);
    marker = '';
  }

  if (marker) {
    sentences.push(marker);
  }
  return sentences;
}

/**
 * Whether a line starts a numbered or bulleted list item.
 */
export function isListItem(line: string): boolean {
  return /^[ \t]*(?:\d+[.)]|[-•*])[ \t]/.test(line);
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build a case-insensitive, global pattern that matches a word or phrase
 * only on whole-word boundaries. Inner spaces match any run of whitespace.
 */
export function wholeWordPattern(phrase: string): RegExp {
  const body = phrase
    .trim()
    .split(/\s+/)
    .map(escapeRegExp)
    .join('\\s+');
  return new RegExp(`(?<!${WORD_CHAR})${body}(?!${WORD_CHAR})`, 'giu');
}

export function countMatches(text: string, pattern: RegExp): number {
  const flags = pattern.flags.includes('g') ? pattern.flags : pattern.flags + 'g';
  const global = new RegExp(pattern.source, flags);
  return text.match(global)?.length ?? 0;
}

/**
 * Carry the capitalization of the matched text over to its replacement:
 * "Information" → "Info", "information" → "info".
 */
export function matchCase(matched: string, replacement: string): string {
  if (replacement.length === 0) {
    return replacement;
  }
  const first = matched.charAt(0);
  if (first !== first.toLowerCase() && first === first.toUpperCase()) {
    return replacement.charAt(0).toUpperCase() + replacement.slice(1);
  }
  return replacement;
}

function startsWithCapital(text: string): boolean {
  const first = text.charAt(0);
  return first !== first.toLowerCase() && first === first.toUpperCase();
}

function capitalizeFirstLetter(text: string): string {
  return text.replace(/^(\s*)(\p{Ll})/u, (_match, space: string, letter: string) =>
    space + letter.toUpperCase()
  );
}

function atSentenceStart(preceding: string): boolean {
  return preceding.trim() === '' || /(?:[.!?:]|\n)\s*$/.test(preceding);
}

/**
 * Replace every match of a global pattern, carrying the matched text's
 * leading capital over to the replacement. When a capitalized match at the
 * start of a sentence is deleted outright, the word that follows is
 * capitalized instead.
 */
export function replaceMatches(text: string, pattern: RegExp, replacement: string): string {
  if (!pattern.global) {
    throw new Error(`replaceMatches requires a global pattern: ${pattern}`);
  }

  let result = '';
  let last = 0;
  let capitalizeNext = false;

  for (const match of text.matchAll(pattern)) {
    const index = match.index ?? 0;
    let segment = text.slice(last, index);
    if (capitalizeNext && segment.trim() !== '') {
      segment = capitalizeFirstLetter(segment);
      capitalizeNext = false;
    }
    result += segment;

    if (replacement.length === 0) {
      capitalizeNext = capitalizeNext || (startsWithCapital(match[0]) && atSentenceStart(result));
    } else {
      result += matchCase(match[0], replacement);
      capitalizeNext = false;
    }
    last = index + match[0].length;
  }

  const tail = text.slice(last);
  return result + (capitalizeNext ? capitalizeFirstLetter(tail) : tail);
}

function isWhitespace(token: string): boolean {
  return /^\s/.test(token);
}

function newlineCount(separator: string): number {
  return separator.split('\n').length - 1;
}

/**
 * When a word between two separators is dropped, keep the separator that
 * carries more line breaks so paragraph structure survives.
 */
function mergeSeparators(current: string, next: string): string {
  if (current === '') {
    return next;
  }
  return newlineCount(current) >= newlineCount(next) ? current : next;
}

/**
 * Rebuild a text keeping only the words for which `keep` returns true.
 *
 * `keep` sees the full word list and the index of the word under test, so
 * it can inspect the surrounding context. Separators between kept words are
 * preserved; leading and trailing whitespace is dropped.
 */
export function filterWords(
  text: string,
  keep: (words: readonly string[], index: number) => boolean
): string {
  const tokens = text.match(/\S+|\s+/g) ?? [];
  const words = tokens.filter((token) => !isWhitespace(token));
  const kept: string[] = [];
  let separator = '';
  let index = 0;

  for (const token of tokens) {
    if (isWhitespace(token)) {
      separator = mergeSeparators(separator, token);
      continue;
    }
    if (keep(words, index)) {
      kept.push(kept.length > 0 ? separator + token : token);
      separator = '';
    }
    index++;
  }

  return kept.join('');
}

/**
 * Collapse runs of spaces and tabs. With `preserveLineBreaks` newlines are
 * kept (at most one blank line in a row); otherwise every whitespace run
 * becomes one space.
 */
export function collapseWhitespace(
  text: string,
  preserveLineBreaks: boolean
): string {
  if (!preserveLineBreaks) {
    return text.replace(/\s+/g, ' ').trim();
  }
  return text
    .replace(/[ \t\f\v]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}
