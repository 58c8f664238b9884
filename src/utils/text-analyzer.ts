import { escapeRegExp, upperFirst } from 'lodash';
import stopWordList from './stop-words.json';

export const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

const WORD_CHARACTER = /[\p{L}\p{N}]/u;
const EDGE_PUNCTUATION = /^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu;

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Whitespace-separated tokens holding at least one letter or digit. */
export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => WORD_CHARACTER.test(token)).length;
}

/**
 * Case-insensitive matcher for a keyword phrase. Words inside the phrase may be
 * separated by any run of whitespace, and a match must not touch another letter
 * or digit on either side.
 */
export function keywordPattern(keyword: string): RegExp {
  const body = normalizeWhitespace(keyword)
    .split(' ')
    .map((word) => escapeRegExp(word))
    .join('\\s+');
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}(?![\\p{L}\\p{N}])`, 'giu');
}

export function countKeywordOccurrences(text: string, keyword: string): number {
  if (!normalizeWhitespace(keyword)) return 0;
  return (text.match(keywordPattern(keyword)) ?? []).length;
}

export function containsKeyword(text: string, keyword: string): boolean {
  return countKeywordOccurrences(text, keyword) > 0;
}

/** Percentage of words taken up by the keyword: occurrences × keyword words ÷ total words × 100. */
export function calculateKeywordDensity(text: string, keyword: string): number {
  const totalWords = countWords(text);
  if (totalWords === 0) return 0;
  const occurrences = countKeywordOccurrences(text, keyword);
  return ((occurrences * countWords(keyword)) / totalWords) * 100;
}

export function roundDensity(density: number): number {
  return Math.round(density * 100) / 100;
}

export function splitSentences(text: string): string[] {
  return normalizeWhitespace(text)
    .split(/(?<=[.!?])\s+/)
    .map((sentence) => sentence.trim())
    .filter(Boolean);
}

export function stripTerminalPunctuation(sentence: string): string {
  return sentence.replace(/[\s.!?,;:]+$/, '');
}

function isStopWord(word: string): boolean {
  return STOP_WORDS.has(word.toLowerCase());
}

export function toTitleCase(phrase: string): string {
  return normalizeWhitespace(phrase)
    .split(' ')
    .map((word, index) =>
      index > 0 && isStopWord(word) ? word.toLowerCase() : upperFirst(word),
    )
    .join(' ');
}

/**
 * Short heading-style phrase from the leading words of a sentence. Stop words
 * are trimmed from both ends; returns null when fewer than two significant
 * words remain.
 */
export function extractTopic(sentence: string, maxWords = 5): string | null {
  const words = normalizeWhitespace(sentence)
    .split(' ')
    .map((word) => word.replace(EDGE_PUNCTUATION, ''))
    .filter(Boolean)
    .slice(0, maxWords);

  while (words.length > 0 && isStopWord(words[0])) words.shift();
  while (words.length > 0 && isStopWord(words[words.length - 1])) words.pop();

  const significant = words.filter((word) => !isStopWord(word)).length;
  return significant >= 2 ? toTitleCase(words.join(' ')) : null;
}

export function slugify(text: string): string {
  const slug = text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'article';
}
