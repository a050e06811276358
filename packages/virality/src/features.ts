import { loadLexicon, phraseRegex } from './lexicon.js';

/** Lexical features the virality scorer works from. Everything here is a pure function of the text. */

export const OPENING_LENGTH = 140;

export interface TextFeatures {
  charCount: number;
  wordCount: number;
  opening: string;
  openingHasQuestion: boolean;
  openingHasNumeral: boolean;
  openingArousalWords: string[];
  openingAddressesReader: boolean;
  openingEmojiCount: number;
  openingExclamationCount: number;
  leadSentenceWordCount: number;
  startsWithWeakOpener: boolean;
  paragraphCount: number;
  listMarkerCount: number;
  sentenceWordCounts: number[];
  hasCallToAction: boolean;
  numeralCount: number;
  namedEntities: string[];
  longWordCount: number;
  hasUnits: boolean;
  hashtagCount: number;
  fillerWords: string[];
}

const WORD_RE = /[\p{L}\p{N}][\p{L}\p{N}'’]*/gu;
const HASHTAG_RE = /(^|\s)#[\p{L}\p{N}_]+/gu;
const EMOJI_RE = /\p{Extended_Pictographic}/gu;
const BULLET_RE = /^[ \t]*[-*•][ \t]+/gm;
const ENUMERATION_RE = /(?:^|\s)\d{1,2}[.)/](?=\s|$)/g;
const NUMERAL_RE = /\d+(?:[.,]\d+)*/g;
// Lookbehind keeps a long digit run from being retried at every offset
const UNIT_RE = /(?<!\d)\d+(?:\.\d+)?\s?(?:%|percent\b|k\b|x\b|hours?\b|minutes?\b|days?\b|weeks?\b)|[$€£]\s?\d/i;
const READER_RE = /\byou(?:r|rs|'re|’re)?\b/i;

export function extractWords(text: string): string[] {
  return text.match(WORD_RE) ?? [];
}

/** Splits on sentence punctuation followed by whitespace and on line breaks.
 * Hashtags are removed first so a trailing tag line is never the closing sentence. */
export function splitSentences(text: string): string[] {
  return stripHashtags(text)
    .split(/(?<=[.!?])\s+|\n+/)
    .map((s) => s.trim())
    .filter((s) => /[\p{L}\p{N}]/u.test(s));
}

export function stripHashtags(text: string): string {
  return text.replace(HASHTAG_RE, '$1');
}

export function countHashtags(text: string): number {
  return (text.match(HASHTAG_RE) ?? []).length;
}

export function firstLine(text: string): string {
  const line = text.split('\n').find((l) => l.trim().length > 0) ?? '';
  return line.trim().slice(0, OPENING_LENGTH);
}

export function extractFeatures(text: string): TextFeatures {
  const lexicon = loadLexicon();
  const trimmed = text.trim();
  const words = extractWords(stripHashtags(trimmed));

  // ─── Opening ───

  const opening = firstLine(trimmed);
  const openingWords = extractWords(opening).map((w) => w.toLowerCase());
  const arousal = new Set(lexicon.arousalWords);
  const openingArousalWords = [...new Set(openingWords.filter((w) => arousal.has(w)))];
  const leadSentence = splitSentences(opening)[0] ?? opening;
  const firstWord = openingWords[0] ?? '';

  // ─── Structure ───

  const sentences = splitSentences(trimmed);
  const closingSentence = sentences[sentences.length - 1] ?? '';
  const paragraphCount = trimmed.split(/\n\s*\n/).filter((p) => p.trim().length > 0).length;
  const listMarkerCount =
    (trimmed.match(BULLET_RE) ?? []).length + (trimmed.match(ENUMERATION_RE) ?? []).length;

  // ─── Specificity ───

  const namedEntities = new Set<string>();
  for (const sentence of sentences) {
    for (const word of extractWords(sentence).slice(1)) {
      if (/^\p{Lu}/u.test(word) && word !== 'I' && !/^I['’]/.test(word)) {
        namedEntities.add(word);
      }
    }
  }

  const longWords = new Set(
    words.filter((w) => /^\p{L}+$/u.test(w) && w.length >= 8).map((w) => w.toLowerCase()),
  );

  const fillerWords = (trimmed.match(phraseRegex(lexicon.fillerPhrases)) ?? []).map((m) =>
    m.toLowerCase().replace(/\s+/g, ' '),
  );

  return {
    charCount: trimmed.length,
    wordCount: words.length,
    opening,
    openingHasQuestion: opening.includes('?'),
    openingHasNumeral: /\d/.test(opening),
    openingArousalWords,
    openingAddressesReader: READER_RE.test(opening),
    openingEmojiCount: (opening.match(EMOJI_RE) ?? []).length,
    openingExclamationCount: (opening.match(/!/g) ?? []).length,
    leadSentenceWordCount: extractWords(leadSentence).length,
    startsWithWeakOpener: lexicon.weakOpeners.includes(firstWord),
    paragraphCount,
    listMarkerCount,
    sentenceWordCounts: sentences.map((s) => extractWords(s).length),
    hasCallToAction: phraseRegex(lexicon.callToActionPhrases, 'i').test(closingSentence),
    numeralCount: (trimmed.match(NUMERAL_RE) ?? []).length,
    namedEntities: [...namedEntities],
    longWordCount: longWords.size,
    hasUnits: UNIT_RE.test(trimmed),
    hashtagCount: countHashtags(trimmed),
    fillerWords,
  };
}
