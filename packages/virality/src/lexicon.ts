import { z } from 'zod';
import lexiconData from '../data/lexicon.json' with { type: 'json' };

/** Word lists behind the hook, structure and niche heuristics (data/lexicon.json). */

const wordList = z.array(z.string().min(1).transform((w) => w.toLowerCase())).min(1);

const lexiconSchema = z.object({
  arousalWords: wordList,
  weakOpeners: wordList,
  callToActionPhrases: wordList,
  fillerPhrases: wordList,
  removableFillers: wordList,
});

export type Lexicon = z.infer<typeof lexiconSchema>;

let cachedLexicon: Lexicon | null = null;

export function loadLexicon(): Lexicon {
  if (cachedLexicon) return cachedLexicon;
  cachedLexicon = lexiconSchema.parse(lexiconData);
  return cachedLexicon;
}

/** Case-insensitive whole-phrase matcher; a trailing plural "s" also matches. */
export function phraseRegex(phrases: readonly string[], flags = 'gi'): RegExp {
  const alternatives = [...phrases]
    .sort((a, b) => b.length - a.length)
    .map((p) => p.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/\s+/g, '\\s+'));
  return new RegExp(`\\b(?:${alternatives.join('|')})s?\\b`, flags);
}
