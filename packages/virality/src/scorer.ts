import { requireText } from '@quill/shared';
import type { ScoreResult } from '@quill/shared';
import { extractFeatures, type TextFeatures } from './features.js';
import { resolvePlatform, type PlatformProfile } from './platforms.js';

/** Heuristic virality scorer. Pure: the same text and platform always give the same result.
 * Sub-scores and the overall score are integers in [0, 100]. */

export const MAX_RECOMMENDATIONS = 3;

export interface SubScores {
  hook: number;
  structure: number;
  niche: number;
}

export function scoreText(text: string, platform?: string | null): ScoreResult {
  requireText(text);
  const profile = resolvePlatform(platform);
  return scoreFeatures(extractFeatures(text), profile);
}

export function scoreFeatures(features: TextFeatures, profile: PlatformProfile): ScoreResult {
  const scores: SubScores = {
    hook: scoreHook(features),
    structure: scoreStructure(features, profile),
    niche: scoreNiche(features, profile),
  };
  const overallScore = overall(scores, profile);

  return {
    hookScore: scores.hook,
    structureScore: scores.structure,
    nicheScore: scores.niche,
    overallScore,
    predictedEngagement: predictEngagement(overallScore, profile),
    recommendations: recommend(features, scores, profile),
  };
}

// ─── Hook ───

export function scoreHook(f: TextFeatures): number {
  let score = 20;

  if (f.openingHasQuestion) score += 20;
  if (f.openingHasNumeral) score += 15;
  score += Math.min(f.openingArousalWords.length * 10, 20);
  if (f.openingAddressesReader) score += 10;
  if (f.openingEmojiCount > 0) score += 5;
  if (f.openingExclamationCount > 0) score += 5;
  // Shouting
  if (f.openingExclamationCount > 3) score -= 10;
  if (f.leadSentenceWordCount >= 3 && f.leadSentenceWordCount <= 12) score += 10;
  if (f.startsWithWeakOpener) score -= 10;

  return clamp(score);
}

// ─── Structure ───

export function scoreStructure(f: TextFeatures, profile: PlatformProfile): number {
  let score = 20;

  if (f.paragraphCount >= 2) score += 15;

  if (f.listMarkerCount >= 2) {
    score += 20;
  } else if (f.listMarkerCount === 1) {
    score += 10;
  }

  const counts = f.sentenceWordCounts;
  if (counts.length >= 3) score += 10;

  if (counts.length > 0) {
    const mean = counts.reduce((a, b) => a + b, 0) / counts.length;
    if (mean >= 4 && mean <= 25) score += 10;

    // Some rhythm, but not wildly uneven
    if (counts.length >= 3) {
      const variance = counts.reduce((a, b) => a + (b - mean) ** 2, 0) / counts.length;
      const stdDev = Math.sqrt(variance);
      if (stdDev >= 2 && stdDev <= 12) score += 10;
    }
  }

  if (f.hasCallToAction) score += 15;

  const { min, max } = profile.idealLength;
  if (f.charCount >= min && f.charCount <= max) {
    score += 10;
  } else if (f.charCount > max * 1.5) {
    score -= 10;
  }

  return clamp(score);
}

// ─── Niche ───

export function scoreNiche(f: TextFeatures, profile: PlatformProfile): number {
  let score = 20;

  score += Math.min(f.numeralCount * 8, 24);
  score += Math.min(f.namedEntities.length * 6, 18);
  score += Math.min(f.longWordCount * 3, 15);
  if (f.hasUnits) score += 10;

  if (f.hashtagCount > profile.maxHashtags) {
    score -= 8;
  } else if (f.hashtagCount > 0) {
    score += 8;
  }

  score -= Math.min(f.fillerWords.length * 6, 24);

  return clamp(score);
}

// ─── Aggregates ───

export function overall(scores: SubScores, profile: PlatformProfile): number {
  const { hook, structure, niche } = profile.weights;
  return clamp(Math.round((hook * scores.hook + structure * scores.structure + niche * scores.niche) / 100));
}

/** Calibrated curve: zero at 0, the platform's base engagement at 100, convex in between. */
export function predictEngagement(overallScore: number, profile: PlatformProfile): number {
  const ratio = clamp(overallScore) / 100;
  return Math.round(profile.baseEngagement * ratio ** 1.5 * 100) / 100;
}

// ─── Recommendations ───

interface RecommendationRule {
  id: string;
  applies(f: TextFeatures, s: SubScores, p: PlatformProfile): boolean;
  message(f: TextFeatures, s: SubScores, p: PlatformProfile): string;
}

/** Evaluated in this order; the first MAX_RECOMMENDATIONS that fire are returned. */
export const RECOMMENDATION_RULES: readonly RecommendationRule[] = [
  {
    id: 'hook',
    applies: (_f, s) => s.hook < 70,
    message: () => 'Strengthen the opening hook: lead with a question or a concrete number',
  },
  {
    id: 'structure',
    applies: (_f, s) => s.structure < 60,
    message: () => 'Break the text into short paragraphs or a numbered list',
  },
  {
    id: 'cta',
    applies: (f, s) => s.structure < 80 && !f.hasCallToAction,
    message: () => 'End with a clear call-to-action that invites a reply',
  },
  {
    id: 'niche',
    applies: (_f, s) => s.niche < 60,
    message: () => 'Add concrete numbers, names or examples to make it specific',
  },
  {
    id: 'length',
    applies: (f, _s, p) => f.charCount < p.idealLength.min || f.charCount > p.idealLength.max,
    message: (f, _s, p) =>
      f.charCount > p.idealLength.max
        ? `Trim to under ${p.idealLength.max} characters for ${p.label}`
        : `Expand toward ${p.idealLength.min}+ characters for ${p.label}`,
  },
  {
    id: 'filler',
    applies: (f, s) => f.fillerWords.length > 0 && s.niche < 80,
    message: (f) => `Cut filler words such as "${f.fillerWords[0]}"`,
  },
  {
    id: 'hashtags',
    applies: (f, _s, p) => f.hashtagCount > p.maxHashtags,
    message: (_f, _s, p) =>
      p.maxHashtags === 0 ? `Drop hashtags for ${p.label}` : `Use at most ${p.maxHashtags} hashtags on ${p.label}`,
  },
];

export function recommend(f: TextFeatures, s: SubScores, p: PlatformProfile): string[] {
  return RECOMMENDATION_RULES.filter((rule) => rule.applies(f, s, p))
    .slice(0, MAX_RECOMMENDATIONS)
    .map((rule) => rule.message(f, s, p));
}

function clamp(value: number): number {
  return Math.max(0, Math.min(100, value));
}
