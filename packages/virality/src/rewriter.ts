import { pickBySeed, requireText } from '@quill/shared';
import type { PlatformKey, RewriteResult, ScoreResult } from '@quill/shared';
import { extractFeatures, extractWords, splitSentences, countHashtags, stripHashtags } from './features.js';
import { loadLexicon, phraseRegex } from './lexicon.js';
import { resolvePlatform, type PlatformProfile, type RewriteStepName } from './platforms.js';
import { scoreText } from './scorer.js';

/** Score-guided rewriter. Each strategy step is a pure text transform; a step is kept only
 * when the overall score does not drop, so the result never scores below the input. */

export interface RewriteContext {
  profile: PlatformProfile;
  /** Original input; keys every template choice so output is reproducible */
  seed: string;
}

export type RewriteStep = (text: string, ctx: RewriteContext) => string;

export interface RewriteTrace extends RewriteResult {
  platform: PlatformKey;
  appliedSteps: RewriteStepName[];
  before: ScoreResult;
  after: ScoreResult;
}

// ─── Templates ───

export const HOOK_LINES = [
  'Why is nobody talking about this?',
  'What if everything you know about this is wrong?',
  'Are you making this mistake too?',
  'Want the truth about what changed my mind?',
  'Ever wondered why this works so well?',
] as const;

const CTA_LINES: Record<PlatformKey, readonly [string, ...string[]]> = {
  general: ['What do you think? Let me know in the comments.', 'Share this with someone who needs it.'],
  twitter: ['Reply with your take.', 'Follow for more like this.', 'Share this with someone who needs it.'],
  linkedin: [
    'What do you think? Share your experience in the comments.',
    'Follow for more insights like this.',
    'Let me know in the comments how you approach this.',
  ],
  facebook: ['What do you think? Let me know in the comments.', 'Share this with a friend who needs it.'],
  instagram: ['Save this for later and share it with a friend.', 'Follow for more like this.'],
  reddit: ['Curious what others think. Reply with your experience.', 'Let me know what I missed in the comments.'],
  tiktok: ['Follow for part two.', 'Comment your take below.'],
  newsletter: ['Reply to this email and tell me what you think.', 'Share this issue with a colleague who would enjoy it.'],
  blog: ['Subscribe for more posts like this.', 'Share this post with someone who needs it.'],
};

// ─── Steps ───

const URL_RE = /\b(?:https?:\/\/|www\.)\S+/gi;
const URL_SLOT_RE = /\uE000(\d+)\uE000/g;

/** URLs are swapped for placeholders while filler is cut, then put back unchanged. */
const tightenFiller: RewriteStep = (text) => {
  const urls: string[] = [];
  const masked = text.replace(URL_RE, (url) => `\uE000${urls.push(url) - 1}\uE000`);
  const fillers = phraseRegex(loadLexicon().removableFillers);
  return masked
    .replace(fillers, '')
    .replace(/[ \t]{2,}/g, ' ')
    .replace(/[ \t]+([,.!?;:])/g, '$1')
    .replace(/^[ \t]+/gm, '')
    .replace(/(^|[.!?]\s+)(\p{Ll})/gu, (_m, lead: string, ch: string) => lead + ch.toUpperCase())
    .replace(URL_SLOT_RE, (_m, index: string) => urls[Number(index)] ?? '');
};

const trimToLength: RewriteStep = (text, { profile }) => {
  const { max } = profile.idealLength;
  const trimmed = text.trim();
  if (trimmed.length <= max) return text;

  const sentences = splitSentences(trimmed);
  let kept = '';
  for (const sentence of sentences) {
    const next = kept ? `${kept} ${sentence}` : sentence;
    if (next.length > max) break;
    kept = next;
  }
  if (kept) return kept;

  // A single sentence longer than the limit
  const words = trimmed.split(/\s+/);
  let cut = '';
  for (const word of words) {
    const next = cut ? `${cut} ${word}` : word;
    if (next.length > max - 1) break;
    cut = next;
  }
  return `${cut}…`;
};

const addHook: RewriteStep = (text, { seed }) => {
  const features = extractFeatures(text);
  if (features.openingHasQuestion) return text;
  return `${pickBySeed(HOOK_LINES, seed)}\n\n${text.trim()}`;
};

const breakIntoParagraphs: RewriteStep = (text) => {
  const trimmed = text.trim();
  if (trimmed.includes('\n')) return text;
  const sentences = splitSentences(trimmed);
  if (sentences.length < 3) return text;

  const paragraphs: string[] = [];
  for (let i = 0; i < sentences.length; i += 2) {
    paragraphs.push(sentences.slice(i, i + 2).join(' '));
  }
  return paragraphs.join('\n\n');
};

const addCallToAction: RewriteStep = (text, { profile, seed }) => {
  if (extractFeatures(text).hasCallToAction) return text;
  return `${text.trim()}\n\n${pickBySeed(CTA_LINES[profile.key], seed)}`;
};

/** Tags drawn from the longest non-filler words of the original input */
const addHashtags: RewriteStep = (text, { profile, seed }) => {
  if (profile.maxHashtags === 0 || countHashtags(text) > 0) return text;

  const filler = new Set(loadLexicon().fillerPhrases);
  const candidates = [...new Set(extractWords(seed).map((w) => w.toLowerCase()))]
    .filter((w) => /^\p{L}+$/u.test(w) && w.length >= 5 && !filler.has(w))
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .slice(0, Math.min(2, profile.maxHashtags));
  if (candidates.length === 0) return text;

  return `${text.trim()}\n\n${candidates.map((w) => `#${w}`).join(' ')}`;
};

export const REWRITE_STEPS: Record<RewriteStepName, RewriteStep> = {
  tightenFiller,
  trimToLength,
  addHook,
  breakIntoParagraphs,
  addCallToAction,
  addHashtags,
};

const SUB_SCORE_LABELS = [
  ['hookScore', 'Hook strength'],
  ['structureScore', 'Structure'],
  ['nicheScore', 'Niche specificity'],
] as const;

// ─── Engine ───

export function rewriteText(text: string, platform?: string | null): RewriteResult {
  const { originalText, rewrittenText, originalScore, improvedScore, improvements } = traceRewrite(
    text,
    platform,
  );
  return { originalText, rewrittenText, originalScore, improvedScore, improvements };
}

/** Same as rewriteText, with the steps that were kept and both full score results. */
export function traceRewrite(text: string, platform?: string | null): RewriteTrace {
  requireText(text);
  const profile = resolvePlatform(platform);
  const ctx: RewriteContext = { profile, seed: text };

  const before = scoreText(text, profile.key);
  let current = text;
  let currentScore = before;
  const appliedSteps: RewriteStepName[] = [];

  for (const name of profile.strategy) {
    const candidate = REWRITE_STEPS[name](current, ctx);
    if (candidate === current || !keepsAuthorWords(candidate, current)) continue;

    const candidateScore = scoreText(candidate, profile.key);
    if (candidateScore.overallScore >= currentScore.overallScore) {
      current = candidate;
      currentScore = candidateScore;
      appliedSteps.push(name);
    }
  }

  return {
    originalText: text,
    rewrittenText: current,
    originalScore: before.overallScore,
    improvedScore: currentScore.overallScore,
    improvements: describeImprovements(before, currentScore),
    platform: profile.key,
    appliedSteps,
    before,
    after: currentScore,
  };
}

/** A step may drop words, but never every word the text had going in. */
function keepsAuthorWords(candidate: string, current: string): boolean {
  const kept = new Set(extractWords(stripHashtags(candidate)).map((w) => w.toLowerCase()));
  const words = extractWords(stripHashtags(current));
  return words.length === 0 || words.some((w) => kept.has(w.toLowerCase()));
}

export function describeImprovements(before: ScoreResult, after: ScoreResult): string[] {
  const improvements: string[] = [];
  for (const [field, label] of SUB_SCORE_LABELS) {
    const delta = after[field] - before[field];
    if (delta > 0) {
      improvements.push(`${label} +${delta} (${before[field]} → ${after[field]})`);
    }
  }
  return improvements;
}
