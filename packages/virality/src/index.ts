export { ViralityService } from './service.js';
export { scoreText, scoreFeatures, recommend, predictEngagement, MAX_RECOMMENDATIONS } from './scorer.js';
export type { SubScores } from './scorer.js';
export { rewriteText, traceRewrite, describeImprovements, REWRITE_STEPS } from './rewriter.js';
export type { RewriteTrace, RewriteStep, RewriteContext } from './rewriter.js';
export { PLATFORM_PROFILES, resolvePlatform } from './platforms.js';
export type { PlatformProfile, RewriteStepName } from './platforms.js';
export { extractFeatures, splitSentences, extractWords } from './features.js';
export type { TextFeatures } from './features.js';
export { loadLexicon } from './lexicon.js';
