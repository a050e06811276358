import { PLATFORMS, UnsupportedPlatformError } from '@quill/shared';
import type { Platform, PlatformKey } from '@quill/shared';

/** Audience norms per publishing channel. Weights are integer percentages summing to 100. */

export type RewriteStepName =
  | 'tightenFiller'
  | 'trimToLength'
  | 'addHook'
  | 'breakIntoParagraphs'
  | 'addCallToAction'
  | 'addHashtags';

export interface PlatformProfile {
  key: PlatformKey;
  label: string;
  idealLength: { min: number; max: number }; // characters
  maxHashtags: number;
  weights: { hook: number; structure: number; niche: number };
  baseEngagement: number; // predicted engagement at overall score 100
  strategy: RewriteStepName[];
}

export const PLATFORM_PROFILES: Record<PlatformKey, PlatformProfile> = {
  general: {
    key: 'general',
    label: 'general audiences',
    idealLength: { min: 80, max: 2000 },
    maxHashtags: 3,
    weights: { hook: 40, structure: 30, niche: 30 },
    baseEngagement: 500,
    strategy: ['tightenFiller', 'addHook', 'breakIntoParagraphs', 'addCallToAction'],
  },
  twitter: {
    key: 'twitter',
    label: 'Twitter/X',
    idealLength: { min: 70, max: 280 },
    maxHashtags: 2,
    weights: { hook: 50, structure: 20, niche: 30 },
    baseEngagement: 1200,
    strategy: ['tightenFiller', 'trimToLength', 'addHook', 'addCallToAction', 'addHashtags'],
  },
  linkedin: {
    key: 'linkedin',
    label: 'LinkedIn',
    idealLength: { min: 150, max: 1300 },
    maxHashtags: 3,
    weights: { hook: 35, structure: 35, niche: 30 },
    baseEngagement: 800,
    strategy: ['tightenFiller', 'addHook', 'breakIntoParagraphs', 'addCallToAction', 'addHashtags'],
  },
  facebook: {
    key: 'facebook',
    label: 'Facebook',
    idealLength: { min: 40, max: 500 },
    maxHashtags: 2,
    weights: { hook: 40, structure: 30, niche: 30 },
    baseEngagement: 700,
    strategy: ['tightenFiller', 'trimToLength', 'addHook', 'addCallToAction'],
  },
  instagram: {
    key: 'instagram',
    label: 'Instagram',
    idealLength: { min: 100, max: 2200 },
    maxHashtags: 10,
    weights: { hook: 45, structure: 25, niche: 30 },
    baseEngagement: 1500,
    strategy: ['tightenFiller', 'addHook', 'breakIntoParagraphs', 'addCallToAction', 'addHashtags'],
  },
  reddit: {
    key: 'reddit',
    label: 'Reddit',
    idealLength: { min: 200, max: 4000 },
    maxHashtags: 0,
    weights: { hook: 30, structure: 35, niche: 35 },
    baseEngagement: 1000,
    strategy: ['tightenFiller', 'breakIntoParagraphs', 'addCallToAction'],
  },
  tiktok: {
    key: 'tiktok',
    label: 'TikTok',
    idealLength: { min: 50, max: 300 },
    maxHashtags: 5,
    weights: { hook: 55, structure: 15, niche: 30 },
    baseEngagement: 2000,
    strategy: ['tightenFiller', 'trimToLength', 'addHook', 'addCallToAction', 'addHashtags'],
  },
  newsletter: {
    key: 'newsletter',
    label: 'newsletters',
    idealLength: { min: 500, max: 5000 },
    maxHashtags: 0,
    weights: { hook: 25, structure: 45, niche: 30 },
    baseEngagement: 400,
    strategy: ['tightenFiller', 'addHook', 'breakIntoParagraphs', 'addCallToAction'],
  },
  blog: {
    key: 'blog',
    label: 'blog posts',
    idealLength: { min: 1000, max: 10_000 },
    maxHashtags: 0,
    weights: { hook: 20, structure: 45, niche: 35 },
    baseEngagement: 600,
    strategy: ['tightenFiller', 'breakIntoParagraphs', 'addCallToAction'],
  },
};

const ALIASES: Record<string, Platform> = {
  x: 'twitter',
  'twitter/x': 'twitter',
};

function isPlatform(key: string): key is Platform {
  return (PLATFORMS as readonly string[]).includes(key);
}

/** Normalizes a caller-supplied platform key. Absent or blank means the neutral profile;
 * anything unrecognised throws UnsupportedPlatformError. */
export function resolvePlatform(platform?: string | null): PlatformProfile {
  if (platform === undefined || platform === null || platform.trim() === '') {
    return PLATFORM_PROFILES.general;
  }
  const key = platform.trim().toLowerCase();
  const resolved: string = ALIASES[key] ?? key;
  if (resolved === 'general') {
    return PLATFORM_PROFILES.general;
  }
  if (!isPlatform(resolved)) {
    throw new UnsupportedPlatformError(platform);
  }
  return PLATFORM_PROFILES[resolved];
}
