// ─── Platforms ───

export const PLATFORMS = [
  'twitter',
  'linkedin',
  'facebook',
  'instagram',
  'reddit',
  'tiktok',
  'newsletter',
  'blog',
] as const;

export type Platform = (typeof PLATFORMS)[number];

/** Profile used when the caller names no platform */
export type PlatformKey = Platform | 'general';

/** Platforms the social post generator writes for */
export const SOCIAL_PLATFORMS = ['linkedin', 'twitter', 'facebook', 'reddit', 'instagram'] as const;

export type SocialPlatform = (typeof SOCIAL_PLATFORMS)[number];

// ─── Virality ───

export interface ScoreResult {
  hookScore: number; // 0-100
  structureScore: number; // 0-100
  nicheScore: number; // 0-100
  overallScore: number; // 0-100, weighted mean of the three
  predictedEngagement: number; // >= 0
  recommendations: string[];
}

export interface RewriteResult {
  originalText: string;
  rewrittenText: string;
  originalScore: number;
  improvedScore: number;
  improvements: string[];
}

// ─── Content Generation ───

export const GENERATION_TASKS = [
  'blog',
  'outline',
  'newsletter_section',
  'social_post',
  'campaign_step',
  'hooks',
  'expand',
  'shorten',
  'rewrite',
] as const;

export type GenerationTask = (typeof GENERATION_TASKS)[number];

export interface GenerationParams {
  task: GenerationTask;
  variables: Record<string, string | number>;
  temperature?: number;
  maxTokens?: number;
}

/** Text generation capability injected into services.
 * Real providers use the prompt; the template generator renders from task + variables. */
export interface ContentGenerator {
  readonly name: string;
  generate(prompt: string, params: GenerationParams): Promise<string>;
}

export interface StyleProfile {
  tone?: string;
  voice?: string;
  length?: string;
}

export interface BlogPost {
  title: string;
  content: string;
  wordCount: number;
  metadata: {
    style: StyleProfile;
    generatedBy: string;
  };
}

export interface Outline {
  topic: string;
  sections: string[];
}

export interface NewsletterSection {
  heading: string;
  content: string;
}

export interface Newsletter {
  subject: string;
  previewText: string;
  sections: NewsletterSection[];
  cta: string;
  wordCount: number;
}

export interface SocialPost {
  platform: SocialPlatform;
  content: string;
  characterCount: number;
  hashtags: string[];
}

export interface CampaignStep {
  stepNumber: number;
  subject: string;
  content: string;
  delayDays: number;
}

export interface Campaign {
  goal: string;
  audience: string | null;
  steps: CampaignStep[];
  totalDurationDays: number;
}

export interface ExpandResult {
  originalLength: number;
  expandedLength: number;
  content: string;
}

export interface ShortenResult {
  originalLength: number;
  shortenedLength: number;
  content: string;
}

export interface ContentRewrite {
  original: string;
  rewritten: string;
}
