import { GeneratorError, requireText } from '@quill/shared';
import type {
  BlogPost,
  Campaign,
  CampaignStep,
  ContentGenerator,
  ContentRewrite,
  ExpandResult,
  GenerationParams,
  GenerationTask,
  Logger,
  Newsletter,
  NewsletterSection,
  Outline,
  ShortenResult,
  SocialPlatform,
  SocialPost,
  StyleProfile,
} from '@quill/shared';
import { buildPrompt } from './templates/prompts.js';

/** Long-form and social content built on an injected ContentGenerator.
 * The service owns the result shapes; the generator only produces text. */

export const CAMPAIGN_STEP_INTERVAL_DAYS = 3;
const NEWSLETTER_MAX_SECTIONS = 3;
const NEWSLETTER_CTA = 'Read more on our blog';

export class ContentService {
  constructor(
    private generator: ContentGenerator,
    private logger: Logger,
  ) {}

  get generatorName(): string {
    return this.generator.name;
  }

  async generateBlog(topic: string, style: StyleProfile = {}): Promise<BlogPost> {
    requireText(topic, 'topic');
    this.logger.info({ topic, generator: this.generator.name }, 'Generating blog post');

    const content = await this.run('blog', { topic, ...definedEntries(style) });
    const title = content.match(/^#\s+(.+)$/m)?.[1]?.trim() ?? topic;

    return {
      title,
      content,
      wordCount: countWords(content),
      metadata: { style, generatedBy: this.generator.name },
    };
  }

  async generateOutline(topic: string, sections = 5): Promise<Outline> {
    requireText(topic, 'topic');
    this.logger.info({ topic, sections }, 'Generating outline');

    const raw = await this.run('outline', { topic, sections });
    const lines = toLines(raw);
    if (lines.length < sections) {
      throw new GeneratorError(`Outline has ${lines.length} sections, expected ${sections}`);
    }
    return { topic, sections: lines.slice(0, sections) };
  }

  async generateNewsletter(subject: string, topics: string[], tone = 'professional'): Promise<Newsletter> {
    requireText(subject, 'subject');
    const chosen = topics.slice(0, NEWSLETTER_MAX_SECTIONS);
    chosen.forEach((t) => requireText(t, 'topic'));
    this.logger.info({ subject, topics: chosen.length, tone }, 'Generating newsletter');

    const sections: NewsletterSection[] = [];
    for (const topic of chosen) {
      const content = await this.run('newsletter_section', { topic, subject, tone });
      sections.push({ heading: `Deep Dive: ${topic}`, content });
    }

    return {
      subject,
      previewText: `This week's insights on ${topics.slice(0, 2).join(', ')}`,
      sections,
      cta: NEWSLETTER_CTA,
      wordCount: sections.reduce((sum, s) => sum + countWords(s.content), 0),
    };
  }

  async generateSocialPosts(
    topic: string,
    platforms: readonly SocialPlatform[],
    includeHooks = true,
  ): Promise<{ posts: SocialPost[] }> {
    requireText(topic, 'topic');
    this.logger.info({ topic, platforms, includeHooks }, 'Generating social posts');

    const posts: SocialPost[] = [];
    for (const platform of platforms) {
      const content = await this.run('social_post', {
        topic,
        platform,
        includeHooks: includeHooks ? 'yes' : 'no',
      });
      posts.push({
        platform,
        content,
        characterCount: content.length,
        hashtags: collectHashtags(content, topic),
      });
    }
    return { posts };
  }

  async generateHooks(topic: string, count = 5, platform?: string): Promise<string[]> {
    requireText(topic, 'topic');
    this.logger.info({ topic, count, platform }, 'Generating hooks');

    const raw = await this.run('hooks', { topic, count, ...(platform ? { platform } : {}) });
    return toLines(raw).slice(0, count);
  }

  async generateCampaign(goal: string, steps = 3, audience?: string): Promise<Campaign> {
    requireText(goal, 'goal');
    this.logger.info({ goal, steps, audience }, 'Generating campaign');

    const campaignSteps: CampaignStep[] = [];
    for (let i = 0; i < steps; i++) {
      const stepNumber = i + 1;
      const content = await this.run('campaign_step', {
        goal,
        step: stepNumber,
        totalSteps: steps,
        ...(audience ? { audience } : {}),
      });
      campaignSteps.push({
        stepNumber,
        subject: `Step ${stepNumber}: Moving towards ${goal}`,
        content,
        delayDays: i * CAMPAIGN_STEP_INTERVAL_DAYS,
      });
    }

    return {
      goal,
      audience: audience ?? null,
      steps: campaignSteps,
      totalDurationDays: Math.max(0, steps - 1) * CAMPAIGN_STEP_INTERVAL_DAYS,
    };
  }

  async expand(text: string, targetLength = 'double'): Promise<ExpandResult> {
    requireText(text);
    this.logger.info({ chars: text.length, targetLength }, 'Expanding content');

    const content = await this.run('expand', { text, targetLength });
    return { originalLength: text.length, expandedLength: content.length, content };
  }

  async shorten(text: string, targetWords?: number): Promise<ShortenResult> {
    requireText(text);
    this.logger.info({ chars: text.length, targetWords }, 'Shortening content');

    const content = await this.run('shorten', { text, ...(targetWords ? { targetWords } : {}) });
    return { originalLength: text.length, shortenedLength: content.length, content };
  }

  async rewrite(text: string, instructions: string): Promise<ContentRewrite> {
    requireText(text);
    requireText(instructions, 'instructions');
    this.logger.info({ instructions }, 'Rewriting content');

    return { original: text, rewritten: await this.run('rewrite', { text, instructions }) };
  }

  private async run(task: GenerationTask, variables: GenerationParams['variables']): Promise<string> {
    const params: GenerationParams = { task, variables };
    const text = await this.generator.generate(buildPrompt(params), params);
    if (text.trim().length === 0) {
      throw new GeneratorError(`Generator ${this.generator.name} returned empty output for ${task}`);
    }
    return text;
  }
}

// ─── Helpers ───

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/** Non-empty lines with list numbering and bullets removed */
function toLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.replace(/^\s*(?:\d+[.)]|[-*•])\s+/, '').trim())
    .filter((line) => line.length > 0);
}

/** Tags already in the post, then one built from the topic */
export function collectHashtags(content: string, topic: string): string[] {
  const tags = [...content.matchAll(/(?:^|\s)#([\p{L}\p{N}_]+)/gu)].map((m) => m[1].toLowerCase());
  const topicTag = topic.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, '');
  if (topicTag) tags.push(topicTag);
  return [...new Set(tags)];
}

function definedEntries(style: StyleProfile): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(style)) {
    if (typeof value === 'string' && value.trim()) out[key] = value;
  }
  return out;
}
