import { pickBySeed } from '@quill/shared';
import type { ContentGenerator, GenerationParams, GenerationTask } from '@quill/shared';
import { numberVar, optionalVar, requireVar } from '../variables.js';

/** Deterministic generator for development and tests. Ignores the prompt and renders
 * from task + variables, so identical inputs always give identical text. */

const TITLE_PREFIXES = ['The Ultimate Guide to', 'A Practical Guide to', 'Everything You Need to Know About'] as const;

interface SocialTemplate {
  hook: (topic: string) => string;
  body: string;
}

const SOCIAL_TEMPLATES: Record<string, SocialTemplate> = {
  linkedin: {
    hook: (topic) => `🔥 Hot take on ${topic}:`,
    body: 'Key insights that will transform your approach.\n\n#professional #growth',
  },
  twitter: {
    hook: (topic) => `🧵 Thread on ${topic}:`,
    body: "1/ Here's what you need to know\n2/ The game-changing insight\n3/ How to apply this today",
  },
  facebook: {
    hook: (topic) => `Let's talk about ${topic}!`,
    body: "I've learned so much about this recently...\n\nWhat's your experience?",
  },
  reddit: {
    hook: (topic) => `[Serious] Discussion: ${topic}`,
    body: 'I wanted to share some thoughts on this topic...',
  },
  instagram: {
    hook: (topic) => `✨ ${topic} ✨`,
    body: 'Swipe to learn more 👉\n\n#content #inspiration',
  },
};

const HOOK_TEMPLATES: Array<(topic: string) => string> = [
  (t) => `🔥 You won't believe this about ${t}`,
  (t) => `The ${t} secret nobody talks about`,
  (t) => `Stop doing ${t} wrong (here's how)`,
  (t) => `I spent 100 hours learning ${t}. Here's what I discovered:`,
  (t) => `The surprising truth about ${t}`,
  (t) => `Why ${t} is about to change everything`,
  (t) => `Here's what everyone gets wrong about ${t}`,
  (t) => `The ${t} strategy that 10x'd my results`,
];

type Renderer = (params: GenerationParams) => string;

const RENDERERS: Record<GenerationTask, Renderer> = {
  blog: (p) => {
    const topic = requireVar(p, 'topic');
    return `# ${pickBySeed(TITLE_PREFIXES, topic)} ${topic}

Introduction to ${topic} and why it matters in today's world.

## Section 1: Understanding ${topic}
This section explores the fundamentals of ${topic} and provides context.

## Section 2: Best Practices
Here are the key best practices for ${topic}:
- Practice 1: Focus on quality
- Practice 2: Stay consistent
- Practice 3: Measure results

## Section 3: Common Challenges
When working with ${topic}, you may encounter these challenges.

## Conclusion
${topic} is essential for success in the modern era. By following these guidelines,
you'll be well on your way to mastery.`;
  },

  outline: (p) => {
    const topic = requireVar(p, 'topic');
    const count = numberVar(p, 'sections', 5);
    const lines = [`Introduction to ${topic}`];
    for (let i = 1; i < count - 1; i++) {
      lines.push(`Section ${i}: Key Aspect of ${topic}`);
    }
    if (count > 1) lines.push(`Conclusion: The Future of ${topic}`);
    return lines.join('\n');
  },

  newsletter_section: (p) => {
    const topic = requireVar(p, 'topic');
    return `Analysis of ${topic}: what changed this week and what it means for you.`;
  },

  social_post: (p) => {
    const topic = requireVar(p, 'topic');
    const platform = requireVar(p, 'platform');
    const template: SocialTemplate | undefined = SOCIAL_TEMPLATES[platform];
    if (!template) return `Check out my thoughts on ${topic}!`;
    return optionalVar(p, 'includeHooks') === 'yes' ? `${template.hook(topic)}\n\n${template.body}` : template.body;
  },

  campaign_step: (p) => {
    const goal = requireVar(p, 'goal');
    const audience = optionalVar(p, 'audience');
    const body = `This is step ${requireVar(p, 'step')} in your journey to ${goal}`;
    return audience ? `${body}, written for ${audience}.` : `${body}.`;
  },

  hooks: (p) => {
    const topic = requireVar(p, 'topic');
    return HOOK_TEMPLATES.slice(0, numberVar(p, 'count', 5))
      .map((render) => render(topic))
      .join('\n');
  },

  expand: (p) =>
    `${requireVar(p, 'text')}\n\n` +
    "Furthermore, it's important to note that this concept extends beyond the surface level. " +
    'The implications are far-reaching and deserve careful consideration. ' +
    'By examining this from multiple angles, we gain deeper insights.',

  shorten: (p) => {
    const words = requireVar(p, 'text').split(/\s+/).filter(Boolean);
    const requested = numberVar(p, 'targetWords', 0);
    const target = requested > 0 ? requested : Math.max(1, Math.floor(words.length / 2));
    if (words.length <= target) return words.join(' ');
    return `${words.slice(0, target).join(' ')}...`;
  },

  rewrite: (p) => `[Rewritten with: ${requireVar(p, 'instructions')}]\n\n${requireVar(p, 'text')}`,
};

export class TemplateContentGenerator implements ContentGenerator {
  readonly name = 'template';

  async generate(_prompt: string, params: GenerationParams): Promise<string> {
    return RENDERERS[params.task](params);
  }
}
