import type { GenerationParams, GenerationTask } from '@quill/shared';
import { numberVar, optionalVar, requireVar } from '../variables.js';

/**
 * Prompt templates sent to text-generation providers.
 *
 * Every prompt asks for plain output in a fixed shape (markdown for long form,
 * one item per line for lists) so ContentService can parse the reply the same
 * way whichever provider produced it.
 */

export const SYSTEM_PROMPT =
  'You are a senior content strategist and copywriter. Write clear, specific, engaging copy. ' +
  'Follow the requested format exactly and return only the requested content, with no preamble.';

type PromptBuilder = (params: GenerationParams) => string;

const PROMPTS: Record<GenerationTask, PromptBuilder> = {
  blog: (p) => {
    const style = [
      optionalVar(p, 'tone') && `Tone: ${optionalVar(p, 'tone')}.`,
      optionalVar(p, 'voice') && `Voice: ${optionalVar(p, 'voice')}.`,
      optionalVar(p, 'length') && `Length: ${optionalVar(p, 'length')}.`,
    ].filter(Boolean);
    return `Write a blog post about "${requireVar(p, 'topic')}".
Start with a single "# " title line, then use "## " section headings and finish with a conclusion.
${style.join(' ')}`.trim();
  },

  outline: (p) =>
    `Write an outline for a piece about "${requireVar(p, 'topic')}" with exactly ${numberVar(p, 'sections', 5)} sections.
The first section is the introduction and the last the conclusion.
Return one section title per line with no numbering.`,

  newsletter_section: (p) =>
    `Write one newsletter section of two or three sentences about "${requireVar(p, 'topic')}" ` +
    `for an issue titled "${requireVar(p, 'subject')}". Tone: ${optionalVar(p, 'tone') ?? 'professional'}.`,

  social_post: (p) => {
    const hook = optionalVar(p, 'includeHooks') === 'yes' ? 'Open with a strong hook line.' : '';
    return `Write a ${requireVar(p, 'platform')} post about "${requireVar(p, 'topic')}". ${hook}
Follow the platform's conventions for length and hashtags.`;
  },

  campaign_step: (p) => {
    const audience = optionalVar(p, 'audience');
    return `Write email ${requireVar(p, 'step')} of ${requireVar(p, 'totalSteps')} in a nurture campaign whose goal is "${requireVar(p, 'goal')}".` +
      (audience ? ` The audience is ${audience}.` : '') +
      ' Return only the email body.';
  },

  hooks: (p) => {
    const platform = optionalVar(p, 'platform');
    return `Write ${numberVar(p, 'count', 5)} attention-grabbing opening lines about "${requireVar(p, 'topic')}"` +
      (platform ? ` for ${platform}` : '') +
      '. Return one per line with no numbering.';
  },

  expand: (p) =>
    `Expand the following text (target: ${optionalVar(p, 'targetLength') ?? 'double'} the length). ` +
    `Keep its meaning and voice.\n\n${requireVar(p, 'text')}`,

  shorten: (p) => {
    const target = numberVar(p, 'targetWords', 0);
    return `Shorten the following text${target > 0 ? ` to about ${target} words` : ' to half its length'}. ` +
      `Keep the key points.\n\n${requireVar(p, 'text')}`;
  },

  rewrite: (p) =>
    `Rewrite the following text. Instructions: ${requireVar(p, 'instructions')}\n\n${requireVar(p, 'text')}`,
};

export function buildPrompt(params: GenerationParams): string {
  return PROMPTS[params.task](params);
}
