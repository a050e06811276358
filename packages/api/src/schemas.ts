import { z } from 'zod';
import { SOCIAL_PLATFORMS } from '@quill/shared';

/** Request bodies as they arrive on the wire (snake_case). */

const nonBlank = (max: number) =>
  z.string().max(max).refine((s) => s.trim().length > 0, { message: 'must not be empty' });

export const scoreRequestSchema = z.object({
  text: nonBlank(50_000),
  platform: z.string().max(50).nullish(),
});

export const rewriteRequestSchema = z.object({
  text: nonBlank(50_000),
  target_platform: z.string().max(50).nullish(),
});

export const blogRequestSchema = z.object({
  topic: nonBlank(500),
  style_profile: z
    .object({
      tone: z.string().max(100).optional(),
      voice: z.string().max(100).optional(),
      length: z.string().max(100).optional(),
    })
    .nullish(),
});

export const outlineRequestSchema = z.object({
  topic: nonBlank(500),
  sections: z.number().int().min(1).max(20).default(5),
});

export const newsletterRequestSchema = z.object({
  subject: nonBlank(200),
  topics: z.array(nonBlank(200)).min(1).max(10),
  tone: z.string().max(50).default('professional'),
});

export const postsRequestSchema = z.object({
  topic: nonBlank(500),
  platforms: z.array(z.enum(SOCIAL_PLATFORMS)).min(1),
  include_hooks: z.boolean().default(true),
});

export const hooksRequestSchema = z.object({
  topic: nonBlank(500),
  count: z.number().int().min(1).max(20).default(5),
  platform: z.string().max(50).nullish(),
});

export const campaignRequestSchema = z.object({
  goal: nonBlank(500),
  steps: z.number().int().min(1).max(10).default(3),
  audience: z.string().max(200).nullish(),
});

export const expandRequestSchema = z.object({
  text: nonBlank(50_000),
  target_length: z.string().max(50).default('double'),
});

export const shortenRequestSchema = z.object({
  text: nonBlank(50_000),
  target_length: z.number().int().min(10).nullish(),
});

export const contentRewriteRequestSchema = z.object({
  text: nonBlank(50_000),
  instructions: nonBlank(500),
});
