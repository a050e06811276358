import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GeneratorError, InvalidInputError } from '@quill/shared';
import type { ContentGenerator, Logger } from '@quill/shared';
import { ContentService, collectHashtags, countWords } from './content-service.js';
import { TemplateContentGenerator } from './providers/template.js';

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
} as unknown as Logger;

function createService(generator: ContentGenerator = new TemplateContentGenerator()) {
  return new ContentService(generator, mockLogger);
}

describe('ContentService', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('generateBlog', () => {
    it('takes the title from the first heading', async () => {
      const post = await createService().generateBlog('Remote Work', { tone: 'casual' });

      expect(post.title).toBe('A Practical Guide to Remote Work');
      expect(post.wordCount).toBe(104);
      expect(post.metadata).toEqual({ style: { tone: 'casual' }, generatedBy: 'template' });
    });

    it('passes the prompt and task to the generator', async () => {
      const generate = vi.fn().mockResolvedValue('No heading here.');
      const service = createService({ name: 'stub', generate });

      const post = await service.generateBlog('Testing', { voice: 'first person' });

      expect(post.title).toBe('Testing');
      const [prompt, params] = generate.mock.calls[0];
      expect(prompt).toContain('Write a blog post about "Testing"');
      expect(prompt).toContain('Voice: first person.');
      expect(params).toEqual({ task: 'blog', variables: { topic: 'Testing', voice: 'first person' } });
    });

    it('rejects a blank topic', async () => {
      await expect(createService().generateBlog('  ')).rejects.toThrow(InvalidInputError);
    });
  });

  describe('generateOutline', () => {
    it('returns exactly the requested number of sections', async () => {
      for (const count of [1, 2, 5, 20]) {
        const outline = await createService().generateOutline('SEO', count);
        expect(outline.sections).toHaveLength(count);
        expect(outline.sections[0]).toBe('Introduction to SEO');
      }
    });

    it('ends with the conclusion', async () => {
      const outline = await createService().generateOutline('SEO', 3);
      expect(outline).toEqual({
        topic: 'SEO',
        sections: ['Introduction to SEO', 'Section 1: Key Aspect of SEO', 'Conclusion: The Future of SEO'],
      });
    });

    it('strips numbering from generated lines', async () => {
      const service = createService({ name: 'stub', generate: vi.fn().mockResolvedValue('1. Intro\n2) Body\n- Wrap up') });
      const outline = await service.generateOutline('X', 3);
      expect(outline.sections).toEqual(['Intro', 'Body', 'Wrap up']);
    });

    it('fails when the generator returns too few sections', async () => {
      const service = createService({ name: 'stub', generate: vi.fn().mockResolvedValue('Only one') });
      await expect(service.generateOutline('X', 3)).rejects.toThrow('Outline has 1 sections, expected 3');
    });
  });

  describe('generateNewsletter', () => {
    it('writes one section for each of the first three topics', async () => {
      const newsletter = await createService().generateNewsletter('Weekly', ['AI', 'Cloud', 'Security', 'Data']);

      expect(newsletter.sections.map((s) => s.heading)).toEqual([
        'Deep Dive: AI',
        'Deep Dive: Cloud',
        'Deep Dive: Security',
      ]);
      expect(newsletter.sections[0].content).toBe(
        'Analysis of AI: what changed this week and what it means for you.',
      );
      expect(newsletter.previewText).toBe("This week's insights on AI, Cloud");
      expect(newsletter.cta).toBe('Read more on our blog');
      expect(newsletter.wordCount).toBe(39);
    });
  });

  describe('generateSocialPosts', () => {
    it('writes one post per platform with hashtags', async () => {
      const { posts } = await createService().generateSocialPosts('Remote Work', ['linkedin', 'twitter']);

      expect(posts.map((p) => p.platform)).toEqual(['linkedin', 'twitter']);
      expect(posts[0].content.startsWith('🔥 Hot take on Remote Work:')).toBe(true);
      expect(posts[0].characterCount).toBe(posts[0].content.length);
      expect(posts[0].hashtags).toEqual(['professional', 'growth', 'remotework']);
      expect(posts[1].hashtags).toEqual(['remotework']);
    });

    it('leaves out the hook when asked', async () => {
      const { posts } = await createService().generateSocialPosts('AI', ['reddit'], false);
      expect(posts[0].content).toBe('I wanted to share some thoughts on this topic...');
    });
  });

  describe('generateHooks', () => {
    it('returns at most count hooks', async () => {
      const hooks = await createService().generateHooks('AI', 3);
      expect(hooks).toEqual([
        "🔥 You won't believe this about AI",
        'The AI secret nobody talks about',
        "Stop doing AI wrong (here's how)",
      ]);
    });

    it('trims a generator that returns too many', async () => {
      const service = createService({ name: 'stub', generate: vi.fn().mockResolvedValue('a\nb\nc\nd') });
      expect(await service.generateHooks('AI', 2, 'twitter')).toEqual(['a', 'b']);
    });
  });

  describe('generateCampaign', () => {
    it('spaces steps three days apart', async () => {
      const campaign = await createService().generateCampaign('Onboarding', 4, 'new users');

      expect(campaign.steps.map((s) => s.delayDays)).toEqual([0, 3, 6, 9]);
      expect(campaign.totalDurationDays).toBe(9);
      expect(campaign.audience).toBe('new users');
      expect(campaign.steps[1]).toEqual({
        stepNumber: 2,
        subject: 'Step 2: Moving towards Onboarding',
        content: 'This is step 2 in your journey to Onboarding, written for new users.',
        delayDays: 3,
      });
    });

    it('records a missing audience as null', async () => {
      const campaign = await createService().generateCampaign('Launch', 1);
      expect(campaign.audience).toBeNull();
      expect(campaign.totalDurationDays).toBe(0);
    });
  });

  describe('expand / shorten / rewrite', () => {
    it('reports lengths before and after expanding', async () => {
      const result = await createService().expand('Hello world.');
      expect(result.originalLength).toBe(12);
      expect(result.expandedLength).toBe(235);
      expect(result.content.startsWith('Hello world.\n\nFurthermore')).toBe(true);
    });

    it('shortens to the target word count', async () => {
      const result = await createService().shorten('one two three four five six seven eight nine ten eleven twelve', 10);
      expect(result.content).toBe('one two three four five six seven eight nine ten...');
      expect(result.shortenedLength).toBe(51);
    });

    it('echoes the original next to the rewrite', async () => {
      const result = await createService().rewrite('Hello.', 'make it formal');
      expect(result).toEqual({ original: 'Hello.', rewritten: '[Rewritten with: make it formal]\n\nHello.' });
    });

    it('rejects blank instructions', async () => {
      await expect(createService().rewrite('Hello.', ' ')).rejects.toThrow('instructions must not be empty');
    });
  });

  it('rejects empty generator output', async () => {
    const service = createService({ name: 'stub', generate: vi.fn().mockResolvedValue('   ') });
    await expect(service.expand('text')).rejects.toThrow(GeneratorError);
  });
});

describe('collectHashtags', () => {
  it('keeps tags from the post and adds one for the topic', () => {
    expect(collectHashtags('Big day #Launch #ai', 'AI')).toEqual(['launch', 'ai']);
  });
});

describe('countWords', () => {
  it('counts whitespace-separated words', () => {
    expect(countWords('  one two\nthree  ')).toBe(3);
  });
});
