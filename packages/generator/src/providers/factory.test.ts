import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Logger } from '@quill/shared';
import { createContentGenerator } from './factory.js';
import { TemplateContentGenerator } from './template.js';
import { OpenAIContentGenerator } from './openai.js';

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
} as unknown as Logger;

describe('createContentGenerator', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('creates the template generator by default', () => {
    const generator = createContentGenerator(
      { contentGenerator: 'template', openaiApiKey: '', openaiModel: 'gpt-4o-mini' },
      mockLogger,
    );
    expect(generator).toBeInstanceOf(TemplateContentGenerator);
  });

  it('creates the OpenAI generator when a key is configured', () => {
    const generator = createContentGenerator(
      { contentGenerator: 'openai', openaiApiKey: 'test-key', openaiModel: 'gpt-4o-mini' },
      mockLogger,
    );
    expect(generator).toBeInstanceOf(OpenAIContentGenerator);
    expect(generator.name).toBe('openai');
  });

  it('falls back to templates without an OpenAI key', () => {
    const generator = createContentGenerator(
      { contentGenerator: 'openai', openaiApiKey: '', openaiModel: 'gpt-4o-mini' },
      mockLogger,
    );
    expect(generator).toBeInstanceOf(TemplateContentGenerator);
    expect(mockLogger.warn).toHaveBeenCalledWith('OpenAI API key not configured, falling back to template generator');
  });
});
