import type { Config, ContentGenerator, Logger } from '@quill/shared';
import { TemplateContentGenerator } from './template.js';
import { OpenAIContentGenerator } from './openai.js';

export type ContentGeneratorName = Config['contentGenerator'];

export function createContentGenerator(
  config: Pick<Config, 'contentGenerator' | 'openaiApiKey' | 'openaiModel'>,
  logger: Logger,
): ContentGenerator {
  switch (config.contentGenerator) {
    case 'template':
      return new TemplateContentGenerator();
    case 'openai':
      if (!config.openaiApiKey) {
        logger.warn('OpenAI API key not configured, falling back to template generator');
        return new TemplateContentGenerator();
      }
      return new OpenAIContentGenerator({ apiKey: config.openaiApiKey, model: config.openaiModel }, logger);
    default:
      throw new Error(`Unknown content generator: ${String(config.contentGenerator)}`);
  }
}
