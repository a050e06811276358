export { TemplateContentGenerator } from './template.js';
export { OpenAIContentGenerator, OpenAIRequestError, type OpenAIGeneratorOptions } from './openai.js';
export { createContentGenerator, type ContentGeneratorName } from './factory.js';
