export { ContentService, CAMPAIGN_STEP_INTERVAL_DAYS, countWords, collectHashtags } from './content-service.js';
export { buildPrompt, SYSTEM_PROMPT } from './templates/prompts.js';
export * from './providers/index.js';
