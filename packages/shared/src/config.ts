import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { resolve } from 'path';

dotenvConfig({ path: resolve(process.cwd(), '.env') });

/** 'true' / '1' enable a flag; anything else (or unset) leaves it off */
const flag = z
  .string()
  .optional()
  .transform((v) => v === 'true' || v === '1');

const configSchema = z.object({
  appName: z.string().default('Quill Content Suite'),
  environment: z.enum(['development', 'test', 'production']).default('development'),

  // Server
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().min(1).max(65_535).default(8000),

  // Generation
  contentGenerator: z.enum(['template', 'openai']).default('template'),
  openaiApiKey: z.string().default(''),
  openaiModel: z.string().default('gpt-4o-mini'),

  // Auth
  apiKeyEnabled: flag,
  apiKey: z.string().min(1).default('dev-api-key'),

  // Logging
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const result = configSchema.safeParse({
    appName: env.APP_NAME,
    environment: env.NODE_ENV,
    host: env.HOST,
    port: env.PORT,
    contentGenerator: env.CONTENT_GENERATOR,
    openaiApiKey: env.OPENAI_API_KEY,
    openaiModel: env.OPENAI_MODEL,
    apiKeyEnabled: env.API_KEY_ENABLED,
    apiKey: env.API_KEY,
    logLevel: env.LOG_LEVEL,
  });

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const invalid = Object.entries(errors)
      .map(([k, v]) => `  ${k}: ${v?.join(', ')}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${invalid}`);
  }

  return result.data;
}

let cachedConfig: Config | null = null;

export function loadConfig(): Config {
  if (cachedConfig) return cachedConfig;
  cachedConfig = parseConfig(process.env);
  return cachedConfig;
}
