import { z } from 'zod';
import { GeneratorError, QuillError, withRetry } from '@quill/shared';
import type { ContentGenerator, GenerationParams, Logger } from '@quill/shared';
import { SYSTEM_PROMPT } from '../templates/prompts.js';

// ─── OpenAI Chat Completions ───

export interface OpenAIGeneratorOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  maxAttempts?: number;
  initialDelayMs?: number;
}

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      }),
    )
    .min(1),
});

/** Non-2xx reply from the API. `status` drives the retry policy. */
export class OpenAIRequestError extends GeneratorError {
  constructor(
    public status: number,
    body: string,
  ) {
    super(`OpenAI API error ${status}: ${body}`);
    this.name = 'OpenAIRequestError';
  }
}

export class OpenAIContentGenerator implements ContentGenerator {
  readonly name = 'openai';
  private apiKey: string;
  private model: string;
  private baseUrl: string;
  private maxAttempts: number;
  private initialDelayMs: number;

  constructor(
    options: OpenAIGeneratorOptions,
    private logger: Logger,
  ) {
    this.apiKey = options.apiKey;
    this.model = options.model ?? 'gpt-4o-mini';
    this.baseUrl = options.baseUrl ?? 'https://api.openai.com/v1';
    this.maxAttempts = options.maxAttempts ?? 3;
    this.initialDelayMs = options.initialDelayMs ?? 500;
  }

  async generate(prompt: string, params: GenerationParams): Promise<string> {
    try {
      const content = await withRetry(() => this.complete(prompt, params), this.logger, `openai.${params.task}`, {
        maxAttempts: this.maxAttempts,
        initialDelayMs: this.initialDelayMs,
      });
      this.logger.debug({ task: params.task, model: this.model, chars: content.length }, 'Generated content');
      return content;
    } catch (err) {
      if (err instanceof QuillError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      throw new GeneratorError(`OpenAI request failed: ${message}`);
    }
  }

  private async complete(prompt: string, params: GenerationParams): Promise<string> {
    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: prompt },
        ],
        temperature: params.temperature ?? 0.7,
        max_tokens: params.maxTokens ?? 1500,
      }),
    });

    if (!response.ok) {
      const body = await response.text();
      throw new OpenAIRequestError(response.status, body);
    }

    const parsed = completionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new GeneratorError('OpenAI returned an unexpected response shape');
    }

    const content = parsed.data.choices[0]?.message.content?.trim() ?? '';
    if (!content) {
      throw new GeneratorError('OpenAI returned no content');
    }
    return content;
  }
}
