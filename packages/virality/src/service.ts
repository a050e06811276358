import { UnsupportedPlatformError } from '@quill/shared';
import type { Logger, RewriteResult, ScoreResult } from '@quill/shared';
import { scoreText } from './scorer.js';
import { traceRewrite } from './rewriter.js';

/** Entry point the API and CLI call. Adds logging around the pure scorer and rewriter. */
export class ViralityService {
  constructor(private logger: Logger) {}

  score(text: string, platform?: string | null): ScoreResult {
    const result = this.guard(platform, () => scoreText(text, platform));
    this.logger.info(
      {
        platform: platform ?? 'general',
        hook: result.hookScore,
        structure: result.structureScore,
        niche: result.nicheScore,
        overall: result.overallScore,
      },
      'Scored text',
    );
    return result;
  }

  rewrite(text: string, platform?: string | null): RewriteResult {
    const trace = this.guard(platform, () => traceRewrite(text, platform));
    this.logger.info(
      {
        platform: trace.platform,
        steps: trace.appliedSteps,
        before: trace.originalScore,
        after: trace.improvedScore,
      },
      'Rewrote text',
    );
    const { originalText, rewrittenText, originalScore, improvedScore, improvements } = trace;
    return { originalText, rewrittenText, originalScore, improvedScore, improvements };
  }

  private guard<T>(platform: string | null | undefined, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof UnsupportedPlatformError) {
        this.logger.warn({ platform }, 'Rejected unsupported platform');
      }
      throw err;
    }
  }
}
