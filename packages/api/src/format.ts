import type { RewriteResult, ScoreResult } from '@quill/shared';

/** Plain rows for the CLI tables; colouring happens in cli.ts. */

export type ScoreBand = 'strong' | 'fair' | 'weak';

export function scoreBand(score: number): ScoreBand {
  if (score >= 70) return 'strong';
  if (score >= 40) return 'fair';
  return 'weak';
}

export function scoreRows(result: ScoreResult): Array<[string, number]> {
  return [
    ['Hook', result.hookScore],
    ['Structure', result.structureScore],
    ['Niche', result.nicheScore],
    ['Overall', result.overallScore],
  ];
}

export function formatEngagement(value: number): string {
  return value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

export function formatDelta(result: RewriteResult): string {
  const delta = result.improvedScore - result.originalScore;
  return `${result.originalScore} → ${result.improvedScore} (${delta >= 0 ? '+' : ''}${delta})`;
}
