import { GeneratorError } from '@quill/shared';
import type { GenerationParams } from '@quill/shared';

export function requireVar(params: GenerationParams, key: string): string {
  const value = params.variables[key];
  if (value === undefined || String(value).trim() === '') {
    throw new GeneratorError(`Missing variable "${key}" for task ${params.task}`);
  }
  return String(value);
}

export function optionalVar(params: GenerationParams, key: string): string | undefined {
  const value = params.variables[key];
  return value === undefined || String(value).trim() === '' ? undefined : String(value);
}

export function numberVar(params: GenerationParams, key: string, fallback: number): number {
  const value = params.variables[key];
  const n = typeof value === 'number' ? value : Number(value);
  return value === undefined || !Number.isFinite(n) ? fallback : n;
}
