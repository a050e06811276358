// ─── Error Classes ───

export class QuillError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public code: string,
  ) {
    super(message);
    this.name = 'QuillError';
  }
}

export class InvalidInputError extends QuillError {
  constructor(message: string) {
    super(message, 400, 'INVALID_INPUT');
    this.name = 'InvalidInputError';
  }
}

export class UnsupportedPlatformError extends QuillError {
  constructor(public platform: string) {
    super(`Unsupported platform: ${platform}`, 400, 'UNSUPPORTED_PLATFORM');
    this.name = 'UnsupportedPlatformError';
  }
}

export class UnauthorizedError extends QuillError {
  constructor(message: string) {
    super(message, 401, 'UNAUTHORIZED');
    this.name = 'UnauthorizedError';
  }
}

export class GeneratorError extends QuillError {
  constructor(message: string) {
    super(message, 502, 'GENERATOR_FAILED');
    this.name = 'GeneratorError';
  }
}

/** Rejects empty and whitespace-only strings */
export function requireText(value: string, field = 'text'): string {
  if (value.trim().length === 0) {
    throw new InvalidInputError(`${field} must not be empty`);
  }
  return value;
}
