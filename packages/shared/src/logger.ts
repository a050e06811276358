import pino from 'pino';

/** Pretty output for local runs; plain JSON lines in production and under test. */
export function createLogger(name: string, level = 'info') {
  const pretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';
  return pino({
    name,
    level,
    transport: pretty ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
  });
}

export type Logger = pino.Logger;
