import { describe, it, expect, vi, beforeEach } from 'vitest';
import { z } from 'zod';
import type { Request, Response } from 'express';
import { GeneratorError, InvalidInputError } from '@quill/shared';
import type { Logger } from '@quill/shared';
import { errorHandler, requireApiKey, toErrorResponse } from './middleware.js';

const mockLogger: Logger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
} as unknown as Logger;

function createMockResponse() {
  const res = {
    status: vi.fn(),
    json: vi.fn(),
    setHeader: vi.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
}

function createMockRequest(apiKey?: string) {
  return {
    path: '/api/virality/score',
    get: vi.fn((name: string) => (name.toLowerCase() === 'x-api-key' ? apiKey : undefined)),
  };
}

describe('toErrorResponse', () => {
  it('maps domain errors to their status and code', () => {
    expect(toErrorResponse(new InvalidInputError('text must not be empty'))).toEqual({
      status: 400,
      body: { error: 'text must not be empty', code: 'INVALID_INPUT' },
    });
    expect(toErrorResponse(new GeneratorError('upstream down')).status).toBe(502);
  });

  it('maps validation errors to 422 with field details', () => {
    const result = z.object({ count: z.number() }).safeParse({ count: 'x' });
    if (result.success) throw new Error('expected failure');

    const { status, body } = toErrorResponse(result.error);
    expect(status).toBe(422);
    expect(body.code).toBe('VALIDATION_FAILED');
    expect(body.details?.count).toEqual(['Expected number, received string']);
  });

  it('keeps the status of body-parser errors', () => {
    const err = Object.assign(new Error('Unexpected token } in JSON'), { status: 400 });
    expect(toErrorResponse(err)).toEqual({
      status: 400,
      body: { error: 'Unexpected token } in JSON', code: 'BAD_REQUEST' },
    });
  });

  it('hides unexpected errors', () => {
    expect(toErrorResponse(new Error('db exploded'))).toEqual({
      status: 500,
      body: { error: 'Internal server error', code: 'INTERNAL' },
    });
  });
});

describe('requireApiKey', () => {
  it('lets everything through when disabled', () => {
    const next = vi.fn();
    const res = createMockResponse();
    requireApiKey({ apiKeyEnabled: false, apiKey: 'test-key' })(
      createMockRequest() as unknown as Request,
      res as unknown as Response,
      next,
    );
    expect(next).toHaveBeenCalledOnce();
    expect(res.status).not.toHaveBeenCalled();
  });

  it('accepts the configured key', () => {
    const next = vi.fn();
    requireApiKey({ apiKeyEnabled: true, apiKey: 'test-key' })(
      createMockRequest('test-key') as unknown as Request,
      createMockResponse() as unknown as Response,
      next,
    );
    expect(next).toHaveBeenCalledOnce();
  });

  it('rejects a missing or wrong key with 401', () => {
    const guard = requireApiKey({ apiKeyEnabled: true, apiKey: 'test-key' });

    const missing = createMockResponse();
    guard(createMockRequest() as unknown as Request, missing as unknown as Response, vi.fn());
    expect(missing.status).toHaveBeenCalledWith(401);
    expect(missing.setHeader).toHaveBeenCalledWith('WWW-Authenticate', 'ApiKey');
    expect(missing.json).toHaveBeenCalledWith({ error: 'Missing API key', code: 'UNAUTHORIZED' });

    const wrong = createMockResponse();
    const next = vi.fn();
    guard(createMockRequest('other') as unknown as Request, wrong as unknown as Response, next);
    expect(wrong.json).toHaveBeenCalledWith({ error: 'Invalid API key', code: 'UNAUTHORIZED' });
    expect(next).not.toHaveBeenCalled();
  });
});

describe('errorHandler', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('logs server errors at error level', () => {
    const res = createMockResponse();
    errorHandler(mockLogger)(new Error('boom'), createMockRequest() as unknown as Request, res as unknown as Response, vi.fn());
    expect(res.status).toHaveBeenCalledWith(500);
    expect(mockLogger.error).toHaveBeenCalledOnce();
  });

  it('logs client errors at warn level', () => {
    const res = createMockResponse();
    errorHandler(mockLogger)(
      new InvalidInputError('text must not be empty'),
      createMockRequest() as unknown as Request,
      res as unknown as Response,
      vi.fn(),
    );
    expect(res.status).toHaveBeenCalledWith(400);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      { path: '/api/virality/score', status: 400, code: 'INVALID_INPUT' },
      'text must not be empty',
    );
  });
});
