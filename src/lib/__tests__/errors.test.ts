/**
 * Tests for the error taxonomy
 */

import { describe, it, expect } from 'vitest';
import {
  DimensionMismatch,
  EmptyDocument,
  GenerationExhausted,
  ProviderError,
  RagError,
  StorageFailure,
  TimeoutError,
  ValidationError,
  getErrorStatus,
  isRagError,
  toErrorMessage,
} from '../errors';

describe('RagError subclasses', () => {
  it('should carry a code and stay instanceof RagError', () => {
    const error = new StorageFailure('write failed');

    expect(error).toBeInstanceOf(RagError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('STORAGE_FAILURE');
    expect(error.name).toBe('StorageFailure');
  });

  it('should keep the cause', () => {
    const cause = new Error('socket hang up');
    expect(new StorageFailure('write failed', cause).cause).toBe(cause);
  });

  it('should describe dimension mismatches', () => {
    const error = new DimensionMismatch(384, 1536);

    expect(error.message).toBe('Vector has 1536 dimensions, index expects 384');
    expect(error.expected).toBe(384);
    expect(error.actual).toBe(1536);
  });

  it('should prefix provider errors with the provider name', () => {
    const error = new ProviderError('cohere', 'API error 500: oops');

    expect(error.message).toBe('cohere: API error 500: oops');
    expect(error.provider).toBe('cohere');
  });

  it('should summarize exhausted generation attempts', () => {
    expect(new GenerationExhausted([]).message).toBe('No generation backend is configured');
    expect(
      new GenerationExhausted([
        { provider: 'openai', error: 'rate limited', durationMs: 12 },
        { provider: 'cohere', error: 'timeout', durationMs: 30000 },
      ]).message
    ).toBe('All 2 generation backends failed');
  });

  it('should name the file in EmptyDocument', () => {
    expect(new EmptyDocument('notes.txt').message).toBe('No usable text content could be extracted from notes.txt');
  });

  it('should default ValidationError issues to an empty list', () => {
    expect(new ValidationError('bad input').issues).toEqual([]);
  });

  it('should format timeouts', () => {
    expect(new TimeoutError('vector search', 500).message).toBe('vector search timed out after 500ms');
  });
});

describe('helpers', () => {
  it('isRagError should only accept RagError instances', () => {
    expect(isRagError(new ValidationError('x'))).toBe(true);
    expect(isRagError(new Error('x'))).toBe(false);
    expect(isRagError('x')).toBe(false);
  });

  it('toErrorMessage should normalize thrown values', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom');
    expect(toErrorMessage('text')).toBe('text');
    expect(toErrorMessage(42)).toBe('42');
  });

  it('getErrorStatus should read numeric status properties', () => {
    expect(getErrorStatus({ status: 429 })).toBe(429);
    expect(getErrorStatus({ status: '429' })).toBeUndefined();
    expect(getErrorStatus(new Error('no status'))).toBeUndefined();
    expect(getErrorStatus(null)).toBeUndefined();
  });
});
