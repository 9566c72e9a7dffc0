/**
 * Dedup Error Tests
 */

import {
  DedupError,
  DedupErrorType,
  configurationError,
  corruptSnapshot,
  invalidRequest,
  invalidUrl,
  isDedupError,
} from '../crawling.errors';

describe('DedupError', () => {
  it('should carry type, details and a non-retryable flag', () => {
    const error = invalidUrl('ftp//broken', 'cannot be parsed');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('DedupError');
    expect(error.type).toBe(DedupErrorType.INVALID_URL);
    expect(error.message).toBe('Invalid URL "ftp//broken": cannot be parsed');
    expect(error.details).toEqual({ url: 'ftp//broken' });
    expect(error.retryable).toBe(false);
  });

  it('should build each error type', () => {
    expect(configurationError('bad n').type).toBe(DedupErrorType.CONFIGURATION_ERROR);
    expect(invalidRequest('no method').type).toBe(DedupErrorType.INVALID_REQUEST);
    expect(corruptSnapshot('bad magic').type).toBe(DedupErrorType.CORRUPT_SNAPSHOT);
  });
});

describe('isDedupError', () => {
  it('should recognize dedup errors', () => {
    expect(isDedupError(invalidRequest('no method'))).toBe(true);
    expect(isDedupError(new Error('plain'))).toBe(false);
    expect(isDedupError('INVALID_URL')).toBe(false);
  });

  it('should filter by type when given one', () => {
    const error = new DedupError(DedupErrorType.CONFIGURATION_ERROR, 'bad p');

    expect(isDedupError(error, DedupErrorType.CONFIGURATION_ERROR)).toBe(true);
    expect(isDedupError(error, DedupErrorType.INVALID_URL)).toBe(false);
  });
});
