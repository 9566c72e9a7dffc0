/**
 * URL Normalizer Tests
 */

import {
  isSameOrigin,
  isValidUrl,
  normalizeOrigin,
  normalizePath,
  normalizeQuery,
  normalizeUrl,
} from '../url-normalizer';
import { DedupError, DedupErrorType } from '../crawling.errors';
import { captureError } from '../../../__tests__/helpers/errors';

describe('normalizeOrigin', () => {
  it('should lower-case scheme and host and strip the default https port', () => {
    const result = normalizeOrigin('HTTPS://Example.com:443/a/');

    expect(result.scheme).toBe('https');
    expect(result.host).toBe('example.com');
    expect(result.port).toBeUndefined();
    expect(result.origin).toBe('https://example.com');
    expect(result.path).toBe('/a');
    expect(result.href).toBe('https://example.com/a');
  });

  it('should produce the same origin and path for equivalent URLs', () => {
    const a = normalizeOrigin('HTTPS://Example.com:443/a/');
    const b = normalizeOrigin('https://example.com/a');

    expect(a.href).toBe(b.href);
  });

  it('should strip port 80 for http', () => {
    expect(normalizeOrigin('http://example.com:80/x').origin).toBe('http://example.com');
  });

  it('should keep non-default ports', () => {
    const result = normalizeOrigin('http://example.com:8080');
    expect(result.port).toBe(8080);
    expect(result.origin).toBe('http://example.com:8080');
  });

  it('should keep port 443 on plain http', () => {
    expect(normalizeOrigin('http://example.com:443/').origin).toBe('http://example.com:443');
  });

  it('should collapse an empty path to root', () => {
    expect(normalizeOrigin('https://example.com').path).toBe('/');
    expect(normalizeOrigin('https://example.com/').path).toBe('/');
  });

  it('should remove only one trailing slash', () => {
    expect(normalizeOrigin('https://example.com/a//').path).toBe('/a/');
  });

  it('should leave the query untouched and drop the fragment', () => {
    const result = normalizeOrigin('https://example.com/a?b=2&a=1#frag');

    expect(result.query).toBe('b=2&a=1');
    expect(result.href).toBe('https://example.com/a?b=2&a=1');
  });

  it('should resolve relative URLs against a base', () => {
    expect(normalizeOrigin('/docs/', 'https://Example.com').href).toBe('https://example.com/docs');
  });

  it('should accept URL objects', () => {
    expect(normalizeOrigin(new URL('https://EXAMPLE.com/p')).href).toBe('https://example.com/p');
  });

  it('should fail with INVALID_URL for unparsable input', () => {
    const error = captureError(() => normalizeOrigin('not a url'));

    expect(error).toBeInstanceOf(DedupError);
    expect(error).toMatchObject({ type: DedupErrorType.INVALID_URL, details: { url: 'not a url' } });
  });

  it('should fail with INVALID_URL when the host is missing', () => {
    expect(() => normalizeOrigin('mailto:someone@example.com')).toThrow('missing host');
    expect(() => normalizeOrigin('file:///tmp/page.html')).toThrow('missing host');
  });
});

describe('normalizePath', () => {
  it('should resolve dot segments', () => {
    expect(normalizePath('/a/./b/../c')).toBe('/a/c');
  });

  it('should not climb above the root', () => {
    expect(normalizePath('/../x')).toBe('/x');
  });

  it('should drop the trailing slash left by a final dot segment', () => {
    expect(normalizePath('/a/..')).toBe('/');
    expect(normalizePath('/a/b/.')).toBe('/a/b');
    expect(normalizePath('/a/b/c/..')).toBe('/a/b');
  });

  it('should remove a single trailing slash beyond the root', () => {
    expect(normalizePath('/a/b/')).toBe('/a/b');
    expect(normalizePath('/a//')).toBe('/a/');
    expect(normalizePath('/')).toBe('/');
  });

  it('should ensure a leading slash', () => {
    expect(normalizePath('a/b')).toBe('/a/b');
    expect(normalizePath('')).toBe('/');
  });
});

describe('normalizeQuery', () => {
  it('should sort parameters by key', () => {
    expect(normalizeQuery('y=2&x=1')).toBe('x=1&y=2');
  });

  it('should sort repeated keys by value', () => {
    expect(normalizeQuery('a=2&a=1')).toBe('a=1&a=2');
  });

  it('should drop empty pairs and keep valueless keys', () => {
    expect(normalizeQuery('b&a=1&&')).toBe('a=1&b');
  });

  it('should accept a leading question mark', () => {
    expect(normalizeQuery('?z=1')).toBe('z=1');
  });

  it('should return an empty string for an empty query', () => {
    expect(normalizeQuery('')).toBe('');
  });
});

describe('normalizeUrl', () => {
  it('should combine origin, path and query normalization', () => {
    expect(normalizeUrl('HTTP://Example.com:80/a/../b/?y=2&x=1#top')).toBe('http://example.com/b?x=1&y=2');
  });
});

describe('isSameOrigin', () => {
  it('should compare normalized origins', () => {
    expect(isSameOrigin('https://example.com/a', 'HTTPS://EXAMPLE.com:443/b')).toBe(true);
    expect(isSameOrigin('https://example.com/a', 'http://example.com/a')).toBe(false);
  });

  it('should return false for invalid URLs', () => {
    expect(isSameOrigin('not a url', 'https://example.com')).toBe(false);
  });
});

describe('isValidUrl', () => {
  it('should report whether a URL normalizes', () => {
    expect(isValidUrl('https://example.com')).toBe(true);
    expect(isValidUrl('example.com')).toBe(false);
  });
});
