/**
 * Test Fixtures
 * Reusable test data
 */

import { CrawlRequest } from '../../lib/crawling/crawling.types';

export const insertedKeys = (count: number): string[] =>
  Array.from({ length: count }, (_, i) => `inserted-${i}`);

export const absentKeys = (count: number): string[] =>
  Array.from({ length: count }, (_, i) => `absent-${i}`);

export const productSearchRequest: CrawlRequest = {
  url: 'https://shop.example.com/search?q=lamp&page=2',
  method: 'GET',
};

export const productSearchReordered: CrawlRequest = {
  url: 'HTTPS://Shop.Example.com:443/search/?page=2&q=lamp#results',
  method: 'get',
};

export const loginFormRequest: CrawlRequest = {
  url: 'https://example.com/login',
  method: 'POST',
  body: { type: 'form', fields: { user: 'test-user', password: 'test-secret' } },
};

export const malformedRequest: CrawlRequest = {
  url: 'not a url',
};
