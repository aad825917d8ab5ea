import { describe, it, expect } from 'vitest';
import { normalizeUrl, selectPriorityPages } from './pages.js';

describe('normalizeUrl', () => {
  it('lowercases the host and drops the fragment and trailing slash', () => {
    expect(normalizeUrl('HTTPS://Example.TEST/About/#team')).toBe('https://example.test/About');
  });

  it('keeps the root slash', () => {
    expect(normalizeUrl('https://example.test')).toBe('https://example.test/');
  });

  it('resolves relative links against a base', () => {
    expect(normalizeUrl('/terms?lang=en', 'https://example.test/shop')).toBe('https://example.test/terms?lang=en');
  });

  it('rejects non-http and unparseable input', () => {
    expect(normalizeUrl('mailto:info@example.test')).toBeNull();
    expect(normalizeUrl('javascript:void(0)')).toBeNull();
    expect(normalizeUrl('not a url')).toBeNull();
  });
});

describe('selectPriorityPages', () => {
  const links = [
    'https://example.test/blog',
    'https://example.test/terms-of-service',
    'https://example.test/about/',
    'https://cdn.example.test/about',
    'https://example.test/contact',
    'https://example.test/about',
  ];

  it('ranks same-host priority pages and removes duplicates', () => {
    expect(selectPriorityPages('https://example.test', links, [], 5)).toEqual([
      'https://example.test/about',
      'https://example.test/contact',
      'https://example.test/terms-of-service',
    ]);
  });

  it('skips investigated pages and honors the limit', () => {
    expect(selectPriorityPages('https://example.test', links, ['https://example.test/about'], 1)).toEqual([
      'https://example.test/contact',
    ]);
  });

  it('uses custom priority paths', () => {
    expect(selectPriorityPages('https://example.test', links, [], 5, ['/blog'])).toEqual([
      'https://example.test/blog',
    ]);
  });

  it('returns nothing for an invalid site or a zero limit', () => {
    expect(selectPriorityPages('ftp://example.test', links, [], 3)).toEqual([]);
    expect(selectPriorityPages('https://example.test', links, [], 0)).toEqual([]);
  });
});
