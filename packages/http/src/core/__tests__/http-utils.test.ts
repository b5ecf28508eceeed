import { describe, expect, it } from 'vitest';

import { buildUrl, encodeBody, hasEmptyBody, isAbsoluteHttpUrl } from '../http-utils.js';

describe('http-utils (pure functions)', () => {
  describe('buildUrl', () => {
    it('combines base URL and endpoint correctly', () => {
      expect(buildUrl('https://api.example.com', '/resource')).toBe('https://api.example.com/resource');
    });

    it('handles trailing slash in base URL', () => {
      expect(buildUrl('https://api.example.com/', '/resource')).toBe('https://api.example.com/resource');
    });

    it('handles missing leading slash in endpoint', () => {
      expect(buildUrl('https://api.example.com/projects/p1', 'models')).toBe(
        'https://api.example.com/projects/p1/models'
      );
    });

    it('returns base URL for empty endpoint', () => {
      expect(buildUrl('https://api.example.com/', '')).toBe('https://api.example.com');
      expect(buildUrl('https://api.example.com', '/')).toBe('https://api.example.com');
    });
  });

  describe('isAbsoluteHttpUrl', () => {
    it('accepts http and https URLs', () => {
      expect(isAbsoluteHttpUrl('https://api.example.com')).toBe(true);
      expect(isAbsoluteHttpUrl('http://localhost:8080/base')).toBe(true);
    });

    it('rejects relative and non-http URLs', () => {
      expect(isAbsoluteHttpUrl('/relative')).toBe(false);
      expect(isAbsoluteHttpUrl('ftp://files.example.com')).toBe(false);
      expect(isAbsoluteHttpUrl('not a url')).toBe(false);
    });
  });

  describe('hasEmptyBody', () => {
    const response = (status: number, headers: Record<string, string> = {}) => ({
      body: null,
      headers: new Headers(headers),
      ok: true,
      status,
      text: () => Promise.resolve(''),
    });

    it('detects 204 and zero content length', () => {
      expect(hasEmptyBody(response(204))).toBe(true);
      expect(hasEmptyBody(response(200, { 'content-length': '0' }))).toBe(true);
      expect(hasEmptyBody(response(200, { 'content-length': '12' }))).toBe(false);
    });
  });

  describe('encodeBody', () => {
    it('passes strings through and serializes objects as JSON', () => {
      expect(encodeBody(undefined)).toBeUndefined();
      expect(encodeBody('raw')).toEqual({ body: 'raw' });
      expect(encodeBody({ input: ['a'] })).toEqual({ body: '{"input":["a"]}', contentType: 'application/json' });
    });
  });
});
