import { describe, expect, it } from 'vitest';

import { InstrumentationCollector, sanitizeEndpoint, type RequestMetric } from '../instrumentation.js';

describe('Instrumentation Utilities', () => {
  describe('sanitizeEndpoint', () => {
    it('should strip hex keys', () => {
      const url = '/api/v1/0a1b2c3d4e5f6a7b8c9d0e1f2a3b4c5d/data';
      expect(sanitizeEndpoint(url)).toBe('/api/v1/{id}/data');
    });

    it('should strip long base64-like segments', () => {
      const url = '/threads/AbCdEfGhIjKlMnOpQrStUvWxYz0123456789_-AbCd/messages';
      expect(sanitizeEndpoint(url)).toBe('/threads/{token}/messages');
    });

    it('should keep ordinary deployment names', () => {
      expect(sanitizeEndpoint('/openai/deployments/model-2024-07-18/chat/completions')).toBe(
        '/openai/deployments/model-2024-07-18/chat/completions'
      );
    });

    it('should handle full URLs by keeping only pathname', () => {
      expect(sanitizeEndpoint('https://api.example.com/api/v1/users')).toBe('/api/v1/users');
    });

    it('should resolve a bare segment against the root', () => {
      expect(sanitizeEndpoint('not-a-url')).toBe('/not-a-url');
    });

    it('should drop query parameters', () => {
      expect(sanitizeEndpoint('/api/v1/data?api-key=test-secret')).toBe('/api/v1/data');
    });
  });

  describe('InstrumentationCollector', () => {
    const metric = (overrides: Partial<RequestMetric>): RequestMetric => ({
      attempt: 0,
      durationMs: 100,
      endpoint: '/chat/completions',
      method: 'POST',
      status: 200,
      streaming: false,
      timestamp: 1000,
      ...overrides,
    });

    it('should summarize recorded attempts', () => {
      const collector = new InstrumentationCollector();

      collector.record(metric({ durationMs: 100, status: 503 }));
      collector.record(metric({ attempt: 1, durationMs: 300, status: 200 }));
      collector.record(metric({ durationMs: 200, endpoint: '/models', error: 'HttpError', method: 'GET', status: 0 }));

      const summary = collector.getSummary();

      expect(summary.total).toBe(3);
      expect(summary.failures).toBe(2);
      expect(summary.retries).toBe(1);
      expect(summary.avgDuration).toBe(200);
      expect(summary.byStatus).toEqual({ '0': 1, '200': 1, '503': 1 });
      expect(summary.byEndpoint).toEqual({
        'GET /models': { avgDuration: 200, calls: 1 },
        'POST /chat/completions': { avgDuration: 200, calls: 2 },
      });
    });

    it('should return an empty summary and clear', () => {
      const collector = new InstrumentationCollector();
      collector.record(metric({}));
      collector.clear();

      expect(collector.getMetrics()).toEqual([]);
      expect(collector.getSummary()).toEqual({
        total: 0,
        failures: 0,
        retries: 0,
        avgDuration: 0,
        byStatus: {},
        byEndpoint: {},
      });
    });
  });
});
