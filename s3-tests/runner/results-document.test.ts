import { describe, expect, it } from 'vitest';
import { createTestResult } from '../shared/test-utils.js';
import { formatJson, summarize } from './formatters.js';
import { parseResultsDocument } from './results-document.js';

describe('parseResultsDocument', () => {
  it('reads what formatJson writes', () => {
    const results = [
      createTestResult({ id: '001', name: 'test_001', group: 'basic' }, 'PASSED', 0.4, '2024-05-01T12:00:00.000Z'),
    ];
    const text = formatJson(results, summarize(results), { generatedAt: '2024-05-01T12:00:01.000Z' });

    expect(parseResultsDocument(text)).toEqual({
      ok: true,
      document: {
        timestamp: '2024-05-01T12:00:01.000Z',
        summary: { total: 1, passed: 1, failed: 0, skipped: 0, errors: 0 },
        results,
      },
    });
  });

  it('rejects text that is not JSON', () => {
    const parsed = parseResultsDocument('{');

    expect(parsed.ok).toBe(false);
    expect(parsed.ok ? '' : parsed.error).toMatch(/^Results file is not valid JSON: /);
  });

  it('names the first field with an unexpected shape', () => {
    const parsed = parseResultsDocument(
      JSON.stringify({
        timestamp: 'now',
        summary: { total: 1, passed: 1, failed: 0, skipped: 0, errors: 0 },
        results: [
          {
            testId: '001',
            testName: 'test_001',
            testGroup: 'basic',
            status: 'MAYBE',
            duration: 1,
            message: '',
            error: '',
            timestamp: 'now',
          },
        ],
      })
    );

    expect(parsed.ok).toBe(false);
    expect(parsed.ok ? '' : parsed.error).toMatch(/^Results file has an unexpected shape at results\.0\.status: /);
  });
});
