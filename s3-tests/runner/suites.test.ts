import { describe, expect, it } from 'vitest';
import { CRITICAL_SUITE_KEY, DEFAULT_SUITES, selectSuites } from './suites.js';

describe('DEFAULT_SUITES', () => {
  it('includes a critical suite requiring every test to pass', () => {
    const critical = DEFAULT_SUITES.find((suite) => suite.key === CRITICAL_SUITE_KEY);

    expect(critical?.tests).toEqual(['004', '005', '006']);
    expect(critical?.requiredPassRate).toBe(100);
  });

  it('uses unique keys', () => {
    const keys = DEFAULT_SUITES.map((suite) => suite.key);
    expect(new Set(keys).size).toBe(keys.length);
  });
});

describe('selectSuites', () => {
  it('keeps only the critical and error handling suites in quick mode', () => {
    expect(selectSuites(DEFAULT_SUITES, true).map((suite) => suite.key)).toEqual(['critical', 'error_handling']);
  });

  it('keeps every suite otherwise', () => {
    expect(selectSuites(DEFAULT_SUITES, false)).toEqual(DEFAULT_SUITES);
  });
});
