import YAML from 'yaml';
import { describe, expect, it } from 'vitest';
import { createTestResult } from '../shared/test-utils.js';
import { OUTPUT_FORMATS, type TestResult, type TestStatus } from '../shared/types.js';
import {
  escapeXml,
  exitCodeFor,
  formatJson,
  formatJunit,
  formatMarkdown,
  formatProgress,
  formatResults,
  formatText,
  formatYaml,
  groupResults,
  summarize,
} from './formatters.js';

const TIMESTAMP = '2024-05-01T12:00:00.000Z';
const meta = { generatedAt: TIMESTAMP };

function result(
  id: string,
  group: string,
  status: TestStatus,
  duration: number,
  message = '',
  error = ''
): TestResult {
  return createTestResult({ id, name: `test_${id}`, group }, status, duration, TIMESTAMP, message, error);
}

// Two groups: basic has 2 passed and 1 failed, multipart has 1 passed.
const twoGroups: TestResult[] = [
  result('001', 'basic', 'PASSED', 1, 'Test passed successfully'),
  result('002', 'basic', 'FAILED', 2, 'Size mismatch: expected 10, got 5', 'AssertionError: Size mismatch'),
  result('004', 'basic', 'PASSED', 0.5, 'Test passed successfully'),
  result('100', 'multipart', 'PASSED', 0.25, 'Test passed successfully'),
];

describe('summarize', () => {
  it('counts each status and folds TIMEOUT into errors', () => {
    const summary = summarize([
      result('001', 'basic', 'PASSED', 1),
      result('002', 'basic', 'FAILED', 1, 'bad'),
      result('003', 'basic', 'SKIPPED', 0, 'n/a'),
      result('004', 'basic', 'ERROR', 1, 'boom'),
      result('005', 'basic', 'TIMEOUT', 300, 'Test timeout (>300s)'),
    ]);

    expect(summary).toEqual({ total: 5, passed: 1, failed: 1, skipped: 1, errors: 2 });
    expect(summary.passed + summary.failed + summary.skipped + summary.errors).toBe(summary.total);
  });

  it('returns zeros for no results', () => {
    expect(summarize([])).toEqual({ total: 0, passed: 0, failed: 0, skipped: 0, errors: 0 });
  });
});

describe('groupResults', () => {
  it('keeps groups in order of first appearance', () => {
    const groups = groupResults([
      result('100', 'multipart', 'PASSED', 1),
      result('001', 'basic', 'PASSED', 1),
      result('101', 'multipart', 'PASSED', 1),
    ]);

    expect([...groups.keys()]).toEqual(['multipart', 'basic']);
    expect(groups.get('multipart')?.map((r) => r.testId)).toEqual(['100', '101']);
  });
});

describe('formatJson and formatYaml', () => {
  const expected = {
    timestamp: TIMESTAMP,
    summary: { total: 4, passed: 3, failed: 1, skipped: 0, errors: 0 },
    results: twoGroups,
  };

  it('serializes the summary and every result field as JSON', () => {
    expect(JSON.parse(formatJson(twoGroups, summarize(twoGroups), meta))).toEqual(expected);
  });

  it('serializes the same document as YAML', () => {
    expect(YAML.parse(formatYaml(twoGroups, summarize(twoGroups), meta))).toEqual(expected);
  });
});

describe('formatText', () => {
  it('prints percentages and sorts results by test ID', () => {
    const results = [
      result('012', 'basic', 'FAILED', 0.25, 'Size mismatch: expected 10, got 5', 'trace'),
      result('002', 'basic', 'PASSED', 1.5, 'Test passed successfully'),
    ];

    const lines = formatText(results, summarize(results), meta).split('\n');

    expect(lines[1]).toBe('S3 Test Results Summary');
    expect(lines[3]).toBe(`Timestamp: ${TIMESTAMP}`);
    expect(lines.slice(5, 10)).toEqual([
      'Total Tests: 2',
      'Passed: 1 (50.0%)',
      'Failed: 1 (50.0%)',
      'Skipped: 0 (0.0%)',
      'Errors: 0 (0.0%)',
    ]);
    expect(lines.slice(14, 17)).toEqual([
      '[✓] 002: test_002 (basic) - PASSED [1.500s]',
      '[✗] 012: test_012 (basic) - FAILED [0.250s]',
      '    Size mismatch: expected 10, got 5',
    ]);
    expect(lines[lines.length - 1]).toBe('='.repeat(80));
  });

  it('omits percentages when there are no results', () => {
    const lines = formatText([], summarize([]), meta).split('\n');

    expect(lines.slice(5, 10)).toEqual(['Total Tests: 0', 'Passed: 0', 'Failed: 0', 'Skipped: 0', 'Errors: 0']);
  });
});

describe('formatJunit', () => {
  const xml = formatJunit(twoGroups, summarize(twoGroups), meta);
  const lines = xml.split('\n');

  it('emits one testsuite per group with per-group counts', () => {
    expect(xml.match(/<testsuite /g)).toHaveLength(2);
    expect(lines).toContain(
      '  <testsuite name="basic" tests="3" failures="1" errors="0" skipped="0" time="3.500">'
    );
    expect(lines).toContain(
      '  <testsuite name="multipart" tests="1" failures="0" errors="0" skipped="0" time="0.250">'
    );
  });

  it('totals every group on the root element', () => {
    expect(lines[1]).toBe(
      `<testsuites name="S3 Compatibility Tests" timestamp="${TIMESTAMP}" tests="4" ` +
        'failures="1" errors="0" skipped="0" time="3.750">'
    );
  });

  it('attaches the message and trace to failing test cases', () => {
    expect(lines).toContain('    <testcase classname="s3.basic" name="test_002" time="2.000">');
    expect(lines).toContain(
      '      <failure message="Size mismatch: expected 10, got 5" type="AssertionError">' +
        'AssertionError: Size mismatch</failure>'
    );
    expect(lines).toContain('    <testcase classname="s3.basic" name="test_001" time="1.000"/>');
  });

  it('writes error and skipped children', () => {
    const results = [
      result('600', 'performance', 'TIMEOUT', 300, 'Test timeout (>300s)'),
      result('601', 'performance', 'ERROR', 1, 'Test error: <refused>', 'Error: <refused>'),
      result('602', 'performance', 'SKIPPED', 0, 'not applicable'),
    ];
    const out = formatJunit(results, summarize(results), meta).split('\n');

    expect(out).toContain('      <error message="Test timeout (&gt;300s)" type="TIMEOUT"></error>');
    expect(out).toContain(
      '      <error message="Test error: &lt;refused&gt;" type="ERROR">Error: &lt;refused&gt;</error>'
    );
    expect(out).toContain('      <skipped message="not applicable"/>');
  });
});

describe('escapeXml', () => {
  it('escapes markup characters and drops control characters', () => {
    expect(escapeXml(`<a & "b" 'c'>\u0001`)).toBe('&lt;a &amp; &quot;b&quot; &apos;c&apos;&gt;');
  });
});

describe('formatMarkdown', () => {
  const lines = formatMarkdown(twoGroups, summarize(twoGroups), meta).split('\n');

  it('tabulates each group and the total', () => {
    expect(lines).toContain('| ⚠️ Basic | 2 | 1 | 0 | 0 | 66.7% |');
    expect(lines).toContain('| ✅ Multipart | 1 | 0 | 0 | 0 | 100.0% |');
    expect(lines).toContain('| **Total** | **3** | **1** | **0** | **0** | **75.0%** |');
  });

  it('lists failing tests under their group', () => {
    const section = lines.indexOf('## Failed Tests');

    expect(section).toBeGreaterThan(0);
    expect(lines.slice(section + 2, section + 6)).toEqual([
      '### Basic',
      '',
      '- **002 test_002** (FAILED)',
      '  - `Size mismatch: expected 10, got 5`',
    ]);
  });
});

describe('formatResults', () => {
  it('produces identical output for identical input in every format', () => {
    for (const format of OUTPUT_FORMATS) {
      expect(formatResults(format, twoGroups, meta)).toBe(formatResults(format, twoGroups, meta));
    }
  });

  it('agrees on summary counts across formats', () => {
    const document = JSON.parse(formatResults('json', twoGroups, meta));
    const junit = formatResults('junit', twoGroups, meta);

    expect(document.summary.failed).toBe(1);
    expect(junit).toContain('tests="4" failures="1" errors="0" skipped="0"');
  });
});

describe('formatProgress', () => {
  const failure = result(
    '005',
    'basic',
    'ERROR',
    0.086,
    'Test error: connect ECONNREFUSED 127.0.0.1:9000',
    'Error: connect ECONNREFUSED 127.0.0.1:9000\n    at TCPConnectWrap.afterConnect'
  );

  it('prints failures with their message but without the trace by default', () => {
    expect(formatProgress(failure, false)).toEqual([
      '[!] 005 test_005 (basic) - ERROR [0.086s]',
      '    Test error: connect ECONNREFUSED 127.0.0.1:9000',
    ]);
  });

  it('adds the full trace in verbose mode', () => {
    expect(formatProgress(failure, true)).toEqual([
      '[!] 005 test_005 (basic) - ERROR [0.086s]',
      '    Test error: connect ECONNREFUSED 127.0.0.1:9000',
      '      | Error: connect ECONNREFUSED 127.0.0.1:9000',
      '      |     at TCPConnectWrap.afterConnect',
    ]);
  });

  it('prints passing tests only in verbose mode', () => {
    const passed = twoGroups[0];

    expect(formatProgress(passed, false)).toEqual([]);
    expect(formatProgress(passed, true)).toEqual(['[✓] 001 test_001 (basic) - PASSED [1.000s]']);
  });

  it('prints a skip reason without a trace', () => {
    const skip = result('200', 'versioning', 'SKIPPED', 0, 'Versioning not implemented');

    expect(formatProgress(skip, true)).toEqual([
      '[○] 200 test_200 (versioning) - SKIPPED [0.000s]',
      '    Versioning not implemented',
    ]);
  });
});

describe('exitCodeFor', () => {
  it('is 0 when nothing failed, errored or timed out', () => {
    expect(exitCodeFor([])).toBe(0);
    expect(exitCodeFor([twoGroups[0], result('200', 'versioning', 'SKIPPED', 0, 'skipped')])).toBe(0);
  });

  it.each(['FAILED', 'ERROR', 'TIMEOUT'] as const)('is 1 when a test is %s', (status) => {
    expect(exitCodeFor([twoGroups[0], result('011', 'basic', status, 1, status)])).toBe(1);
  });
});
