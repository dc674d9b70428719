import YAML from 'yaml';
import type { OutputFormat, ResultSummary, TestResult, TestStatus } from '../shared/types.js';

export interface ReportMeta {
  /** Report timestamp, supplied by the caller so identical input formats identically. */
  generatedAt: string;
  title?: string;
}

export type ResultFormatter = (
  results: readonly TestResult[],
  summary: ResultSummary,
  meta: ReportMeta
) => string;

export const RESULT_FILE_EXTENSIONS: Record<OutputFormat, string> = {
  json: '.json',
  yaml: '.yaml',
  text: '.txt',
  junit: '.xml',
  markdown: '.md',
};

export const STATUS_GLYPHS: Record<TestStatus, string> = {
  PASSED: '✓',
  FAILED: '✗',
  SKIPPED: '○',
  ERROR: '!',
  TIMEOUT: '⏱',
};

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

export function summarize(results: readonly TestResult[]): ResultSummary {
  const summary: ResultSummary = { total: results.length, passed: 0, failed: 0, skipped: 0, errors: 0 };
  for (const result of results) {
    switch (result.status) {
      case 'PASSED':
        summary.passed++;
        break;
      case 'FAILED':
        summary.failed++;
        break;
      case 'SKIPPED':
        summary.skipped++;
        break;
      case 'ERROR':
      case 'TIMEOUT':
        summary.errors++;
        break;
    }
  }
  return summary;
}

/** Groups in order of first appearance. */
export function groupResults(results: readonly TestResult[]): Map<string, TestResult[]> {
  const groups = new Map<string, TestResult[]>();
  for (const result of results) {
    const bucket = groups.get(result.testGroup);
    if (bucket) bucket.push(result);
    else groups.set(result.testGroup, [result]);
  }
  return groups;
}

export function passRate(summary: Pick<ResultSummary, 'total' | 'passed'>): number {
  return summary.total > 0 ? (summary.passed / summary.total) * 100 : 0;
}

export function isFailing(status: TestStatus): boolean {
  return status === 'FAILED' || status === 'ERROR' || status === 'TIMEOUT';
}

/** 1 when any test FAILED, ERRORed or TIMED OUT, else 0. */
export function exitCodeFor(results: readonly TestResult[]): 0 | 1 {
  return results.some((result) => isFailing(result.status)) ? 1 : 0;
}

/**
 * Console lines for one finished test. Results that did not pass always print
 * with their message; `verbose` adds passing results and the full trace.
 */
export function formatProgress(result: TestResult, verbose: boolean): string[] {
  const passed = result.status === 'PASSED';
  if (passed && !verbose) return [];

  const lines = [
    `[${STATUS_GLYPHS[result.status]}] ${result.testId} ${result.testName} (${result.testGroup}) - ` +
      `${result.status} [${result.duration.toFixed(3)}s]`,
  ];
  if (passed) return lines;
  if (result.message) lines.push(`    ${result.message}`);
  if (verbose) {
    for (const traceLine of result.error.split('\n').filter(Boolean)) {
      lines.push(`      | ${traceLine}`);
    }
  }
  return lines;
}

function byTestId(a: TestResult, b: TestResult): number {
  const diff = parseInt(a.testId, 10) - parseInt(b.testId, 10);
  return diff !== 0 && !Number.isNaN(diff) ? diff : a.testId.localeCompare(b.testId);
}

function toDocument(results: readonly TestResult[], summary: ResultSummary, meta: ReportMeta) {
  return {
    timestamp: meta.generatedAt,
    summary: { ...summary },
    results: results.map((result) => ({ ...result })),
  };
}

export const formatJson: ResultFormatter = (results, summary, meta) =>
  JSON.stringify(toDocument(results, summary, meta), null, 2);

export const formatYaml: ResultFormatter = (results, summary, meta) =>
  YAML.stringify(toDocument(results, summary, meta));

export const formatText: ResultFormatter = (results, summary, meta) => {
  const lines: string[] = [];
  lines.push(RULE);
  lines.push(meta.title ?? 'S3 Test Results Summary');
  lines.push(RULE);
  lines.push(`Timestamp: ${meta.generatedAt}`);
  lines.push('');

  const counts: Array<[string, number]> = [
    ['Passed', summary.passed],
    ['Failed', summary.failed],
    ['Skipped', summary.skipped],
    ['Errors', summary.errors],
  ];
  lines.push(`Total Tests: ${summary.total}`);
  for (const [label, count] of counts) {
    if (summary.total === 0) {
      lines.push(`${label}: ${count}`);
    } else {
      lines.push(`${label}: ${count} (${((count * 100) / summary.total).toFixed(1)}%)`);
    }
  }
  lines.push('');

  lines.push(THIN_RULE);
  lines.push('Test Results:');
  lines.push(THIN_RULE);

  for (const result of [...results].sort(byTestId)) {
    lines.push(
      `[${STATUS_GLYPHS[result.status]}] ${result.testId}: ${result.testName} ` +
        `(${result.testGroup}) - ${result.status} [${result.duration.toFixed(3)}s]`
    );
    if (result.message && result.status !== 'PASSED') {
      lines.push(`    ${result.message}`);
    }
  }

  lines.push(RULE);
  return lines.join('\n');
};

export function escapeXml(value: string): string {
  return value
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g, '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function seconds(value: number): string {
  return value.toFixed(3);
}

function totalTime(results: readonly TestResult[]): number {
  return results.reduce((sum, result) => sum + result.duration, 0);
}

function junitTestcase(result: TestResult): string[] {
  const open =
    `    <testcase classname="s3.${escapeXml(result.testGroup)}" ` +
    `name="${escapeXml(result.testName)}" time="${seconds(result.duration)}"`;
  const message = escapeXml(result.message);

  switch (result.status) {
    case 'PASSED':
      return [`${open}/>`];
    case 'SKIPPED':
      return [`${open}>`, `      <skipped message="${message}"/>`, '    </testcase>'];
    case 'FAILED':
      return [
        `${open}>`,
        `      <failure message="${message}" type="AssertionError">${escapeXml(result.error)}</failure>`,
        '    </testcase>',
      ];
    case 'ERROR':
    case 'TIMEOUT':
      return [
        `${open}>`,
        `      <error message="${message}" type="${result.status}">${escapeXml(result.error)}</error>`,
        '    </testcase>',
      ];
  }
}

export const formatJunit: ResultFormatter = (results, summary, meta) => {
  const lines: string[] = ['<?xml version="1.0" encoding="UTF-8"?>'];
  lines.push(
    `<testsuites name="${escapeXml(meta.title ?? 'S3 Compatibility Tests')}" ` +
      `timestamp="${escapeXml(meta.generatedAt)}" tests="${summary.total}" ` +
      `failures="${summary.failed}" errors="${summary.errors}" skipped="${summary.skipped}" ` +
      `time="${seconds(totalTime(results))}">`
  );

  for (const [group, members] of groupResults(results)) {
    const groupSummary = summarize(members);
    lines.push(
      `  <testsuite name="${escapeXml(group)}" tests="${groupSummary.total}" ` +
        `failures="${groupSummary.failed}" errors="${groupSummary.errors}" ` +
        `skipped="${groupSummary.skipped}" time="${seconds(totalTime(members))}">`
    );
    for (const result of members) {
      lines.push(...junitTestcase(result));
    }
    lines.push('  </testsuite>');
  }

  lines.push('</testsuites>');
  return lines.join('\n');
};

function titleCase(group: string): string {
  return group
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function rateCell(summary: ResultSummary): string {
  return `${passRate(summary).toFixed(1)}%`;
}

export const formatMarkdown: ResultFormatter = (results, summary, meta) => {
  const lines: string[] = [];
  const groups = groupResults(results);

  lines.push(`# ${meta.title ?? 'S3 Compatibility Report'}`);
  lines.push('');
  lines.push(`Generated: ${meta.generatedAt}`);
  lines.push('');

  lines.push('## Summary');
  lines.push('');
  lines.push('| Group | Passed | Failed | Skipped | Errors | Pass Rate |');
  lines.push('|-------|--------|--------|---------|--------|-----------|');
  for (const [group, members] of groups) {
    const groupSummary = summarize(members);
    const status = groupSummary.failed + groupSummary.errors > 0 ? '⚠️' : '✅';
    lines.push(
      `| ${status} ${titleCase(group)} | ${groupSummary.passed} | ${groupSummary.failed} | ` +
        `${groupSummary.skipped} | ${groupSummary.errors} | ${rateCell(groupSummary)} |`
    );
  }
  lines.push(
    `| **Total** | **${summary.passed}** | **${summary.failed}** | **${summary.skipped}** | ` +
      `**${summary.errors}** | **${rateCell(summary)}** |`
  );
  lines.push('');

  if (summary.failed + summary.errors > 0) {
    lines.push('## Failed Tests');
    lines.push('');

    for (const [group, members] of groups) {
      const failing = [...members].sort(byTestId).filter((result) => isFailing(result.status));
      if (failing.length === 0) continue;

      lines.push(`### ${titleCase(group)}`);
      lines.push('');
      for (const result of failing) {
        lines.push(`- **${result.testId} ${result.testName}** (${result.status})`);
        const shortError = (result.message || result.error).split('\n')[0].substring(0, 100);
        if (shortError) {
          lines.push(`  - \`${shortError}\``);
        }
      }
      lines.push('');
    }
  }

  return lines.join('\n');
};

export const FORMATTERS: Record<OutputFormat, ResultFormatter> = {
  json: formatJson,
  yaml: formatYaml,
  text: formatText,
  junit: formatJunit,
  markdown: formatMarkdown,
};

export function formatResults(format: OutputFormat, results: readonly TestResult[], meta: ReportMeta): string {
  return FORMATTERS[format](results, summarize(results), meta);
}
