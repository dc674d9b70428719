import { z } from 'zod';
import { errorMessage } from '../shared/errors.js';
import { TEST_STATUSES, type ResultSummary, type TestResult } from '../shared/types.js';

const TestResultSchema = z.object({
  testId: z.string(),
  testName: z.string(),
  testGroup: z.string(),
  status: z.enum(TEST_STATUSES),
  duration: z.number().nonnegative(),
  message: z.string(),
  error: z.string(),
  timestamp: z.string(),
});

const ResultsDocumentSchema = z.object({
  timestamp: z.string(),
  summary: z.object({
    total: z.number().int().nonnegative(),
    passed: z.number().int().nonnegative(),
    failed: z.number().int().nonnegative(),
    skipped: z.number().int().nonnegative(),
    errors: z.number().int().nonnegative(),
  }),
  results: z.array(TestResultSchema),
});

/** The `json` output format, as written by the test runner. */
export interface ResultsDocument {
  timestamp: string;
  summary: ResultSummary;
  results: TestResult[];
}

export type ParseResult = { ok: true; document: ResultsDocument } | { ok: false; error: string };

export function parseResultsDocument(text: string): ParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return { ok: false, error: `Results file is not valid JSON: ${errorMessage(error)}` };
  }

  const parsed = ResultsDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, error: `Results file has an unexpected shape at ${issue.path.join('.') || '<root>'}: ${issue.message}` };
  }
  return { ok: true, document: parsed.data };
}
