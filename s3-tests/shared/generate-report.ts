#!/usr/bin/env npx tsx

import * as fs from 'fs';
import * as path from 'path';
import { formatMarkdown, summarize } from '../runner/formatters.js';
import { parseResultsDocument } from '../runner/results-document.js';
import { errnoCode, errorMessage } from './errors.js';
import { createRunnerLogger } from './logger.js';

const DEFAULT_RESULTS_PATH = path.join('results', 'results.json');
const REPORT_FILE = 'COMPATIBILITY.md';

function main(): number {
  const log = createRunnerLogger();
  const resultsPath = path.resolve(process.argv[2] ?? DEFAULT_RESULTS_PATH);

  let text: string;
  try {
    text = fs.readFileSync(resultsPath, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      console.error(`No results found at ${resultsPath}`);
      console.error('Run the test runner with --output-format json first.');
    } else {
      log.error({ path: resultsPath, err: error }, 'Cannot read results file');
    }
    return 1;
  }

  const parsed = parseResultsDocument(text);
  if (!parsed.ok) {
    console.error(`${resultsPath}: ${parsed.error}`);
    return 1;
  }

  const { document } = parsed;
  const report = formatMarkdown(document.results, summarize(document.results), {
    generatedAt: document.timestamp,
  });

  const reportPath = path.join(path.dirname(resultsPath), REPORT_FILE);
  fs.writeFileSync(reportPath, `${report}\n`, 'utf-8');

  console.log(report);
  console.log(`\nReport written to: ${reportPath}`);
  return 0;
}

try {
  process.exitCode = main();
} catch (error) {
  createRunnerLogger().fatal({ err: error }, `Report generation failed: ${errorMessage(error)}`);
  process.exitCode = 1;
}
