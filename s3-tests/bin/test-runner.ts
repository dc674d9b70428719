#!/usr/bin/env npx tsx

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { Command, Option } from 'commander';
import { loadConfig } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { createRunnerLogger, setLogLevel } from '../shared/logger.js';
import { closeSharedS3Client, getSharedS3Client } from '../shared/s3-client.js';
import { OUTPUT_FORMATS, type OutputFormat, type TestResult } from '../shared/types.js';
import { TestDiscovery } from '../runner/discovery.js';
import { TestExecutor } from '../runner/executor.js';
import {
  RESULT_FILE_EXTENSIONS,
  exitCodeFor,
  formatProgress,
  formatResults,
  formatText,
  summarize,
} from '../runner/formatters.js';
import { selectTests } from '../runner/selection.js';

/** Directory holding the group directories (basic/, multipart/, ...). */
const TESTS_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

type RunnerOptions = {
  config: string;
  test?: string;
  group?: string;
  outputDir: string;
  outputFormat: OutputFormat;
  verbose?: boolean;
  listTests?: boolean;
};

const program = new Command('s3-test-runner')
  .description('Run S3 compatibility tests against a configured endpoint')
  .option('-c, --config <path>', 'configuration file', 's3_config.yaml')
  .option('-t, --test <id>', 'run a single test by ID')
  .option('-g, --group <name>', 'run every test in a group')
  .option('-o, --output-dir <path>', 'directory for the results file', 'results')
  .addOption(
    new Option('-f, --output-format <format>', 'results file format').choices(OUTPUT_FORMATS).default('text')
  )
  .option('-v, --verbose', 'log every test as it runs')
  .option('-l, --list-tests', 'list discovered tests and exit');

function listTests(discovery: TestDiscovery): void {
  for (const group of discovery.groups()) {
    const units = discovery.getByGroup(group);
    if (units.length === 0) continue;
    console.log(`${group}:`);
    for (const unit of units) {
      console.log(`  ${unit.id}  ${path.relative(TESTS_ROOT, unit.location)}`);
    }
  }
}

async function main(): Promise<number> {
  program.parse();
  const opts = program.opts<RunnerOptions>();
  const verbose = opts.verbose ?? false;
  if (verbose) {
    setLogLevel('debug');
  }
  const log = createRunnerLogger();

  const { config, source } = loadConfig(opts.config);
  const discovery = new TestDiscovery({ root: TESTS_ROOT });

  if (opts.listTests) {
    listTests(discovery);
    return 0;
  }

  const selection = selectTests(discovery, { test: opts.test, group: opts.group }, config);
  if (!selection.ok) {
    console.error(selection.error);
    return 1;
  }

  log.info(
    { endpoint: config.endpointUrl, configSource: source, count: selection.tests.length },
    'Running S3 compatibility tests'
  );

  const executor = new TestExecutor(getSharedS3Client(config), config);
  const results: TestResult[] = [];
  for (const unit of selection.tests) {
    const result = await executor.execute(unit);
    results.push(result);
    for (const line of formatProgress(result, verbose)) {
      console.log(line);
    }
  }

  const meta = { generatedAt: new Date().toISOString() };
  fs.mkdirSync(opts.outputDir, { recursive: true });
  const outputFile = path.join(opts.outputDir, `results${RESULT_FILE_EXTENSIONS[opts.outputFormat]}`);
  fs.writeFileSync(outputFile, `${formatResults(opts.outputFormat, results, meta)}\n`, 'utf-8');

  const summary = summarize(results);
  console.log(formatText(results, summary, meta));
  console.log(`Results saved to ${outputFile}`);

  return exitCodeFor(results);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    createRunnerLogger().fatal({ err: error }, `Test run failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  })
  .finally(() => {
    closeSharedS3Client();
  });
