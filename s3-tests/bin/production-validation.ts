#!/usr/bin/env npx tsx

import * as path from 'path';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { loadConfig } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { createValidationLogger } from '../shared/logger.js';
import type { SuiteResult, TestResult } from '../shared/types.js';
import { ChildProcessLauncher } from '../runner/child-runner.js';
import { TestDiscovery } from '../runner/discovery.js';
import { STATUS_GLYPHS } from '../runner/formatters.js';
import { DEFAULT_SUITES, DEFAULT_TEST_TIMEOUT_SECONDS, selectSuites } from '../runner/suites.js';
import { ProductionValidator } from '../runner/validation.js';
import { formatValidationSummary, readinessExitCode, saveValidationReport } from '../runner/validation-report.js';
import { defaultOutputDir, parseTimeoutSeconds } from './options.js';

const SELF = fileURLToPath(import.meta.url);
const TESTS_ROOT = path.resolve(path.dirname(SELF), '..');
const RUNNER_SCRIPT = path.join(path.dirname(SELF), `test-runner${path.extname(SELF)}`);

type ValidationOptions = {
  config: string;
  outputDir?: string;
  quick?: boolean;
  timeout: number;
};

const program = new Command('s3-production-validation')
  .description('Decide whether an S3 endpoint is ready for production use')
  .requiredOption('--config <path>', 'configuration file')
  .option('--output-dir <path>', 'directory for validation reports')
  .option('--quick', 'run only the critical and error handling suites')
  .option('--timeout <seconds>', 'per-test time limit', parseTimeoutSeconds, DEFAULT_TEST_TIMEOUT_SECONDS);

function progress(result: TestResult): void {
  console.log(
    `  [${STATUS_GLYPHS[result.status]}] ${result.testId} ${result.testName} - ${result.status} ` +
      `[${result.duration.toFixed(3)}s]${result.status === 'PASSED' ? '' : ` ${result.message}`}`
  );
}

function suiteDone(result: SuiteResult): void {
  console.log(
    `  ${result.meetsRequirement ? 'MEETS' : 'FAILS'} requirement: ${result.passRate.toFixed(1)}% ` +
      `(required ${result.requiredPassRate}%)\n`
  );
}

async function main(): Promise<number> {
  program.parse();
  const opts = program.opts<ValidationOptions>();
  const log = createValidationLogger();

  const configPath = path.resolve(opts.config);
  const { config } = loadConfig(configPath);
  const outputDir = path.resolve(opts.outputDir ?? defaultOutputDir());
  const suites = selectSuites(config.suites ?? DEFAULT_SUITES, opts.quick ?? false);
  const discovery = new TestDiscovery({ root: TESTS_ROOT });

  const launcher = new ChildProcessLauncher({
    command: [process.execPath, ...process.execArgv, RUNNER_SCRIPT],
    configPath,
    outputDir,
    timeoutSeconds: opts.timeout,
    describeTest: (testId) => {
      const unit = discovery.getById(testId);
      return unit && { name: unit.name, group: unit.group };
    },
  });

  log.info(
    { endpoint: config.endpointUrl, suites: suites.map((suite) => suite.key), outputDir },
    'Starting production validation'
  );

  const validator = new ProductionValidator({
    suites,
    launcher,
    target: { endpoint: config.endpointUrl, vendor: config.vendorType },
    listener: {
      onSuiteStart: (suite) => console.log(`${suite.name} (${suite.tests.length} tests)`),
      onTestComplete: (_suite, result) => progress(result),
      onSuiteComplete: suiteDone,
    },
  });

  const report = await validator.validate();
  const saved = await saveValidationReport(report, outputDir);

  console.log(formatValidationSummary(report));
  console.log(`Reports saved to ${saved.json} and ${saved.text}`);
  return readinessExitCode(report);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    createValidationLogger().fatal({ err: error }, `Validation failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
