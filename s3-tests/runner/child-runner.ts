import { spawn, type SpawnOptions } from 'node:child_process';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { errnoCode, errorMessage, errorTrace } from '../shared/errors.js';
import { createValidationLogger } from '../shared/logger.js';
import { createTestResult } from '../shared/test-utils.js';
import type { TestResult } from '../shared/types.js';
import { normalizeTestId } from './discovery.js';
import { parseResultsDocument } from './results-document.js';
import { DEFAULT_TEST_TIMEOUT_SECONDS, MAX_TEST_TIMEOUT_SECONDS } from './suites.js';

/** Runs one test by ID and always produces a result; never rejects for test-level faults. */
export interface TestLauncher {
  launch(testId: string): Promise<TestResult>;
}

/** The slice of `ChildProcess` the launcher relies on. */
export interface ChildHandle {
  readonly stdout: NodeJS.ReadableStream | null;
  readonly stderr: NodeJS.ReadableStream | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'error', listener: (error: Error) => void): this;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildHandle;

export interface ChildProcessLauncherOptions {
  /** Executable followed by its leading arguments, e.g. node, loader flags and the runner script. */
  command: readonly string[];
  configPath: string;
  outputDir: string;
  timeoutSeconds?: number;
  /** Resolves display name and group for synthetic results. */
  describeTest?: (testId: string) => { name: string; group: string } | undefined;
  spawn?: SpawnFn;
}

type ChildExit =
  | { kind: 'exited'; code: number | null; signal: NodeJS.Signals | null; stdout: string; stderr: string }
  | { kind: 'timeout'; stdout: string; stderr: string }
  | { kind: 'spawn_error'; error: unknown };

export const RESULT_FILE_NAME = 'results.json';

const ERROR_LINE = /error|failed/i;

const defaultSpawn: SpawnFn = (command, args, options) => spawn(command, [...args], options);

/** First output line that mentions an error or failure, trimmed. */
export function extractErrorLine(...outputs: string[]): string | undefined {
  for (const output of outputs) {
    const line = output
      .split(/\r?\n/)
      .map((candidate) => candidate.trim())
      .find((candidate) => candidate.length > 0 && ERROR_LINE.test(candidate));
    if (line) return line;
  }
  return undefined;
}

/**
 * Launches the test runner once per test in its own process, so a unit that
 * hangs or corrupts process state affects only its own child. The child hands
 * its result back as a `json` results file in a per-test output directory.
 */
export class ChildProcessLauncher implements TestLauncher {
  private readonly timeoutSeconds: number;
  private readonly spawnFn: SpawnFn;
  private readonly log = createValidationLogger();

  constructor(private readonly options: ChildProcessLauncherOptions) {
    if (options.command.length === 0) {
      throw new Error('ChildProcessLauncher needs a command to run');
    }
    this.timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TEST_TIMEOUT_SECONDS;
    if (
      !Number.isFinite(this.timeoutSeconds) ||
      this.timeoutSeconds <= 0 ||
      this.timeoutSeconds > MAX_TEST_TIMEOUT_SECONDS
    ) {
      throw new RangeError(
        `Test timeout must be between 0 and ${MAX_TEST_TIMEOUT_SECONDS} seconds, got ${this.timeoutSeconds}`
      );
    }
    this.spawnFn = options.spawn ?? defaultSpawn;
  }

  async launch(testId: string): Promise<TestResult> {
    const id = normalizeTestId(testId) ?? testId;
    const unit = { id, ...(this.options.describeTest?.(id) ?? { name: `test_${id}`, group: 'unknown' }) };
    const timestamp = new Date().toISOString();
    const resultDir = path.join(this.options.outputDir, 'tests', id);
    const resultFile = path.join(resultDir, RESULT_FILE_NAME);

    try {
      await fs.mkdir(resultDir, { recursive: true });
      await fs.rm(resultFile, { force: true });
    } catch (error) {
      return createTestResult(
        unit,
        'ERROR',
        0,
        timestamp,
        `Test error: Cannot prepare result directory ${resultDir}: ${errorMessage(error)}`,
        errorTrace(error)
      );
    }

    const [executable, ...leadingArgs] = this.options.command;
    const args = [
      ...leadingArgs,
      '--config',
      this.options.configPath,
      '--test',
      id,
      '--output-dir',
      resultDir,
      '--output-format',
      'json',
    ];

    const start = performance.now();
    const exit = await this.run(executable, args);
    const duration = (performance.now() - start) / 1000;

    switch (exit.kind) {
      case 'timeout':
        this.log.warn({ testId: id, timeoutSeconds: this.timeoutSeconds }, 'Test timed out; child killed');
        return createTestResult(
          unit,
          'TIMEOUT',
          this.timeoutSeconds,
          timestamp,
          `Test timeout (>${this.timeoutSeconds}s)`
        );
      case 'spawn_error':
        this.log.error({ testId: id, err: exit.error }, 'Cannot launch test runner');
        return createTestResult(
          unit,
          'ERROR',
          duration,
          timestamp,
          `Test error: Cannot launch test runner: ${errorMessage(exit.error)}`,
          errorTrace(exit.error)
        );
      case 'exited':
        return this.collect(unit, exit, resultFile, duration, timestamp);
    }
  }

  private async collect(
    unit: { id: string; name: string; group: string },
    exit: Extract<ChildExit, { kind: 'exited' }>,
    resultFile: string,
    duration: number,
    timestamp: string
  ): Promise<TestResult> {
    let problem: string;
    try {
      const parsed = parseResultsDocument(await fs.readFile(resultFile, 'utf-8'));
      if (parsed.ok) {
        const record = parsed.document.results.find((result) => result.testId === unit.id);
        if (record) {
          return { ...record, duration: Math.max(0, duration) };
        }
        problem = `no record for test ${unit.id} in ${resultFile}`;
      } else {
        problem = parsed.error;
      }
    } catch (error) {
      problem = errnoCode(error) === 'ENOENT' ? 'no result file written' : errorMessage(error);
    }

    this.log.debug({ testId: unit.id, code: exit.code, signal: exit.signal, problem }, 'No structured result');
    const message =
      extractErrorLine(exit.stderr, exit.stdout) ??
      (exit.signal
        ? `Test runner terminated by ${exit.signal}`
        : `Test runner exited with code ${exit.code ?? 'unknown'}`);
    const detail = [`Result: ${problem}`, exit.stderr.trim(), exit.stdout.trim()].filter(Boolean).join('\n\n');
    return createTestResult(unit, 'ERROR', duration, timestamp, `Test error: ${message}`, detail);
  }

  private run(executable: string, args: readonly string[]): Promise<ChildExit> {
    return new Promise((resolve) => {
      let stdout = '';
      let stderr = '';
      let settled = false;
      let timer: NodeJS.Timeout | undefined;

      const settle = (exit: ChildExit) => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        resolve(exit);
      };

      let child: ChildHandle;
      try {
        child = this.spawnFn(executable, args, { stdio: ['ignore', 'pipe', 'pipe'], env: process.env });
      } catch (error) {
        settle({ kind: 'spawn_error', error });
        return;
      }

      child.stdout?.on('data', (chunk: Buffer | string) => {
        stdout += chunk.toString();
      });
      child.stderr?.on('data', (chunk: Buffer | string) => {
        stderr += chunk.toString();
      });

      child.once('error', (error) => settle({ kind: 'spawn_error', error }));
      child.once('close', (code, signal) => settle({ kind: 'exited', code, signal, stdout, stderr }));

      timer = setTimeout(() => {
        child.kill('SIGKILL');
        settle({ kind: 'timeout', stdout, stderr });
      }, this.timeoutSeconds * 1000);
    });
  }
}
