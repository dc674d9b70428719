import { EventEmitter } from 'node:events';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PassThrough } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTestResult } from '../shared/test-utils.js';
import {
  ChildProcessLauncher,
  RESULT_FILE_NAME,
  extractErrorLine,
  type ChildHandle,
  type SpawnFn,
} from './child-runner.js';
import { formatJson, summarize } from './formatters.js';
import { MAX_TEST_TIMEOUT_SECONDS } from './suites.js';

class FakeChild extends EventEmitter implements ChildHandle {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly signals: NodeJS.Signals[] = [];

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    return true;
  }

  /** Writes output, then exits on the next turn of the event loop. */
  exit(code: number | null, output: { stdout?: string; stderr?: string } = {}): void {
    if (output.stdout) this.stdout.write(output.stdout);
    if (output.stderr) this.stderr.write(output.stderr);
    setImmediate(() => this.emit('close', code, null));
  }
}

function argValue(args: readonly string[], flag: string): string {
  return args[args.indexOf(flag) + 1];
}

describe('extractErrorLine', () => {
  it('returns the first line mentioning an error or failure', () => {
    expect(extractErrorLine('starting\n  Error: connect ECONNREFUSED  \nmore')).toBe(
      'Error: connect ECONNREFUSED'
    );
    expect(extractErrorLine('all good', 'upload FAILED')).toBe('upload FAILED');
  });

  it('returns undefined when nothing matches', () => {
    expect(extractErrorLine('', 'done\n')).toBeUndefined();
  });
});

describe('ChildProcessLauncher', () => {
  let outputDir: string;
  let child: FakeChild;
  let calls: Array<{ command: string; args: readonly string[] }>;

  const recordingSpawn =
    (onSpawn: (child: FakeChild, args: readonly string[]) => void): SpawnFn =>
    (command, args) => {
      calls.push({ command, args });
      onSpawn(child, args);
      return child;
    };

  const launcher = (spawn: SpawnFn, timeoutSeconds = 5) =>
    new ChildProcessLauncher({
      command: ['node', '--import', 'tsx', 'test-runner.ts'],
      configPath: '/etc/s3_config.yaml',
      outputDir,
      timeoutSeconds,
      describeTest: (id) => (id === '004' ? { name: 'test_004', group: 'basic' } : undefined),
      spawn,
    });

  beforeEach(() => {
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 's3-launcher-'));
    child = new FakeChild();
    calls = [];
  });

  afterEach(() => {
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it('runs the test runner for one test with json output into a per-test directory', async () => {
    const result = await launcher(recordingSpawn((c) => c.exit(1))).launch('4');

    const testDir = path.join(outputDir, 'tests', '004');
    expect(calls).toEqual([
      {
        command: 'node',
        args: [
          '--import',
          'tsx',
          'test-runner.ts',
          '--config',
          '/etc/s3_config.yaml',
          '--test',
          '004',
          '--output-dir',
          testDir,
          '--output-format',
          'json',
        ],
      },
    ]);
    expect(fs.statSync(testDir).isDirectory()).toBe(true);
    expect(result.testId).toBe('004');
  });

  it('takes status and message from the results file the child writes', async () => {
    const handedBack = createTestResult(
      { id: '004', name: 'test_004', group: 'basic' },
      'FAILED',
      12,
      '2024-05-01T12:00:00.000Z',
      "ETag abc doesn't match MD5 def",
      'AssertionError: ETag mismatch'
    );
    const spawn = recordingSpawn((c, args) => {
      const document = formatJson([handedBack], summarize([handedBack]), { generatedAt: handedBack.timestamp });
      fs.writeFileSync(path.join(argValue(args, '--output-dir'), RESULT_FILE_NAME), document);
      c.exit(1, { stdout: 'Failed: 1' });
    });

    const result = await launcher(spawn).launch('004');

    expect(result.status).toBe('FAILED');
    expect(result.message).toBe("ETag abc doesn't match MD5 def");
    expect(result.error).toBe('AssertionError: ETag mismatch');
    expect(result.timestamp).toBe('2024-05-01T12:00:00.000Z');
    // Duration is measured by the parent, not copied from the child.
    expect(result.duration).toBeLessThan(12);
  });

  it('ignores a stale results file from an earlier run', async () => {
    const testDir = path.join(outputDir, 'tests', '004');
    fs.mkdirSync(testDir, { recursive: true });
    fs.writeFileSync(path.join(testDir, RESULT_FILE_NAME), '{"stale": true}');

    const result = await launcher(recordingSpawn((c) => c.exit(2))).launch('004');

    expect(result.status).toBe('ERROR');
    expect(result.message).toBe('Test error: Test runner exited with code 2');
    expect(result.error).toContain('Result: no result file written');
  });

  it('falls back to the first error line of the output when no results file exists', async () => {
    const spawn = recordingSpawn((c) =>
      c.exit(1, { stdout: 'Running test 004\n', stderr: 'Error: connect ECONNREFUSED 127.0.0.1:9000\n' })
    );

    const result = await launcher(spawn).launch('004');

    expect(result.status).toBe('ERROR');
    expect(result.message).toBe('Test error: Error: connect ECONNREFUSED 127.0.0.1:9000');
    expect(result.testName).toBe('test_004');
    expect(result.testGroup).toBe('basic');
  });

  it('reports a malformed results file', async () => {
    const spawn = recordingSpawn((c, args) => {
      fs.writeFileSync(path.join(argValue(args, '--output-dir'), RESULT_FILE_NAME), 'not json');
      c.exit(0);
    });

    const result = await launcher(spawn).launch('004');

    expect(result.status).toBe('ERROR');
    expect(result.message).toBe('Test error: Test runner exited with code 0');
    expect(result.error).toMatch(/^Result: Results file is not valid JSON/);
  });

  it('kills a child that outlives the bound and reports TIMEOUT with the bound as duration', async () => {
    const result = await launcher(recordingSpawn(() => undefined), 0.05).launch('004');

    expect(child.signals).toEqual(['SIGKILL']);
    expect(result.status).toBe('TIMEOUT');
    expect(result.duration).toBe(0.05);
    expect(result.message).toBe('Test timeout (>0.05s)');
    expect(result.error).toBe('');
  });

  it('waits out a child under the largest allowed bound instead of killing it at once', async () => {
    const spawn = recordingSpawn((c) => {
      setTimeout(() => c.emit('close', 0, null), 50);
    });

    const result = await launcher(spawn, MAX_TEST_TIMEOUT_SECONDS).launch('004');

    expect(child.signals).toEqual([]);
    expect(result.status).toBe('ERROR');
    expect(result.message).toBe('Test error: Test runner exited with code 0');
  });

  it('rejects bounds a timer cannot hold', () => {
    expect(() => launcher(recordingSpawn(() => undefined), 3_000_000)).toThrow(RangeError);
    expect(() => launcher(recordingSpawn(() => undefined), 0)).toThrow(
      'Test timeout must be between 0 and 2147483 seconds, got 0'
    );
  });

  it('reports ERROR when the runner cannot be spawned', async () => {
    const spawn: SpawnFn = () => {
      throw new Error('spawn node ENOENT');
    };

    const result = await launcher(spawn).launch('004');

    expect(result.status).toBe('ERROR');
    expect(result.message).toBe('Test error: Cannot launch test runner: spawn node ENOENT');
  });

  it('reports ERROR when the child emits an error event', async () => {
    const spawn = recordingSpawn((c) => {
      setImmediate(() => c.emit('error', new Error('spawn EACCES')));
    });

    const result = await launcher(spawn).launch('004');

    expect(result.status).toBe('ERROR');
    expect(result.message).toBe('Test error: Cannot launch test runner: spawn EACCES');
  });

  it('labels tests it cannot describe with a generated name', async () => {
    const result = await launcher(recordingSpawn((c) => c.exit(1))).launch('777');

    expect(result.testName).toBe('test_777');
    expect(result.testGroup).toBe('unknown');
  });
});
