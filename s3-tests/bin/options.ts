import { InvalidArgumentError } from 'commander';
import { MAX_TEST_TIMEOUT_SECONDS } from '../runner/suites.js';

/** commander argument parser for `--timeout <seconds>`. */
export function parseTimeoutSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive number of seconds.');
  }
  if (seconds > MAX_TEST_TIMEOUT_SECONDS) {
    throw new InvalidArgumentError(`Timeout must not exceed ${MAX_TEST_TIMEOUT_SECONDS} seconds.`);
  }
  return seconds;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `validation-YYYYMMDD-HHMMSS` in local time. */
export function defaultOutputDir(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `validation-${date}-${time}`;
}
