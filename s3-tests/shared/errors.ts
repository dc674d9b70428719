export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path?: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class TestGroupConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TestGroupConfigError';
  }
}

export class ValidationConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationConfigError';
  }
}

/** Thrown by a test unit that declines to run, e.g. when a feature is not applicable. */
export class SkipTestError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'SkipTestError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorTrace(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
