import pino from 'pino';

export interface LoggerConfig {
  level?: string;
  pretty?: boolean;
  redact?: string[];
}

// stdout carries reports and the runner's progress lines; logs go to stderr.
const STDERR = 2;

function createBaseLogger(config: LoggerConfig = {}) {
  const {
    level = process.env.LOG_LEVEL || 'info',
    pretty = process.env.LOG_PRETTY === 'true',
    redact = ['secretKey', 'accessKey', 'config.secretKey', 'config.accessKey', 'credentials'],
  } = config;

  const options: pino.LoggerOptions = {
    level,
    redact,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (pretty) {
    return pino(
      options,
      pino.transport({
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: STDERR,
        },
      })
    );
  }

  return pino(options, pino.destination(STDERR));
}

export const logger = createBaseLogger();

/** Child loggers keep the level they were created with; set this first. */
export function setLogLevel(level: string): void {
  logger.level = level;
}

export function createChildLogger(context: Record<string, unknown>) {
  return logger.child(context);
}

export function createDiscoveryLogger() {
  return createChildLogger({ component: 'discovery' });
}

export function createExecutorLogger() {
  return createChildLogger({ component: 'executor' });
}

export function createValidationLogger() {
  return createChildLogger({ component: 'validation' });
}

export function createConfigLogger() {
  return createChildLogger({ component: 'config' });
}

export function createRunnerLogger() {
  return createChildLogger({ component: 'runner' });
}

export function createUnitLogger(testId: string) {
  return createChildLogger({ component: 'unit', testId });
}
