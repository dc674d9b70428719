import { afterEach, describe, expect, it } from 'vitest';
import { createRunnerLogger, logger, setLogLevel } from './logger.js';

describe('setLogLevel', () => {
  const initial = logger.level;

  afterEach(() => {
    setLogLevel(initial);
  });

  it('applies to component loggers created afterwards', () => {
    setLogLevel('debug');

    const runnerLog = createRunnerLogger();

    expect(runnerLog.level).toBe('debug');
    expect(runnerLog.isLevelEnabled('debug')).toBe(true);
  });

  it('leaves loggers created earlier at their level', () => {
    setLogLevel('info');
    const early = createRunnerLogger();

    setLogLevel('debug');

    expect(early.level).toBe('info');
  });
});
