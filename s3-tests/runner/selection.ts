import { isGroupEnabled, type S3Config } from '../shared/config.js';
import type { TestUnit } from '../shared/types.js';
import type { TestDiscovery } from './discovery.js';

export interface SelectionRequest {
  test?: string;
  group?: string;
}

export type Selection = { ok: true; tests: TestUnit[] } | { ok: false; error: string };

/**
 * Resolves what a run covers: a single test, a whole group, or every test in
 * the groups the configuration enables. An explicit test or group ignores the
 * configuration's switches.
 */
export function selectTests(
  discovery: TestDiscovery,
  request: SelectionRequest,
  config: Pick<S3Config, 'enabledGroups'>
): Selection {
  if (request.test !== undefined) {
    const unit = discovery.getById(request.test);
    return unit ? { ok: true, tests: [unit] } : { ok: false, error: `Test ${request.test} not found` };
  }

  if (request.group !== undefined) {
    if (!discovery.groups().includes(request.group)) {
      return { ok: false, error: `Unknown test group '${request.group}'` };
    }
    const tests = discovery.getByGroup(request.group);
    return tests.length > 0
      ? { ok: true, tests }
      : { ok: false, error: `No tests found in group '${request.group}'` };
  }

  const tests = discovery.getAll().filter((unit) => isGroupEnabled(config, unit.group));
  return tests.length > 0 ? { ok: true, tests } : { ok: false, error: 'No tests to run' };
}
