import type { SuiteDefinition } from '../shared/types.js';

/** Key of the suite whose result gates production readiness on its own. */
export const CRITICAL_SUITE_KEY = 'critical';

export const QUICK_SUITE_KEYS: readonly string[] = [CRITICAL_SUITE_KEY, 'error_handling'];

/** Overall pass rate, in percent, a production-ready endpoint must reach. */
export const PRODUCTION_PASS_RATE_THRESHOLD = 95;

export const DEFAULT_TEST_TIMEOUT_SECONDS = 300;

/** Largest per-test bound a Node timer can hold (2^31 - 1 ms, whole seconds). */
export const MAX_TEST_TIMEOUT_SECONDS = 2_147_483;

export const DEFAULT_SUITES: readonly SuiteDefinition[] = [
  {
    key: CRITICAL_SUITE_KEY,
    name: 'Critical Data Integrity',
    description: 'Data integrity and corruption prevention',
    tests: ['004', '005', '006'],
    requiredPassRate: 100,
  },
  {
    key: 'error_handling',
    name: 'Error Handling & Recovery',
    description: 'Network timeouts and retry logic',
    tests: ['011', '012'],
    requiredPassRate: 100,
  },
  {
    key: 'multipart',
    name: 'Multipart Operations',
    description: 'Large file handling and multipart uploads',
    tests: ['100', '101', '102'],
    requiredPassRate: 100,
  },
  {
    key: 'versioning',
    name: 'Versioning Support',
    description: 'Object versioning capabilities',
    tests: ['200'],
    requiredPassRate: 80,
  },
  {
    key: 'performance',
    name: 'Performance Benchmarks',
    description: 'Throughput and latency requirements',
    tests: ['600', '601'],
    requiredPassRate: 90,
  },
];

export function selectSuites(suites: readonly SuiteDefinition[], quick: boolean): SuiteDefinition[] {
  return quick ? suites.filter((suite) => QUICK_SUITE_KEYS.includes(suite.key)) : [...suites];
}
