import * as fs from 'fs';
import * as path from 'path';
import { TestGroupConfigError, errnoCode } from '../shared/errors.js';
import { createDiscoveryLogger } from '../shared/logger.js';
import { DEFAULT_TEST_GROUPS, type TestGroupTable, type TestUnit } from '../shared/types.js';

export interface DiscoveryOptions {
  root: string;
  groups?: TestGroupTable;
  extensions?: readonly string[];
}

export const DEFAULT_UNIT_EXTENSIONS = ['.ts', '.mts', '.js', '.mjs'] as const;

const LEADING_DIGITS = /^(\d+)/;
const DECLARATION_FILE = /\.d\.[cm]?ts$/;

/**
 * Zero-pads the numeric value of `id` to three digits, so `16`, `"016"` and
 * `"0016"` share one key. Returns undefined for anything that is not a
 * non-negative integer.
 */
export function normalizeTestId(id: string | number): string | undefined {
  const text = typeof id === 'number' ? String(id) : id.trim();
  if (!/^\d+$/.test(text)) return undefined;
  return String(parseInt(text, 10)).padStart(3, '0');
}

function validateGroups(groups: TestGroupTable): void {
  const ranges = Object.entries(groups)
    .map(([name, [start, end]]) => ({ name, start, end }))
    .sort((a, b) => a.start - b.start);

  for (const range of ranges) {
    if (!Number.isInteger(range.start) || !Number.isInteger(range.end) || range.start < 0) {
      throw new TestGroupConfigError(`Group '${range.name}' has a non-integer or negative range`);
    }
    if (range.start > range.end) {
      throw new TestGroupConfigError(
        `Group '${range.name}' range is inverted: [${range.start}, ${range.end}]`
      );
    }
  }

  for (let i = 1; i < ranges.length; i++) {
    const prev = ranges[i - 1];
    const next = ranges[i];
    if (next.start <= prev.end) {
      throw new TestGroupConfigError(
        `Group ranges overlap: '${prev.name}' [${prev.start}, ${prev.end}] and '${next.name}' [${next.start}, ${next.end}]`
      );
    }
  }
}

export class TestDiscovery {
  private readonly root: string;
  private readonly groupTable: TestGroupTable;
  private readonly extensions: readonly string[];
  private readonly catalog = new Map<string, TestUnit>();
  private readonly log = createDiscoveryLogger();

  constructor(options: DiscoveryOptions) {
    this.root = path.resolve(options.root);
    this.groupTable = options.groups ?? DEFAULT_TEST_GROUPS;
    this.extensions = options.extensions ?? DEFAULT_UNIT_EXTENSIONS;
    validateGroups(this.groupTable);
    this.discover();
  }

  private discover(): void {
    for (const [group, [start, end]] of Object.entries(this.groupTable)) {
      const groupDir = path.join(this.root, group);

      let entries: fs.Dirent[];
      try {
        entries = fs.readdirSync(groupDir, { withFileTypes: true });
      } catch (error) {
        if (errnoCode(error) !== 'ENOENT') {
          this.log.warn({ group, dir: groupDir, err: error }, 'Cannot read test group directory; treating it as empty');
        }
        continue;
      }

      const files = entries
        .filter((entry) => entry.isFile() && this.isUnitFile(entry.name))
        .map((entry) => entry.name)
        .sort();

      for (const file of files) {
        const match = LEADING_DIGITS.exec(file);
        if (!match) continue;

        const numericId = parseInt(match[1], 10);
        if (numericId < start || numericId > end) {
          this.log.debug({ group, file, range: [start, end] }, 'Test ID outside group range; skipped');
          continue;
        }

        const id = String(numericId).padStart(3, '0');
        const location = path.join(groupDir, file);
        const existing = this.catalog.get(id);
        if (existing) {
          this.log.warn(
            { id, kept: existing.location, ignored: location },
            'Duplicate test ID; keeping the first file in sorted order'
          );
          continue;
        }

        this.catalog.set(id, { id, numericId, name: `test_${id}`, group, location });
      }
    }

    this.log.debug({ root: this.root, count: this.catalog.size }, 'Discovered tests');
  }

  private isUnitFile(name: string): boolean {
    if (!LEADING_DIGITS.test(name) || DECLARATION_FILE.test(name)) return false;
    return this.extensions.includes(path.extname(name));
  }

  getById(id: string | number): TestUnit | undefined {
    const key = normalizeTestId(id);
    return key === undefined ? undefined : this.catalog.get(key);
  }

  getByGroup(group: string): TestUnit[] {
    return this.getAll().filter((unit) => unit.group === group);
  }

  getAll(): TestUnit[] {
    return [...this.catalog.values()].sort((a, b) => a.numericId - b.numericId);
  }

  groups(): string[] {
    return Object.keys(this.groupTable);
  }
}
