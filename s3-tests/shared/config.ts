import * as fs from 'fs';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { createConfigLogger } from './logger.js';
import { DEFAULT_TEST_GROUPS, type SuiteDefinition } from './types.js';

export interface S3Config {
  endpointUrl: string;
  accessKey: string;
  secretKey: string;
  region: string;
  useSsl: boolean;
  verifySsl: boolean;
  bucketPrefix: string;
  vendorType: string;
  /** `test_<group>` switches deciding which groups a full run covers. */
  enabledGroups: Record<string, boolean>;
  suites?: SuiteDefinition[];
  /** Every other key from the config file, left for test units to read. */
  options: Record<string, unknown>;
}

export interface LoadedConfig {
  config: S3Config;
  source: 'file' | 'defaults';
  path: string;
}

const DEFAULT_ENABLED_GROUPS = new Set(['basic', 'multipart']);

function defaultEnabledGroups(): Record<string, boolean> {
  return Object.fromEntries(
    Object.keys(DEFAULT_TEST_GROUPS).map((group) => [group, DEFAULT_ENABLED_GROUPS.has(group)])
  );
}

export const defaultConfig: S3Config = {
  endpointUrl: process.env.S3_ENDPOINT_URL ?? 'http://localhost:9000',
  accessKey: process.env.S3_ACCESS_KEY ?? 'minioadmin',
  secretKey: process.env.S3_SECRET_KEY ?? 'minioadmin',
  region: process.env.S3_REGION ?? 'us-east-1',
  useSsl: process.env.S3_USE_SSL === 'true',
  verifySsl: process.env.S3_VERIFY_SSL !== 'false',
  bucketPrefix: process.env.S3_BUCKET_PREFIX ?? 's3compat',
  vendorType: process.env.S3_VENDOR ?? 'unknown',
  enabledGroups: defaultEnabledGroups(),
  options: {},
};

const SuiteSchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(''),
  tests: z.array(z.union([z.string(), z.number().int().nonnegative()])).transform((ids) =>
    ids.map((id) => String(id))
  ),
  required_pass_rate: z.number().min(0).max(100),
});

const ConfigFileSchema = z
  .object({
    s3_endpoint_url: z.string().min(1).optional(),
    s3_access_key: z.string().optional(),
    s3_secret_key: z.string().optional(),
    s3_region: z.string().min(1).optional(),
    s3_use_ssl: z.boolean().optional(),
    s3_verify_ssl: z.boolean().optional(),
    s3_bucket_prefix: z
      .string()
      .regex(/^[a-z0-9][a-z0-9-]*$/, 'bucket prefix must be lower-case letters, digits and dashes')
      .optional(),
    vendor_type: z.string().optional(),
    validation_suites: z.array(SuiteSchema).optional(),
  })
  .passthrough();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

const KNOWN_KEYS = new Set(Object.keys(ConfigFileSchema.shape));
const GROUP_SWITCH = /^test_([a-z0-9_]+)$/;

function toS3Config(file: ConfigFile): S3Config {
  const enabledGroups = defaultEnabledGroups();
  const options: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(file)) {
    if (KNOWN_KEYS.has(key)) continue;
    const match = GROUP_SWITCH.exec(key);
    if (match && typeof value === 'boolean') {
      enabledGroups[match[1]] = value;
      continue;
    }
    options[key] = value;
  }

  return {
    endpointUrl: file.s3_endpoint_url ?? defaultConfig.endpointUrl,
    accessKey: file.s3_access_key ?? defaultConfig.accessKey,
    secretKey: file.s3_secret_key ?? defaultConfig.secretKey,
    region: file.s3_region ?? defaultConfig.region,
    useSsl: file.s3_use_ssl ?? defaultConfig.useSsl,
    verifySsl: file.s3_verify_ssl ?? defaultConfig.verifySsl,
    bucketPrefix: file.s3_bucket_prefix ?? defaultConfig.bucketPrefix,
    vendorType: file.vendor_type ?? defaultConfig.vendorType,
    enabledGroups,
    suites: file.validation_suites?.map((suite) => ({
      key: suite.key,
      name: suite.name,
      description: suite.description,
      tests: suite.tests,
      requiredPassRate: suite.required_pass_rate,
    })),
    options,
  };
}

export function parseConfig(text: string, path = '<inline>'): S3Config {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${path}: ${errorMessage(error)}`, path);
  }

  // An empty file parses to null and means "all defaults".
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration in ${path}: ${issues}`, path);
  }
  return toS3Config(parsed.data);
}

export function loadConfig(path: string): LoadedConfig {
  const log = createConfigLogger();
  if (!fs.existsSync(path)) {
    log.warn({ path }, 'Configuration file not found, using defaults');
    return { config: { ...defaultConfig, enabledGroups: defaultEnabledGroups() }, source: 'defaults', path };
  }

  const config = parseConfig(fs.readFileSync(path, 'utf-8'), path);
  log.debug({ path, endpoint: config.endpointUrl }, 'Loaded configuration');
  return { config, source: 'file', path };
}

export function isGroupEnabled(config: Pick<S3Config, 'enabledGroups'>, group: string): boolean {
  return config.enabledGroups[group] ?? false;
}

/** Reads a numeric pass-through option, e.g. `large_file_size`. */
export function numericOption(config: S3Config, key: string, fallback: number): number {
  const value = config.options[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}
