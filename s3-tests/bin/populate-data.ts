#!/usr/bin/env npx tsx

import { Command } from 'commander';
import { loadConfig } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { createChildLogger } from '../shared/logger.js';
import { DEFAULT_BUCKET_COUNT, populate, populationBuckets } from '../shared/populate-data.js';
import { closeSharedS3Client, getSharedS3Client } from '../shared/s3-client.js';

type PopulateCliOptions = {
  config: string;
  clean?: boolean;
};

const RULE = '='.repeat(60);

const program = new Command('s3-populate-data')
  .description('Fill an S3 endpoint with synthetic buckets and objects')
  .requiredOption('--config <path>', 'configuration file')
  .option('--clean', 'remove the buckets this run creates before populating');

async function main(): Promise<number> {
  program.parse();
  const opts = program.opts<PopulateCliOptions>();

  const { config, source } = loadConfig(opts.config);
  if (source === 'defaults') {
    console.error(`Configuration file not found: ${opts.config}`);
    return 1;
  }

  const names = populationBuckets(config.bucketPrefix);
  console.log(RULE);
  console.log('S3 Synthetic Data Population');
  console.log(RULE);
  console.log(`Endpoint: ${config.endpointUrl}`);
  console.log(`Bucket prefix: ${config.bucketPrefix}`);
  console.log(`Buckets: ${DEFAULT_BUCKET_COUNT} standard, ${names.versioned}, ${names.public}`);

  const summary = await populate(getSharedS3Client(config), {
    prefix: config.bucketPrefix,
    clean: opts.clean ?? false,
    report: (line) => console.log(line),
  });

  console.log(RULE);
  console.log(`Buckets ready: ${summary.buckets.length}`);
  console.log(`Objects created: ${summary.objects}`);
  if (summary.warnings.length > 0) {
    console.log(`Warnings: ${summary.warnings.length}`);
  }
  console.log(RULE);

  if (summary.buckets.length === 0) {
    console.error('No buckets were created');
    return 1;
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    createChildLogger({ component: 'populate' }).fatal({ err: error }, `Population failed: ${errorMessage(error)}`);
    process.exitCode = 1;
  })
  .finally(() => {
    closeSharedS3Client();
  });
