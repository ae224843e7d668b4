#!/usr/bin/env node
/**
 * invoice-digest CLI
 *
 * Reads every document in the configured input directory, extracts an
 * invoice record from each with the configured LLM provider and writes one
 * JSON file per document to the output directory.
 */

import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import {
  ConfigurationError,
  DigestError,
  createProvider,
  loadConfig,
  logger,
  registerAllProviders,
  type Config,
} from '@invoice-digest/shared';
import { writeMetricsSnapshot } from './lib/output';
import { exitCodeFor, runDigest } from './lib/pipeline';

export interface MainOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Load a .env file into env without overriding variables already set.
 * The default ./.env is optional; a file named by INVOICE_DIGEST_ENV_FILE is not.
 */
export function loadEnvFile(env: NodeJS.ProcessEnv, cwd: string): void {
  const explicit = env.INVOICE_DIGEST_ENV_FILE;
  const envPath = path.resolve(cwd, explicit || '.env');

  if (!fs.existsSync(envPath)) {
    if (explicit) {
      throw new ConfigurationError(`Env file not found: ${envPath}`);
    }
    return;
  }

  const parsed = dotenv.parse(fs.readFileSync(envPath));
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
  logger.debug('Loaded env file', { path: envPath, keys: Object.keys(parsed).length });
}

/**
 * Write the metrics snapshot. A failure here is logged and never replaces
 * the outcome of the run itself.
 */
async function flushMetrics(metricsPath: string): Promise<void> {
  try {
    await writeMetricsSnapshot(metricsPath);
  } catch (error) {
    const failure = DigestError.fromUnknown(error, 'IO_ERROR');
    logger.error('Could not write metrics snapshot', failure, {
      category: failure.category,
      metrics_path: metricsPath,
    });
  }
}

async function digest(config: Readonly<Config>): Promise<number> {
  registerAllProviders();
  const provider = createProvider(config);

  try {
    const summary = await runDigest(config, { provider });
    return exitCodeFor(summary);
  } finally {
    if (config.metricsPath) {
      await flushMetrics(config.metricsPath);
    }
  }
}

/**
 * Run the CLI once and return the process exit code
 */
export async function main(options: MainOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  try {
    loadEnvFile(env, cwd);
    const config = loadConfig({ env, cwd });
    return await digest(config);
  } catch (error) {
    const failure = DigestError.fromUnknown(error);
    logger.error('Digest run aborted', failure, {
      category: failure.category,
      details: failure.details,
    });
    return 1;
  }
}

if (require.main === module) {
  main().then(
    (exitCode) => {
      process.exitCode = exitCode;
    },
    (error: unknown) => {
      logger.error('Unexpected failure', error);
      process.exitCode = 1;
    }
  );
}
