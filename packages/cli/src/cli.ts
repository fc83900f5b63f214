#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   catalog-sync [--config entities.json] [--mode balanced] [--blueprint service]
 */

import 'dotenv/config';
import { Logger } from '@catalogsync/core';
import { parseCliArgs, USAGE } from './args.js';
import { ConfigError, loadSettings, type Settings } from './config.js';
import { runExport } from './export.js';

async function main(): Promise<number> {
  let settings: Settings;

  try {
    const args = parseCliArgs(process.argv.slice(2));
    if (args.help) {
      process.stdout.write(USAGE);
      return 0;
    }

    settings = await loadSettings({
      env: process.env,
      configPath: args.configPath,
      mode: args.mode,
      blueprints: args.blueprints,
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      console.error('');
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  const logger = new Logger({ level: settings.logging.level, format: settings.logging.format });

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      logger.warn('Second signal received; exiting immediately', { signal });
      process.exit(130);
    }
    logger.warn('Stopping after in-flight batches', { signal });
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const result = await runExport(settings, { logger, signal: controller.signal });
    return result.exitCode;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    new Logger().error('Export failed', { error });
    process.exitCode = 1;
  }
);
