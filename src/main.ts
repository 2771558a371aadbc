#!/usr/bin/env tsx

import { join } from 'path';
import { parseArgs, getUsageText, printUsage } from './cli';
import { loadEnvironment } from './config/load-env-file';
import { ConfigError, resolveConfig } from './config/resolve-config';
import { createConsoleLogger } from './logging/console-logger';
import { startCompletionServer } from './server/run-server';
import { DEFAULT_CONFIG_FILE, EffectiveConfig } from './types/llama-config';
import { ExitCode } from './types/exit-codes';
import { SERVER_NAME, VERSION } from './version';

/** How long shutdown may take before the process is forced to exit */
const SHUTDOWN_TIMEOUT_MS = 30_000;

function waitForTerminationSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

// Main CLI entry point
async function main(): Promise<ExitCode> {
  const parsed = parseArgs(process.argv);
  if (!parsed.success) {
    console.error(parsed.error);
    console.error('');
    printUsage();
    return ExitCode.USAGE_ERROR;
  }

  const args = parsed.args;
  if (args.help) {
    console.log(getUsageText());
    return ExitCode.SUCCESS;
  }
  if (args.version) {
    console.log(VERSION);
    return ExitCode.SUCCESS;
  }

  const loaded = loadEnvironment(args.configPath ?? DEFAULT_CONFIG_FILE);

  let config: EffectiveConfig;
  try {
    config = resolveConfig(loaded.env, {
      httpPort: args.port ?? undefined,
      endpoint: args.endpoint ?? undefined,
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      if (loaded.warning) {
        console.error(loaded.warning);
      }
      console.error(error.message);
      return ExitCode.CONFIG_ERROR;
    }
    throw error;
  }

  const logger = createConsoleLogger({
    minLevel: args.debug ? 'debug' : 'info',
    jsonOutput: args.jsonOutput,
    logFilePath: config.app.appLogPath ? join(config.app.appLogPath, config.app.appLogFileName) : undefined,
  });

  if (loaded.warning) {
    logger.warn(loaded.warning);
  } else {
    logger.info(`Loaded configuration from ${loaded.filePath}`);
  }

  const server = await startCompletionServer({
    config,
    logger,
    identity: { name: SERVER_NAME, version: VERSION },
  });

  const signal = await waitForTerminationSignal();

  const forceExit = setTimeout(() => {
    logger.error(`Shutdown did not finish within ${SHUTDOWN_TIMEOUT_MS / 1000} seconds, exiting`);
    process.exit(ExitCode.UNEXPECTED_ERROR);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExit.unref();

  try {
    await server.shutdown(signal);
  } finally {
    clearTimeout(forceExit);
    await logger.close();
  }
  return ExitCode.SUCCESS;
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exit(ExitCode.UNEXPECTED_ERROR);
  }
);
