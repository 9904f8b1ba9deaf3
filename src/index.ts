#!/usr/bin/env node
import 'dotenv/config';
import * as Sentry from '@sentry/node';
import { logger } from './utils/logger';
import { runCli } from './cli/runCli';
import { ExitCode } from './cli/exitCodes';
import { errorMessage, isError } from './download/core/errors';

function initializeSentry(): void {
  Sentry.init({
    dsn: process.env.SENTRY_DSN || '',
    tracesSampleRate: 0,
  });
}

function setupEmergencyHandlers(): void {
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', { reason });
    Sentry.captureException(reason);
  });
}

async function main(): Promise<void> {
  initializeSentry();
  setupEmergencyHandlers();

  let exitCode: ExitCode;
  try {
    exitCode = await runCli(process.argv.slice(2));
  } catch (error: unknown) {
    logger.error('Fatal error', {
      error: errorMessage(error),
      stack: isError(error) ? error.stack : undefined,
    });
    Sentry.captureException(error);
    exitCode = ExitCode.SOFTWARE;
  }

  await Sentry.close(2000);
  process.exitCode = exitCode;
}

void main();
