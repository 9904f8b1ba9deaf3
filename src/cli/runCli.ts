import { AppConfig } from '../types/config';
import { loadConfig } from '../utils/config';
import { FileManager } from '../utils/FileManager';
import { logError, logOperation, logger } from '../utils/logger';
import { HistoryStore } from '../storage/HistoryStore';
import { StateLock } from '../storage/StateLock';
import { NeteaseCatalogClient } from '../download/catalog/NeteaseCatalogClient';
import { PlaylistResolver } from '../download/catalog/PlaylistResolver';
import { MetadataBackfill } from '../download/catalog/MetadataBackfill';
import { BitrateSelector } from '../download/quality/BitrateSelector';
import { DownloadOrchestrator } from '../download/core/DownloadOrchestrator';
import { HttpFileTransfer } from '../download/transfer/HttpFileTransfer';
import { CommandFileTransfer } from '../download/transfer/CommandFileTransfer';
import { ICatalogClient, IFileTransfer, RunSummary } from '../download/core/types';
import { CatalogUnavailableError, PlaylistFetchError, errorMessage, isError } from '../download/core/errors';
import { CliCommand, USAGE, parseArguments } from './arguments';
import { ExitCode, exitCodeFor } from './exitCodes';

/**
 * Collaborators that tests (or embedders) can swap out
 */
export interface CliOverrides {
  catalog?: ICatalogClient;
  transfer?: IFileTransfer;
  write?: (text: string) => void;
}

interface AppContext {
  config: AppConfig;
  fileManager: FileManager;
  history: HistoryStore;
  lock: StateLock;
  catalog: ICatalogClient;
}

function createTransfer(config: AppConfig, fileManager: FileManager): IFileTransfer {
  const { command, outputDirectory, timeout } = config.transfer;
  if (command) {
    return new CommandFileTransfer({ command, outputDirectory, timeout });
  }
  return new HttpFileTransfer({ outputDirectory, timeout }, fileManager);
}

async function initializeContext(config: AppConfig, overrides: CliOverrides): Promise<AppContext> {
  const fileManager = new FileManager();
  await fileManager.ensureDirectory(config.stateDirectory);

  return {
    config,
    fileManager,
    history: new HistoryStore(config.stateDirectory, fileManager),
    lock: new StateLock(config.stateDirectory),
    catalog: overrides.catalog ?? new NeteaseCatalogClient(config.catalog),
  };
}

function reportSummary(summary: RunSummary): void {
  const { total, skipped, failures } = summary;

  if (total > 0 && skipped === total) {
    logger.info('Skipped all tracks in the playlist.');
  } else if (skipped > 0) {
    logger.info(`Skipped ${skipped} of ${total} tracks in the playlist.`);
  }

  if (summary.noVariant > 0) {
    logger.warn(`${summary.noVariant} tracks have no downloadable bitrate.`);
  }

  for (const failure of failures) {
    logger.warn(`Not recorded: ${failure.track.name} (${failure.track.id}): ${failure.reason}`);
  }
  if (failures.length > 0) {
    logger.warn(`${failures.length} tracks failed and will be retried on the next run.`);
  }
}

async function runDownload(
  app: AppContext,
  command: Extract<CliCommand, { kind: 'download' }>,
  overrides: CliOverrides,
): Promise<RunSummary> {
  const transfer = overrides.transfer ?? createTransfer(app.config, app.fileManager);
  if (!command.dryRun) {
    await app.fileManager.ensureDirectory(app.config.transfer.outputDirectory);
  }

  const orchestrator = new DownloadOrchestrator(
    new PlaylistResolver(app.catalog),
    new BitrateSelector(),
    app.history,
    transfer,
    { flushEvery: app.config.flushEvery },
  );

  const summary = await orchestrator.run({
    playlistId: command.playlistId,
    mode: command.mode,
    dryRun: command.dryRun,
  });
  reportSummary(summary);
  return summary;
}

async function runExport(app: AppContext): Promise<void> {
  try {
    const result = await new MetadataBackfill(app.catalog, app.history).run();
    if (result.filled > 0) {
      logOperation('Metadata filled in', { filled: result.filled, missing: result.missing });
    }
  } catch (error) {
    if (!(error instanceof CatalogUnavailableError)) throw error;
    logger.warn('Catalog unavailable, exporting without filling in metadata', {
      error: error.message,
    });
  }

  await app.history.exportReadable();
}

/**
 * Run one CLI invocation and return its exit code
 */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  overrides: CliOverrides = {},
): Promise<ExitCode> {
  const write = overrides.write ?? ((text: string) => process.stdout.write(text));

  try {
    const command = parseArguments(argv);
    if (command.kind === 'help') {
      write(`${USAGE}\n`);
      return ExitCode.OK;
    }

    const config = loadConfig(env);
    const app = await initializeContext(config, overrides);

    await app.lock.withLock(async () => {
      await app.history.load();
      if (command.kind === 'export') {
        await runExport(app);
      } else {
        await runDownload(app, command, overrides);
      }
    });

    return ExitCode.OK;
  } catch (error: unknown) {
    const code = exitCodeFor(error);

    if (error instanceof PlaylistFetchError) {
      logger.error(error.message, { code: error.code });
    } else if (isError(error)) {
      logError(error, { exitCode: code });
    } else {
      logger.error('Unexpected failure', { error: errorMessage(error) });
    }

    if (code === ExitCode.USAGE) {
      write(`${USAGE}\n`);
    }
    return code;
  }
}
