import {
  CatalogUnavailableError,
  ConfigurationError,
  MetadataCorruptionError,
  ResolutionError,
  StateLockError,
  errnoCode,
  isError,
} from '../download/core/errors';
import { UsageError } from './arguments';

/**
 * sysexits(3) values, plus 1 for a playlist that cannot be resolved
 */
export enum ExitCode {
  OK = 0,
  RESOLUTION_FAILED = 1,
  USAGE = 64,
  DATA_ERROR = 65,
  UNAVAILABLE = 69,
  SOFTWARE = 70,
  IO_ERROR = 74,
  TEMP_FAIL = 75,
  CONFIG = 78,
}

function isSystemError(error: unknown): boolean {
  return isError(error) && 'syscall' in error && errnoCode(error) !== undefined;
}

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof UsageError) return ExitCode.USAGE;
  if (error instanceof ResolutionError) return ExitCode.RESOLUTION_FAILED;
  if (error instanceof CatalogUnavailableError) return ExitCode.UNAVAILABLE;
  if (error instanceof MetadataCorruptionError) return ExitCode.DATA_ERROR;
  if (error instanceof StateLockError) return ExitCode.TEMP_FAIL;
  if (error instanceof ConfigurationError) return ExitCode.CONFIG;
  if (isSystemError(error)) return ExitCode.IO_ERROR;
  return ExitCode.SOFTWARE;
}
