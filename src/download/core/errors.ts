/**
 * Error taxonomy for the download system
 */

import { types } from 'util';

export abstract class PlaylistFetchError extends Error {
    abstract readonly code: string;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** Playlist id is invalid or unknown to the catalog */
export class ResolutionError extends PlaylistFetchError {
    readonly code = 'RESOLUTION_FAILED';

    constructor(readonly playlistId: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** Catalog could not be reached or answered with a server error */
export class CatalogUnavailableError extends PlaylistFetchError {
    readonly code = 'CATALOG_UNAVAILABLE';
}

export class TransferError extends PlaylistFetchError {
    readonly code = 'TRANSFER_FAILED';

    constructor(readonly trackId: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** Binary history could not be decoded */
export class HistoryCorruptionError extends PlaylistFetchError {
    readonly code = 'HISTORY_CORRUPT';
}

export class MetadataCorruptionError extends PlaylistFetchError {
    readonly code = 'METADATA_CORRUPT';

    constructor(readonly filePath: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

export class ConfigurationError extends PlaylistFetchError {
    readonly code = 'CONFIGURATION_INVALID';
}

/** Another live process holds the state directory */
export class StateLockError extends PlaylistFetchError {
    readonly code = 'STATE_LOCKED';

    constructor(readonly lockPath: string, readonly ownerPid: number | undefined) {
        super(
            ownerPid === undefined
                ? `State directory is locked (${lockPath})`
                : `State directory is locked by process ${ownerPid} (${lockPath})`,
        );
    }
}

/**
 * Also true for errors created in another realm, such as Node internals seen from a vm context
 */
export function isError(value: unknown): value is Error {
    return value instanceof Error || types.isNativeError(value);
}

export function errorMessage(error: unknown): string {
    return isError(error) ? error.message : String(error);
}

/**
 * `code` of a Node.js system error (ENOENT, EEXIST, ...)
 */
export function errnoCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}
