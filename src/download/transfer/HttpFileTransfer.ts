/**
 * HttpFileTransfer - Streams a variant URL into the output directory
 */

import fs from 'fs';
import fsPromises from 'fs/promises';
import { pipeline } from 'stream/promises';
import fetch from 'node-fetch';
import { FileManager } from '../../utils/FileManager';
import { logger } from '../../utils/logger';
import { IFileTransfer, TrackRef, TransferResult, VariantOffer } from '../core/types';
import { TransferError, errorMessage, isError } from '../core/errors';

export interface HttpFileTransferOptions {
    outputDirectory: string;
    timeout: number;
}

export class HttpFileTransfer implements IFileTransfer {
    readonly name = 'http';

    /** Files written by this instance, by path, with the track that owns them */
    private readonly written = new Map<string, string>();

    constructor(
        private readonly options: HttpFileTransferOptions,
        private readonly fileManager: FileManager = new FileManager(),
    ) {}

    async transfer(track: TrackRef, offer: VariantOffer): Promise<TransferResult> {
        const filePath = await this.targetPath(track, offer);
        const partPath = `${filePath}.part`;
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.options.timeout);

        try {
            const response = await fetch(offer.url, {
                headers: {
                    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
                },
                signal: controller.signal,
            });

            if (!response.ok) {
                throw new Error(`HTTP ${response.status}`);
            }

            const body = response.body;
            if (!body) {
                throw new Error('No response body');
            }

            let filesize = 0;
            body.on('data', (chunk: Buffer) => {
                filesize += chunk.length;
            });
            // Destroys the response body as well when the file cannot be written
            await pipeline(body, fs.createWriteStream(partPath));

            if (offer.size > 0 && filesize !== offer.size) {
                throw new Error(`Expected ${offer.size} bytes, got ${filesize}`);
            }

            await fsPromises.rename(partPath, filePath);
            this.written.set(filePath, track.id);
            logger.debug(`[${this.name}] Transfer finished`, { trackId: track.id, filePath, filesize });

            return { filePath, filesize };
        } catch (error) {
            await this.fileManager.deleteFile(partPath);
            const timedOut = isError(error) && error.name === 'AbortError';
            const reason = timedOut ? 'Download timeout' : errorMessage(error);
            throw new TransferError(track.id, reason, { cause: error });
        } finally {
            clearTimeout(timeout);
        }
    }

    /**
     * "<artist> - <name>.<ext>", or "<artist> - <name> (<id>).<ext>" when that
     * name is already taken by a file this track did not write
     */
    private async targetPath(track: TrackRef, offer: VariantOffer): Promise<string> {
        const { outputDirectory } = this.options;
        const baseName = `${track.artist} - ${track.name}`;
        const preferred = FileManager.buildFilePath(outputDirectory, baseName, offer.extension);

        const owner = this.written.get(preferred);
        if (owner === track.id || (owner === undefined && !(await this.fileManager.fileExists(preferred)))) {
            return preferred;
        }

        const qualified = FileManager.buildFilePath(outputDirectory, `${baseName} (${track.id})`, offer.extension);
        logger.debug(`[${this.name}] Name taken, using track id`, { trackId: track.id, filePath: qualified });
        return qualified;
    }
}
