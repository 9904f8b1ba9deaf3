/**
 * CommandFileTransfer - Delegates the download to an external downloader command
 * The template may use {id}, {bitrate} and {url}, e.g. "ncm -s {id}".
 */

import { spawn } from 'child_process';
import { logger } from '../../utils/logger';
import { IFileTransfer, TrackRef, TransferResult, VariantOffer } from '../core/types';
import { ConfigurationError, TransferError, errorMessage } from '../core/errors';

export interface CommandFileTransferOptions {
    command: string;
    outputDirectory: string;
    timeout: number;
}

/**
 * Split a command template on whitespace and fill in placeholders per argument,
 * so substituted values never introduce extra arguments.
 */
export function buildCommand(template: string, track: TrackRef, offer: VariantOffer): { file: string; args: string[] } {
    const parts = template.trim().split(/\s+/).filter((part) => part.length > 0);
    if (parts.length === 0) {
        throw new ConfigurationError('TRANSFER_COMMAND is empty');
    }

    const values: Record<string, string> = {
        id: track.id,
        bitrate: offer.bitrate,
        url: offer.url,
    };
    const filled = parts.map((part) =>
        part.replace(/\{(id|bitrate|url)\}/g, (_match, key: string) => values[key] ?? ''),
    );

    return { file: filled[0], args: filled.slice(1) };
}

export class CommandFileTransfer implements IFileTransfer {
    readonly name = 'command';

    constructor(private readonly options: CommandFileTransferOptions) {
        if (options.command.trim() === '') {
            throw new ConfigurationError('TRANSFER_COMMAND is empty');
        }
    }

    async transfer(track: TrackRef, offer: VariantOffer): Promise<TransferResult> {
        const { file, args } = buildCommand(this.options.command, track, offer);

        try {
            await this.execute(file, args);
        } catch (error) {
            throw new TransferError(track.id, errorMessage(error), { cause: error });
        }

        logger.debug(`[${this.name}] Transfer finished`, { trackId: track.id, command: file });
        return { filePath: this.options.outputDirectory, filesize: 0 };
    }

    private execute(file: string, args: string[]): Promise<void> {
        return new Promise((resolve, reject) => {
            let errorOutput = '';

            const proc = spawn(file, args, {
                cwd: this.options.outputDirectory,
                stdio: ['ignore', 'inherit', 'pipe'],
            });

            proc.stderr.on('data', (data: Buffer) => {
                errorOutput += data.toString();
            });

            const timer = setTimeout(() => {
                proc.kill('SIGKILL');
                reject(new Error('Download timeout'));
            }, this.options.timeout);

            proc.on('close', (code) => {
                clearTimeout(timer);
                if (code === 0) {
                    resolve();
                } else {
                    reject(new Error(errorOutput.trim() || `${file} exited with code ${code}`));
                }
            });

            proc.on('error', (err) => {
                clearTimeout(timer);
                reject(err);
            });
        });
    }
}
