import path from 'path';
import { FileManager } from '../utils/FileManager';
import { logger } from '../utils/logger';
import { SortedKeySet } from './SortedKeySet';
import { MetaStore } from './MetaStore';
import { compareHistoryRecords, decodeHistory, encodeHistory } from './historyCodec';
import { BitrateVariant, HistoryRecord, MetaRecord, TrackMeta } from '../download/core/types';
import { errorMessage } from '../download/core/errors';

export const HISTORY_FILE = 'history';
export const EXPORT_FILE = 'songs_id.json';

const ALL_BITRATES = [BitrateVariant.LOW, BitrateVariant.MID, BitrateVariant.HIGH];

/**
 * HistoryStore - Every (track, bitrate) pair already obtained, plus track metadata
 *
 * The binary `history` file is the source of truth. `songs_id.json` is an
 * export-only projection of it and is never read back.
 */
export class HistoryStore {
    private history = new SortedKeySet<HistoryRecord>(compareHistoryRecords);
    private readonly historyPath: string;
    private readonly exportPath: string;
    readonly meta: MetaStore;

    constructor(
        readonly stateDirectory: string,
        private readonly fileManager: FileManager = new FileManager(),
    ) {
        this.historyPath = path.join(stateDirectory, HISTORY_FILE);
        this.exportPath = path.join(stateDirectory, EXPORT_FILE);
        this.meta = new MetaStore(stateDirectory, fileManager);
    }

    get size(): number {
        return this.history.size;
    }

    /**
     * Load history and metadata. History that is missing or cannot be decoded
     * starts empty; metadata errors propagate.
     */
    async load(): Promise<void> {
        await this.meta.load();

        let content: Buffer | undefined;
        try {
            content = await this.fileManager.readIfExists(this.historyPath);
        } catch (error) {
            logger.warn('History file unreadable, starting with empty history', {
                path: this.historyPath,
                error: errorMessage(error),
            });
            this.history = new SortedKeySet(compareHistoryRecords);
            return;
        }

        if (content === undefined) {
            logger.info('No history yet, starting fresh', { path: this.historyPath });
            this.history = new SortedKeySet(compareHistoryRecords);
            return;
        }

        try {
            this.history = new SortedKeySet(compareHistoryRecords, decodeHistory(content));
            logger.info('💾 History loaded', { records: this.history.size, tracksWithMeta: this.meta.size });
        } catch (error) {
            logger.warn('History file corrupt, starting with empty history', {
                path: this.historyPath,
                error: errorMessage(error),
            });
            this.history = new SortedKeySet(compareHistoryRecords);
        }
    }

    contains(trackId: string, bitrate: BitrateVariant): boolean {
        return this.history.has({ trackId, bitrate });
    }

    /**
     * Bitrates recorded for a track, lowest quality first
     */
    historyOf(trackId: string): BitrateVariant[] {
        return ALL_BITRATES.filter((bitrate) => this.contains(trackId, bitrate));
    }

    /**
     * Record a pair and upsert the track's metadata.
     * Returns false when the pair was already recorded (metadata is still updated).
     */
    add(trackId: string, bitrate: BitrateVariant, meta: TrackMeta): boolean {
        const added = this.history.add({ trackId, bitrate });
        const record: MetaRecord = {
            name: meta.name,
            artist: meta.artist,
            album: meta.album,
            url: meta.url,
            bitrate,
        };
        this.meta.upsert(trackId, record);
        return added;
    }

    records(): HistoryRecord[] {
        return this.history.values().map((record) => ({ ...record }));
    }

    /**
     * Ids of tracks in history, each once, in key order
     */
    trackIds(): string[] {
        const ids: string[] = [];
        for (const record of this.history) {
            if (ids[ids.length - 1] !== record.trackId) {
                ids.push(record.trackId);
            }
        }
        return ids;
    }

    /**
     * Human-readable projection of the current history
     */
    toReadableJson(): string {
        const entries = this.history.values().map(({ trackId, bitrate }) => ({ id: trackId, bitrate }));
        return `${JSON.stringify(entries, null, 2)}\n`;
    }

    /**
     * Overwrite songs_id.json with the projection of the current history
     */
    async exportReadable(): Promise<string> {
        const text = this.toReadableJson();
        await this.fileManager.writeAtomic(this.exportPath, text);
        logger.info('📤 History exported', { path: this.exportPath, records: this.history.size });
        return text;
    }

    async save(): Promise<void> {
        await this.fileManager.writeAtomic(this.historyPath, encodeHistory(this.history));
        await this.meta.save();
        logger.debug('💾 History saved', { records: this.history.size });
    }
}
