import path from 'path';
import { z } from 'zod';
import { FileManager } from '../utils/FileManager';
import { logger } from '../utils/logger';
import { BitrateVariant, MetaRecord } from '../download/core/types';
import { MetadataCorruptionError, errorMessage } from '../download/core/errors';

export const META_FILE = 'meta.json';

const MetaRecordSchema = z.object({
    name: z.string(),
    artist: z.string(),
    album: z.string(),
    url: z.string(),
    bitrate: z.nativeEnum(BitrateVariant),
});

const MetaFileSchema = z.record(z.string(), MetaRecordSchema);

/**
 * MetaStore - Per-track metadata, one current record per track (last write wins)
 */
export class MetaStore {
    private records = new Map<string, MetaRecord>();
    private readonly filePath: string;

    constructor(
        stateDirectory: string,
        private readonly fileManager: FileManager = new FileManager(),
    ) {
        this.filePath = path.join(stateDirectory, META_FILE);
    }

    get size(): number {
        return this.records.size;
    }

    /**
     * Load meta.json. A missing file is an empty map; an unreadable one is fatal
     * so that saving never overwrites it.
     */
    async load(): Promise<void> {
        const content = await this.fileManager.readIfExists(this.filePath);
        if (content === undefined) {
            this.records = new Map();
            return;
        }

        let raw: unknown;
        try {
            raw = JSON.parse(content.toString('utf-8'));
        } catch (error) {
            throw new MetadataCorruptionError(
                this.filePath,
                `${this.filePath} is not valid JSON: ${errorMessage(error)}`,
                { cause: error },
            );
        }

        const parsed = MetaFileSchema.safeParse(raw);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            throw new MetadataCorruptionError(
                this.filePath,
                `${this.filePath} has an invalid record at ${issue.path.join('.')}: ${issue.message}`,
            );
        }

        this.records = new Map(Object.entries(parsed.data));
        logger.debug('Metadata loaded', { records: this.records.size });
    }

    upsert(trackId: string, record: MetaRecord): void {
        this.records.set(trackId, { ...record });
    }

    get(trackId: string): MetaRecord | undefined {
        return this.records.get(trackId);
    }

    has(trackId: string): boolean {
        return this.records.has(trackId);
    }

    toJSON(): Record<string, MetaRecord> {
        return Object.fromEntries(this.records);
    }

    async save(): Promise<void> {
        await this.fileManager.writeAtomic(this.filePath, `${JSON.stringify(this.toJSON(), null, 2)}\n`);
    }
}
