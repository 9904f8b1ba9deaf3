import { logger } from '../../utils/logger';
import { HistoryStore } from '../../storage/HistoryStore';
import { ICatalogClient } from '../core/types';

export interface BackfillResult {
    missing: number;
    filled: number;
    notFound: string[];
}

/**
 * MetadataBackfill - Fetches metadata for history entries that have none
 * History itself is only read.
 */
export class MetadataBackfill {
    constructor(
        private readonly catalog: ICatalogClient,
        private readonly history: HistoryStore,
    ) {}

    async run(): Promise<BackfillResult> {
        const missing = this.history.trackIds().filter((id) => !this.history.meta.has(id));
        if (missing.length === 0) {
            return { missing: 0, filled: 0, notFound: [] };
        }

        logger.info('🔎 Fetching missing metadata', { tracks: missing.length });
        const tracks = await this.catalog.fetchTracks(missing);
        const wanted = new Set(missing);

        let filled = 0;
        for (const track of tracks) {
            if (!wanted.has(track.id) || this.history.meta.has(track.id)) continue;

            const recorded = this.history.historyOf(track.id);
            const best = recorded[recorded.length - 1];
            const offer = track.variants.find((variant) => variant.bitrate === best);

            this.history.meta.upsert(track.id, {
                name: track.name,
                artist: track.artist,
                album: track.album,
                url: offer?.url ?? '',
                bitrate: best,
            });
            filled++;
        }

        const notFound = missing.filter((id) => !this.history.meta.has(id));
        if (notFound.length > 0) {
            logger.warn(`Cannot fetch ${notFound.length} tracks. Probably they are gone (404).`, {
                trackIds: notFound,
            });
        }

        if (filled > 0) {
            await this.history.meta.save();
        }

        return { missing: missing.length, filled, notFound };
    }
}
