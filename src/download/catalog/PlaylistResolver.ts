import { logger } from '../../utils/logger';
import { ICatalogClient, ResolvedTrack } from '../core/types';

/**
 * PlaylistResolver - Playlist id to ordered tracks, via the catalog
 * Catalog order is kept; a track listed twice keeps its first position.
 */
export class PlaylistResolver {
    constructor(private readonly catalog: ICatalogClient) {}

    async resolve(playlistId: string): Promise<ResolvedTrack[]> {
        const tracks = await this.catalog.fetchPlaylist(playlistId);

        const seen = new Set<string>();
        const unique = tracks.filter((track) => {
            if (seen.has(track.id)) return false;
            seen.add(track.id);
            return true;
        });

        if (unique.length !== tracks.length) {
            logger.debug('Dropped duplicate playlist entries', {
                playlistId,
                duplicates: tracks.length - unique.length,
            });
        }
        logger.info('📋 Playlist resolved', { playlistId, tracks: unique.length });

        return unique;
    }
}
