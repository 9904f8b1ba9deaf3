/**
 * NeteaseCatalogClient - Playlist and track lookup against the music.163.com web API
 * Maps the loosely typed responses onto ResolvedTrack at this boundary.
 */

import { createHash } from 'crypto';
import fetch from 'node-fetch';
import { z } from 'zod';
import { logger } from '../../utils/logger';
import { retryWithBackoff } from '../../utils/retryHelper';
import { CatalogConfig } from '../../types/config';
import { BitrateVariant, ICatalogClient, ResolvedTrack, VariantOffer } from '../core/types';
import { CatalogUnavailableError, ResolutionError, errorMessage } from '../core/errors';

const ENCRYPTION_KEY = '3go8&$8*3*3h0k(2)2';
const TRACK_BATCH_SIZE = 100;

const MusicSchema = z.object({
    dfsId: z.union([z.number(), z.string()]).nullish(),
    size: z.number().nullish(),
    extension: z.string().nullish(),
});

const SongSchema = z.object({
    id: z.union([z.number(), z.string()]),
    name: z.string().nullish(),
    artists: z.array(z.object({ name: z.string().nullish() })).nullish(),
    album: z.object({ name: z.string().nullish() }).nullish(),
    hMusic: MusicSchema.nullish(),
    mMusic: MusicSchema.nullish(),
    lMusic: MusicSchema.nullish(),
});

type CatalogSong = z.infer<typeof SongSchema>;
type CatalogMusic = z.infer<typeof MusicSchema>;

const PlaylistResponseSchema = z.object({
    code: z.number(),
    msg: z.string().nullish(),
    result: z.object({ tracks: z.array(z.unknown()).nullish() }).nullish(),
});

const SongDetailResponseSchema = z.object({
    code: z.number(),
    songs: z.array(z.unknown()).nullish(),
});

interface CatalogResponse {
    status: number;
    body: unknown;
}

export interface CatalogClientOptions extends CatalogConfig {
    retryDelay?: number;
}

/**
 * Path token the media host expects in front of a dfsId
 */
export function encryptedId(dfsId: string): string {
    const bytes = Buffer.from(dfsId, 'utf-8');
    for (let i = 0; i < bytes.length; i++) {
        bytes[i] = bytes[i] ^ ENCRYPTION_KEY.charCodeAt(i % ENCRYPTION_KEY.length);
    }
    return createHash('md5').update(bytes).digest('base64').replace(/\//g, '_').replace(/\+/g, '-');
}

export function mapSong(song: CatalogSong, mediaHost: string): ResolvedTrack {
    const artists = (song.artists ?? [])
        .map((artist) => artist.name?.trim())
        .filter((name): name is string => Boolean(name));

    const variants: VariantOffer[] = [];
    const sources: Array<[BitrateVariant, CatalogMusic | null | undefined]> = [
        [BitrateVariant.LOW, song.lMusic],
        [BitrateVariant.MID, song.mMusic],
        [BitrateVariant.HIGH, song.hMusic],
    ];
    for (const [bitrate, music] of sources) {
        const offer = music ? mapVariant(bitrate, music, mediaHost) : undefined;
        if (offer) variants.push(offer);
    }

    return {
        id: String(song.id),
        name: song.name?.trim() || 'Unknown',
        artist: artists.length > 0 ? artists.join(', ') : 'Unknown Artist',
        album: song.album?.name?.trim() ?? '',
        variants,
    };
}

function mapVariant(bitrate: BitrateVariant, music: CatalogMusic, mediaHost: string): VariantOffer | undefined {
    const dfsId = music.dfsId === null || music.dfsId === undefined ? '' : String(music.dfsId);
    if (!/^\d+$/.test(dfsId) || /^0+$/.test(dfsId)) {
        return undefined;
    }

    const extension = music.extension || 'mp3';
    return {
        bitrate,
        url: `${mediaHost}/${encryptedId(dfsId)}/${dfsId}.${extension}`,
        size: music.size ?? 0,
        extension,
    };
}

export class NeteaseCatalogClient implements ICatalogClient {
    private readonly retryDelay: number;

    constructor(private readonly options: CatalogClientOptions) {
        this.retryDelay = options.retryDelay ?? 500;
    }

    async fetchPlaylist(playlistId: string): Promise<ResolvedTrack[]> {
        if (!/^\d+$/.test(playlistId)) {
            throw new ResolutionError(playlistId, `Invalid playlist id: ${playlistId}`);
        }

        const { status, body } = await this.request(`/api/playlist/detail?id=${playlistId}`);
        if (status >= 400) {
            throw new ResolutionError(playlistId, `Catalog rejected playlist ${playlistId} (HTTP ${status})`);
        }

        const parsed = PlaylistResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new CatalogUnavailableError(`Unexpected playlist response for ${playlistId}`);
        }

        const { code, msg, result } = parsed.data;
        if (code >= 500) {
            throw new CatalogUnavailableError(`Catalog error ${code} for playlist ${playlistId}`);
        }
        if (code !== 200 || !result) {
            throw new ResolutionError(
                playlistId,
                `Playlist ${playlistId} not found (code ${code}${msg ? `: ${msg}` : ''})`,
            );
        }

        return this.mapSongs(result.tracks ?? []);
    }

    async fetchTracks(trackIds: string[]): Promise<ResolvedTrack[]> {
        const numericIds = trackIds.filter((id) => /^\d+$/.test(id));
        const tracks: ResolvedTrack[] = [];

        for (let i = 0; i < numericIds.length; i += TRACK_BATCH_SIZE) {
            const batch = numericIds.slice(i, i + TRACK_BATCH_SIZE);
            const ids = encodeURIComponent(`[${batch.join(',')}]`);
            const { status, body } = await this.request(`/api/song/detail?ids=${ids}`);

            const parsed = SongDetailResponseSchema.safeParse(body);
            if (status >= 400 || !parsed.success || parsed.data.code !== 200) {
                throw new CatalogUnavailableError(`Track lookup failed (HTTP ${status})`);
            }
            tracks.push(...this.mapSongs(parsed.data.songs ?? []));
        }

        return tracks;
    }

    private mapSongs(songs: unknown[]): ResolvedTrack[] {
        const tracks: ResolvedTrack[] = [];
        songs.forEach((raw, index) => {
            const song = SongSchema.safeParse(raw);
            if (song.success) {
                tracks.push(mapSong(song.data, this.options.mediaHost));
            } else {
                logger.warn('Ignoring malformed catalog track', { index, error: song.error.issues[0]?.message });
            }
        });
        return tracks;
    }

    private request(pathAndQuery: string): Promise<CatalogResponse> {
        return retryWithBackoff(
            () => this.requestOnce(pathAndQuery),
            this.options.retryAttempts,
            this.retryDelay,
            'Catalog request',
            (error) => error instanceof CatalogUnavailableError,
        );
    }

    private async requestOnce(pathAndQuery: string): Promise<CatalogResponse> {
        const url = `${this.options.baseUrl}${pathAndQuery}`;
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.options.timeout);

        try {
            logger.debug('Catalog request', { url });
            const res = await fetch(url, {
                headers: {
                    'User-Agent': 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
                    Referer: `${this.options.baseUrl}/`,
                    Accept: 'application/json',
                },
                signal: controller.signal,
            });

            if (res.status >= 500) {
                throw new CatalogUnavailableError(`Catalog answered HTTP ${res.status}`);
            }

            const text = await res.text();
            if (!res.ok) {
                return { status: res.status, body: undefined };
            }

            try {
                return { status: res.status, body: JSON.parse(text) };
            } catch {
                throw new CatalogUnavailableError('Catalog answered with a non-JSON body');
            }
        } catch (error) {
            if (error instanceof CatalogUnavailableError) throw error;
            throw new CatalogUnavailableError(`Catalog unreachable: ${errorMessage(error)}`, { cause: error });
        } finally {
            clearTimeout(timeout);
        }
    }
}
