/**
 * DownloadOrchestrator - Main coordinator for a playlist run
 * Resolves the playlist, then walks its tracks one at a time through
 * selection, transfer and recording. A failing track never stops the run.
 */

import { EventEmitter } from 'events';
import { logger } from '../../utils/logger';
import { HistoryStore } from '../../storage/HistoryStore';
import { PlaylistResolver } from '../catalog/PlaylistResolver';
import { BitrateSelector } from '../quality/BitrateSelector';
import { errorMessage } from './errors';
import {
    BitrateVariant,
    IFileTransfer,
    OrchestratorEvents,
    ResolvedTrack,
    RunOptions,
    RunSummary,
    TrackRef,
    TrackReport,
    TrackState,
    VariantOffer,
} from './types';

export interface OrchestratorOptions {
    /** Persist history after this many recorded tracks */
    flushEvery?: number;
}

export class DownloadOrchestrator extends EventEmitter {
    private readonly flushEvery: number;
    private pendingFlush = 0;

    constructor(
        private readonly resolver: PlaylistResolver,
        private readonly selector: BitrateSelector,
        private readonly history: HistoryStore,
        private readonly transfer: IFileTransfer,
        options: OrchestratorOptions = {},
    ) {
        super();
        this.flushEvery = Math.max(1, options.flushEvery ?? 1);
    }

    /**
     * Typed event subscription
     */
    onEvent<K extends keyof OrchestratorEvents>(
        event: K,
        handler: (payload: OrchestratorEvents[K]) => void,
    ): this {
        return this.on(event, handler);
    }

    private emitEvent<K extends keyof OrchestratorEvents>(event: K, payload: OrchestratorEvents[K]): void {
        this.emit(event, payload);
    }

    /**
     * Process a whole playlist. Resolution errors propagate before anything is
     * recorded; per-track errors end up in the summary.
     */
    async run(options: RunOptions): Promise<RunSummary> {
        const { playlistId, mode, dryRun } = options;
        const tracks = await this.resolver.resolve(playlistId);

        logger.info('🚀 Run started', { playlistId, tracks: tracks.length, mode, dryRun });

        const summary: RunSummary = {
            playlistId,
            mode,
            dryRun,
            total: tracks.length,
            recorded: 0,
            skipped: 0,
            noVariant: 0,
            failures: [],
            reports: [],
        };

        this.pendingFlush = 0;
        for (const track of tracks) {
            const report = await this.processTrack(track, options);
            summary.reports.push(report);

            switch (report.outcome) {
                case TrackState.RECORDED:
                    summary.recorded++;
                    break;
                case TrackState.SKIPPED:
                    summary.skipped++;
                    break;
                case TrackState.NO_VARIANT:
                    summary.noVariant++;
                    break;
                case TrackState.FAILED:
                    summary.failures.push({ track: report.track, reason: report.reason ?? 'unknown error' });
                    break;
            }

            this.emitEvent('track:outcome', { report });
        }

        await this.history.save();
        this.pendingFlush = 0;

        logger.info('🏁 Run finished', {
            playlistId,
            recorded: summary.recorded,
            skipped: summary.skipped,
            noVariant: summary.noVariant,
            failed: summary.failures.length,
        });
        this.emitEvent('run:completed', summary);

        return summary;
    }

    private async processTrack(track: ResolvedTrack, options: RunOptions): Promise<TrackReport> {
        const ref = toTrackRef(track);
        this.setState(ref, TrackState.RESOLVED);

        const selection = this.selector.nextCandidate(
            track.id,
            track.variants.map((variant) => variant.bitrate),
            this.history.historyOf(track.id),
            options.mode,
        );

        if (selection.kind === 'no-variant') {
            this.setState(ref, TrackState.NO_VARIANT);
            logger.warn(`NO VARIANT ${track.name}`, { trackId: track.id });
            return { track: ref, outcome: TrackState.NO_VARIANT };
        }
        if (selection.kind === 'satisfied') {
            this.setState(ref, TrackState.SKIPPED);
            logger.info(`SKIP ${track.name}`, { trackId: track.id, have: this.history.historyOf(track.id) });
            return { track: ref, outcome: TrackState.SKIPPED };
        }

        const { bitrate } = selection;
        const offer = track.variants.find((variant) => variant.bitrate === bitrate);
        if (!offer) {
            // The selector only picks from the bitrates it was given
            throw new Error(`Selected bitrate ${bitrate} missing for track ${track.id}`);
        }
        this.setState(ref, TrackState.BITRATE_SELECTED, bitrate);

        if (options.dryRun) {
            await this.record(ref, offer);
            logger.info(`RECORD ${track.name}`, { trackId: track.id, bitrate, dryRun: true });
            return { track: ref, outcome: TrackState.RECORDED, bitrate };
        }

        this.setState(ref, TrackState.FETCHING, bitrate);
        let filePath: string;
        try {
            ({ filePath } = await this.transfer.transfer(ref, offer));
        } catch (error) {
            const reason = errorMessage(error);
            this.setState(ref, TrackState.FAILED, bitrate);
            logger.error(`FAILED ${track.name}`, { trackId: track.id, bitrate, error: reason });
            return { track: ref, outcome: TrackState.FAILED, bitrate, reason };
        }
        this.setState(ref, TrackState.FETCHED, bitrate);

        await this.record(ref, offer);
        logger.info(`GOT ${track.name}`, { trackId: track.id, bitrate, filePath });
        return { track: ref, outcome: TrackState.RECORDED, bitrate, filePath };
    }

    private async record(track: TrackRef, offer: VariantOffer): Promise<void> {
        this.history.add(track.id, offer.bitrate, {
            name: track.name,
            artist: track.artist,
            album: track.album,
            url: offer.url,
        });
        this.setState(track, TrackState.RECORDED, offer.bitrate);

        this.pendingFlush++;
        if (this.pendingFlush >= this.flushEvery) {
            await this.history.save();
            this.pendingFlush = 0;
        }
    }

    private setState(track: TrackRef, state: TrackState, bitrate?: BitrateVariant): void {
        this.emitEvent('track:state', { track, state, bitrate });
    }
}

function toTrackRef(track: ResolvedTrack): TrackRef {
    return { id: track.id, name: track.name, artist: track.artist, album: track.album };
}
