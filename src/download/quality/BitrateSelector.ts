/**
 * BitrateSelector - Picks the next bitrate to attempt for a track
 */

import { BitrateVariant, Selection, SelectionMode } from '../core/types';

/**
 * Medium first, then the best, then whatever is left.
 * Trades a little quality for much smaller files; keep this order as is.
 */
export const DEFAULT_FALLBACK_ORDER: readonly BitrateVariant[] = [
    BitrateVariant.MID,
    BitrateVariant.HIGH,
    BitrateVariant.LOW,
];

const QUALITY_RANK: Record<BitrateVariant, number> = {
    [BitrateVariant.LOW]: 1,
    [BitrateVariant.MID]: 2,
    [BitrateVariant.HIGH]: 3,
};

export function compareBitrates(a: BitrateVariant, b: BitrateVariant): number {
    return QUALITY_RANK[a] - QUALITY_RANK[b];
}

export class BitrateSelector {
    /**
     * Decide what to fetch for a track.
     * A track with no variants at all is reported as 'no-variant', never 'satisfied'.
     */
    nextCandidate(
        trackId: string,
        available: readonly BitrateVariant[],
        history: readonly BitrateVariant[],
        mode: SelectionMode,
    ): Selection {
        if (available.length === 0) {
            return { kind: 'no-variant' };
        }

        return mode === SelectionMode.HIGHEST
            ? this.selectHighest(available, history)
            : this.selectDefault(available, history);
    }

    /**
     * Any recorded bitrate means the track was already obtained
     */
    private selectDefault(
        available: readonly BitrateVariant[],
        history: readonly BitrateVariant[],
    ): Selection {
        if (history.length > 0) {
            return { kind: 'satisfied' };
        }

        const bitrate = DEFAULT_FALLBACK_ORDER.find((candidate) => available.includes(candidate));

        return bitrate ? { kind: 'candidate', bitrate } : { kind: 'no-variant' };
    }

    /**
     * Best available bitrate, unless something at least as good is recorded
     */
    private selectHighest(
        available: readonly BitrateVariant[],
        history: readonly BitrateVariant[],
    ): Selection {
        const best = [...available].sort(compareBitrates)[available.length - 1];
        const alreadyCovered = history.some((recorded) => compareBitrates(recorded, best) >= 0);

        return alreadyCovered ? { kind: 'satisfied' } : { kind: 'candidate', bitrate: best };
    }
}
