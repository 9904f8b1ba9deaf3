/**
 * Core Types for the Playlist Download System
 * Shared by the selector, resolver, history store and orchestrator
 */

// ============================================================================
// Enums
// ============================================================================

export enum BitrateVariant {
    LOW = 'low',
    MID = 'mid',
    HIGH = 'high',
}

export enum SelectionMode {
    DEFAULT = 'default',
    HIGHEST = 'highest',
}

export enum TrackState {
    RESOLVED = 'resolved',
    BITRATE_SELECTED = 'bitrate_selected',
    SKIPPED = 'skipped',
    NO_VARIANT = 'no_variant',
    FETCHING = 'fetching',
    FETCHED = 'fetched',
    RECORDED = 'recorded',
    FAILED = 'failed',
}

export type TrackOutcome =
    | TrackState.SKIPPED
    | TrackState.NO_VARIANT
    | TrackState.RECORDED
    | TrackState.FAILED;

// ============================================================================
// Track & Variant Types
// ============================================================================

export interface TrackRef {
    readonly id: string;
    readonly name: string;
    readonly artist: string;
    readonly album: string;
}

export interface VariantOffer {
    bitrate: BitrateVariant;
    url: string;
    size: number;
    extension: string;
}

export interface ResolvedTrack extends TrackRef {
    readonly variants: VariantOffer[];
}

// ============================================================================
// History Types
// ============================================================================

export interface HistoryRecord {
    trackId: string;
    bitrate: BitrateVariant;
}

export interface TrackMeta {
    name: string;
    artist: string;
    album: string;
    url: string;
}

export interface MetaRecord extends TrackMeta {
    bitrate: BitrateVariant;
}

// ============================================================================
// Selection Types
// ============================================================================

export type Selection =
    | { kind: 'candidate'; bitrate: BitrateVariant }
    | { kind: 'satisfied' }
    | { kind: 'no-variant' };

// ============================================================================
// Run Types
// ============================================================================

export interface RunOptions {
    playlistId: string;
    mode: SelectionMode;
    dryRun: boolean;
}

export interface TrackReport {
    track: TrackRef;
    outcome: TrackOutcome;
    bitrate?: BitrateVariant;
    filePath?: string;
    reason?: string;
}

export interface TrackFailure {
    track: TrackRef;
    reason: string;
}

export interface RunSummary {
    playlistId: string;
    mode: SelectionMode;
    dryRun: boolean;
    total: number;
    recorded: number;
    skipped: number;
    noVariant: number;
    failures: TrackFailure[];
    reports: TrackReport[];
}

// ============================================================================
// Collaborator Interfaces
// ============================================================================

export interface ICatalogClient {
    /**
     * Fetch every track of a playlist, in catalog order
     */
    fetchPlaylist(playlistId: string): Promise<ResolvedTrack[]>;

    /**
     * Look up tracks by id. Ids the catalog no longer knows are left out.
     */
    fetchTracks(trackIds: string[]): Promise<ResolvedTrack[]>;
}

export interface TransferResult {
    /**
     * The file written, or the output directory when an external command
     * chose the file name itself
     */
    filePath: string;
    /** Bytes written; 0 when unknown */
    filesize: number;
}

export interface IFileTransfer {
    readonly name: string;

    transfer(track: TrackRef, offer: VariantOffer): Promise<TransferResult>;
}

// ============================================================================
// Event Types
// ============================================================================

export interface TrackStateEvent {
    track: TrackRef;
    state: TrackState;
    bitrate?: BitrateVariant;
}

export interface TrackOutcomeEvent {
    report: TrackReport;
}

export interface OrchestratorEvents {
    'track:state': TrackStateEvent;
    'track:outcome': TrackOutcomeEvent;
    'run:completed': RunSummary;
}
