import type { RandomSource } from "../../utils/random";

export type { RandomSource };

export type TrackId = string;

/**
 * Read-only snapshot of a library track for the duration of one cycle.
 * Ratings are on a 0-5 scale; `null` means unrated.
 */
export interface Track {
    readonly id: TrackId;
    readonly artist: string;
    readonly title: string;
    readonly moods: readonly string[];
    readonly styles: readonly string[];
    readonly rating: number | null;
    readonly lastPlayedAt: Date | null;
    readonly skipCount: number;
    readonly playCount: number;
    readonly features?: readonly number[] | null;
}

export interface HistoryEntry {
    readonly track: Track;
    readonly playedAt: Date;
    /** Rating at the time of the play (0-5), `null` when unrated. */
    readonly rating: number | null;
}

export interface PeriodDefinition {
    readonly name: string;
    readonly startHour: number;
    readonly moods?: readonly string[];
    readonly styles?: readonly string[];
}

export interface VibeCriteria {
    readonly moods: readonly string[];
    readonly styles: readonly string[];
}

export interface AnchorSet {
    readonly vibeAnchors: readonly Track[];
    readonly familiarAnchors: readonly Track[];
    readonly targets: {
        readonly vibe: number;
        readonly familiar: number;
    };
}

export type FlowTrackSource =
    | "vibe-anchor"
    | "familiar-anchor"
    | "bridge"
    | "expansion";

export interface FlowTrack {
    readonly track: Track;
    readonly source: FlowTrackSource;
}

export interface FlowResult {
    readonly trackIds: TrackId[];
    readonly description: string;
    readonly period: string;
    readonly vibe: VibeCriteria;
    readonly sourceCounts: Record<FlowTrackSource, number>;
    readonly warnings: string[];
}

/**
 * Similarity between two tracks in [0, 1], lower is closer. `undefined`
 * means the pair cannot be compared (e.g. a missing feature vector).
 */
export type SonicDistance = (a: Track, b: Track) => number | undefined;

export interface VibeLearningSettings {
    lookbackDays: number;
    topMoods: number;
    topStyles: number;
    minOccurrences: number;
    /** Count a tag once per play (true) or once per distinct track (false). */
    countPerPlay: boolean;
}

/** Skip filter value that leaves skip counts unchecked. */
export const SKIP_FILTER_DISABLED = Number.POSITIVE_INFINITY;

export interface RefinementSettings {
    minRating: number;
    excludePlayedDays: number;
    maxSkipCount: number;
}

export interface AnchorSettings {
    vibeAnchorCount: number;
    familiarAnchorCount: number;
    historyMinPlays: number;
    historyMinRating: number;
    historyLookbackDays: number;
}

export interface SonicSettings {
    expansionEnabled: boolean;
    seedTracks: number;
    similarTracksPerSeed: number;
    maxDistance: number;
    finalMixRatio: number;
    adventureBridging: boolean;
    sortSimilarityLimit: number;
    sortMaxDistance: number;
}

export interface FlowSettings {
    playlistName: string;
    targetSize: number;
    timeZone: string;
    periods: readonly PeriodDefinition[];
    vibe: VibeLearningSettings;
    refinement: RefinementSettings;
    anchors: AnchorSettings;
    sonic: SonicSettings;
    /** 0 disables the per-artist cap. */
    maxTracksPerArtist: number;
}

export interface LibraryCatalog {
    tracksByTag(
        moods: readonly string[],
        styles: readonly string[]
    ): Promise<Track[]>;
    trackHistory(lookbackDays: number, now: Date): Promise<HistoryEntry[]>;
    /**
     * Prepares a synchronous distance function answering every pair with at
     * least one of the given tracks at one end.
     */
    distanceFor(tracks: readonly Track[]): Promise<SonicDistance>;
}

export interface PlaylistSync {
    upsertPlaylist(
        name: string,
        trackIds: readonly TrackId[],
        description: string
    ): Promise<void>;
}
