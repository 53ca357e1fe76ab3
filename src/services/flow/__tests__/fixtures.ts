import { featureVectorDistance, type ResolvedDistance } from "../sonicDistance";
import { matchesVibe } from "../candidateSelector";
import {
    SKIP_FILTER_DISABLED,
    type FlowSettings,
    type HistoryEntry,
    type LibraryCatalog,
    type SonicDistance,
    type Track,
} from "../types";

export function makeTrack(id: string, overrides: Partial<Track> = {}): Track {
    return {
        id,
        artist: `Artist ${id}`,
        title: `Title ${id}`,
        moods: [],
        styles: [],
        rating: null,
        lastPlayedAt: null,
        skipCount: 0,
        playCount: 0,
        features: null,
        ...overrides,
    };
}

export function play(track: Track, playedAt: Date, rating: number | null = track.rating): HistoryEntry {
    return { track, playedAt, rating };
}

export function daysBefore(now: Date, days: number): Date {
    return new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
}

/** Distance between tracks placed on a line, in tenths. */
export function lineDistance(positions: Record<string, number>): ResolvedDistance {
    return (a, b) => {
        const left = positions[a.id];
        const right = positions[b.id];
        if (left === undefined || right === undefined) {
            return Number.POSITIVE_INFINITY;
        }
        return Math.abs(left - right) / 10;
    };
}

export function makeSettings(overrides: Partial<FlowSettings> = {}): FlowSettings {
    return {
        playlistName: "Daily Flow",
        targetSize: 40,
        timeZone: "UTC",
        periods: [
            { name: "Morning", startHour: 6 },
            { name: "Afternoon", startHour: 12 },
            { name: "Evening", startHour: 18 },
            { name: "Night", startHour: 22 },
        ],
        vibe: {
            lookbackDays: 14,
            topMoods: 3,
            topStyles: 2,
            minOccurrences: 2,
            countPerPlay: true,
        },
        refinement: {
            minRating: 0,
            excludePlayedDays: 0,
            maxSkipCount: SKIP_FILTER_DISABLED,
        },
        anchors: {
            vibeAnchorCount: 10,
            familiarAnchorCount: 8,
            historyMinPlays: 2,
            historyMinRating: 0,
            historyLookbackDays: 30,
        },
        sonic: {
            expansionEnabled: true,
            seedTracks: 5,
            similarTracksPerSeed: 4,
            maxDistance: 0.3,
            finalMixRatio: 0.5,
            adventureBridging: false,
            sortSimilarityLimit: 10,
            sortMaxDistance: 0.4,
        },
        maxTracksPerArtist: 3,
        ...overrides,
    };
}

/** Catalog backed by plain arrays; distances come from the tracks' feature vectors. */
export class InMemoryCatalog implements LibraryCatalog {
    tracksByTagCalls = 0;
    historyCalls = 0;
    distanceCalls = 0;
    readonly distanceRequests: string[][] = [];

    constructor(
        private readonly tracks: Track[],
        private readonly history: HistoryEntry[] = [],
        private readonly distance: SonicDistance = featureVectorDistance
    ) {}

    async tracksByTag(moods: readonly string[], styles: readonly string[]): Promise<Track[]> {
        this.tracksByTagCalls += 1;
        return this.tracks.filter((track) => matchesVibe(track, { moods, styles }));
    }

    async trackHistory(): Promise<HistoryEntry[]> {
        this.historyCalls += 1;
        return [...this.history];
    }

    async distanceFor(tracks: readonly Track[]): Promise<SonicDistance> {
        this.distanceCalls += 1;
        this.distanceRequests.push(tracks.map((track) => track.id));
        return this.distance;
    }
}

/** Evening-flavoured library with one artist per track and spread-out features. */
export function eveningLibrary(size: number): Track[] {
    return Array.from({ length: size }, (_, index) =>
        makeTrack(`t${String(index + 1).padStart(2, "0")}`, {
            moods: index % 2 === 0 ? ["Mellow"] : ["Relaxed"],
            styles: index % 3 === 0 ? ["Jazz"] : ["Soul"],
            features: [1, (index % 7) / 7, (index % 5) / 5],
        })
    );
}
