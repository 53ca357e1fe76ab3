import type { ResolvedDistance } from "./sonicDistance";
import type { Track } from "./types";

export interface SonicSortOptions {
    similarityLimit: number;
    maxDistance: number;
    /** Track to start the walk from; defaults to the first input track. */
    startId?: string;
}

/**
 * Greedy nearest-neighbour walk over the tracks. At each step the nearest
 * `similarityLimit` remaining tracks are considered and the closest one within
 * `maxDistance` is taken; when none qualifies, the globally closest remaining
 * track is taken so every track gets placed. Equal distances resolve to the
 * track that came first in the input.
 */
export function sonicSort<T extends Track>(
    tracks: readonly T[],
    distance: ResolvedDistance,
    options: SonicSortOptions
): T[] {
    if (tracks.length <= 1) {
        return [...tracks];
    }

    const startIndex = Math.max(
        0,
        options.startId === undefined
            ? 0
            : tracks.findIndex((track) => track.id === options.startId)
    );
    const limit = Math.max(1, Math.floor(options.similarityLimit));

    const remaining = tracks
        .map((track, index) => ({ track, index }))
        .filter((entry) => entry.index !== startIndex);
    const ordered: T[] = [tracks[startIndex]];
    let current = tracks[startIndex];

    while (remaining.length > 0) {
        const ranked = remaining
            .map((entry, position) => ({
                position,
                index: entry.index,
                distance: distance(current, entry.track),
            }))
            .sort((a, b) => a.distance - b.distance || a.index - b.index);

        const withinThreshold = ranked
            .slice(0, limit)
            .find((entry) => entry.distance <= options.maxDistance);
        const next = withinThreshold ?? ranked[0];

        const [picked] = remaining.splice(next.position, 1);
        ordered.push(picked.track);
        current = picked.track;
    }

    return ordered;
}
