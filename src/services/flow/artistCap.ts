import { normalizeTag } from "../../utils/tags";
import type { FlowTrack } from "./types";

export type ApplyArtistCapOptions = {
    /** 0 (or any non-positive value) disables the cap. */
    maxPerArtist: number;
    targetCount?: number;
    fallback?: ArtistCapFallbackOptions;
};

export type ArtistCapFallbackOptions = {
    enabled?: boolean;
    relaxationStep?: number;
    maxRelaxedPerArtist?: number;
};

const DEFAULT_RELAXATION_STEP = 1;
const DEFAULT_RELAXED_CAP_DELTA = 2;

function getArtistBucketKey(entry: FlowTrack): string {
    const artist = normalizeTag(entry.track.artist);
    if (artist.length > 0) {
        return `artist:${artist}`;
    }
    return `unknown:${entry.track.id}`;
}

/**
 * Enforce a per-artist cap over an already ordered list, keeping the input
 * order of whatever survives.
 *
 * When the cap leaves fewer than `targetCount` tracks and fallback is
 * enabled, the cap is raised step by step up to `maxRelaxedPerArtist`.
 * Tracks without an artist are each their own bucket.
 */
export function applyArtistCap<T extends FlowTrack>(
    tracks: readonly T[],
    options: ApplyArtistCapOptions
): T[] {
    const maxPerArtist = options.maxPerArtist;
    if (!Number.isFinite(maxPerArtist) || maxPerArtist <= 0 || tracks.length === 0) {
        return [...tracks];
    }

    const integerCap = Math.floor(maxPerArtist);
    const targetCount =
        options.targetCount !== undefined && Number.isFinite(options.targetCount)
            ? Math.max(0, Math.min(tracks.length, Math.floor(options.targetCount)))
            : tracks.length;

    const bucketKeys = tracks.map(getArtistBucketKey);
    const artistCounts = new Map<string, number>();
    const selectedByIndex = new Array<boolean>(tracks.length).fill(false);
    let selectedCount = 0;

    const trySelectUpToCap = (cap: number): void => {
        for (let i = 0; i < tracks.length; i += 1) {
            if (selectedCount >= targetCount) return;
            if (selectedByIndex[i]) continue;

            const count = artistCounts.get(bucketKeys[i]) ?? 0;
            if (count >= cap) continue;

            artistCounts.set(bucketKeys[i], count + 1);
            selectedByIndex[i] = true;
            selectedCount += 1;
        }
    };

    trySelectUpToCap(integerCap);

    if (selectedCount < targetCount && options.fallback?.enabled) {
        const relaxationStep = Math.max(
            1,
            Math.floor(options.fallback.relaxationStep ?? DEFAULT_RELAXATION_STEP)
        );
        const maxRelaxedPerArtist = Math.max(
            integerCap,
            Math.floor(
                options.fallback.maxRelaxedPerArtist ??
                    integerCap + DEFAULT_RELAXED_CAP_DELTA
            )
        );

        for (
            let relaxedCap = integerCap + relaxationStep;
            relaxedCap <= maxRelaxedPerArtist && selectedCount < targetCount;
            relaxedCap += relaxationStep
        ) {
            trySelectUpToCap(relaxedCap);
        }
    }

    return tracks.filter((_, index) => selectedByIndex[index]);
}
