import { subDays } from "date-fns";
import { toTagKeySet } from "../../utils/tags";
import type { RefinementSettings, Track, VibeCriteria } from "./types";

export function matchesVibe(track: Track, vibe: VibeCriteria): boolean {
    const moodKeys = toTagKeySet(vibe.moods);
    const styleKeys = toTagKeySet(vibe.styles);
    for (const key of toTagKeySet(track.moods)) {
        if (moodKeys.has(key)) return true;
    }
    for (const key of toTagKeySet(track.styles)) {
        if (styleKeys.has(key)) return true;
    }
    return false;
}

export function passesRatingFilter(track: Track, minRating: number): boolean {
    if (minRating <= 0 || track.rating === null) return true;
    return track.rating >= minRating;
}

/** Tracks played within the last `excludePlayedDays` days are held back. */
export function passesRecencyFilter(
    track: Track,
    excludePlayedDays: number,
    now: Date
): boolean {
    if (excludePlayedDays <= 0 || track.lastPlayedAt === null) return true;
    return track.lastPlayedAt.getTime() < subDays(now, excludePlayedDays).getTime();
}

export function passesSkipFilter(track: Track, maxSkipCount: number): boolean {
    if (!Number.isFinite(maxSkipCount)) return true;
    return track.skipCount <= maxSkipCount;
}

export function passesRefinement(
    track: Track,
    refinement: RefinementSettings,
    now: Date
): boolean {
    return (
        passesRatingFilter(track, refinement.minRating) &&
        passesRecencyFilter(track, refinement.excludePlayedDays, now) &&
        passesSkipFilter(track, refinement.maxSkipCount)
    );
}

/**
 * Narrows catalog tracks to those carrying at least one vibe tag and passing
 * every active refinement filter. Catalog order is kept; repeated ids keep
 * their first occurrence.
 */
export function selectCandidates(
    tracks: readonly Track[],
    vibe: VibeCriteria,
    refinement: RefinementSettings,
    now: Date
): Track[] {
    const seen = new Set<string>();
    const candidates: Track[] = [];
    for (const track of tracks) {
        if (seen.has(track.id)) continue;
        seen.add(track.id);
        if (!matchesVibe(track, vibe)) continue;
        if (!passesRefinement(track, refinement, now)) continue;
        candidates.push(track);
    }
    return candidates;
}
