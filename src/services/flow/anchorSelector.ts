import { subDays } from "date-fns";
import { sampleWithoutReplacement, shuffleWithRandom } from "../../utils/random";
import { countSharedTags, toTagKeySet } from "../../utils/tags";
import { passesRecencyFilter } from "./candidateSelector";
import type {
    AnchorSet,
    AnchorSettings,
    HistoryEntry,
    RandomSource,
    RefinementSettings,
    Track,
    VibeCriteria,
} from "./types";

export interface FamiliarCandidate {
    track: Track;
    plays: number;
    rating: number | null;
    lastPlayedAt: number;
}

export interface AnchorSelection {
    anchors: AnchorSet;
    warnings: string[];
}

/**
 * Groups in-window history by track and keeps the tracks played at least
 * `historyMinPlays` times with a rating of at least `historyMinRating`.
 * The rating is taken from the latest play, falling back to the track.
 */
export function qualifyingHistory(
    history: readonly HistoryEntry[],
    settings: AnchorSettings,
    now: Date
): FamiliarCandidate[] {
    const cutoff = subDays(now, settings.historyLookbackDays).getTime();
    const nowMs = now.getTime();
    const byTrack = new Map<string, FamiliarCandidate>();

    for (const entry of history) {
        const playedAt = entry.playedAt.getTime();
        if (playedAt < cutoff || playedAt > nowMs) continue;

        const existing = byTrack.get(entry.track.id);
        if (!existing) {
            byTrack.set(entry.track.id, {
                track: entry.track,
                plays: 1,
                rating: entry.rating ?? entry.track.rating,
                lastPlayedAt: playedAt,
            });
            continue;
        }

        existing.plays += 1;
        if (playedAt > existing.lastPlayedAt) {
            existing.lastPlayedAt = playedAt;
            existing.rating = entry.rating ?? entry.track.rating;
        }
    }

    return [...byTrack.values()]
        .filter(
            (candidate) =>
                candidate.plays >= settings.historyMinPlays &&
                (candidate.rating ?? 0) >= settings.historyMinRating
        )
        .sort((a, b) => a.track.id.localeCompare(b.track.id));
}

/**
 * Picks discovery anchors from the candidates the listener has not been
 * replaying, and familiar anchors from qualifying history ranked by how many
 * vibe tags they share, shuffled within equal ranks. The two lists never share
 * an id.
 */
export function selectAnchors(
    candidates: readonly Track[],
    history: readonly HistoryEntry[],
    vibe: VibeCriteria,
    settings: AnchorSettings,
    refinement: RefinementSettings,
    now: Date,
    random: RandomSource
): AnchorSelection {
    const targets = {
        vibe: Math.max(0, settings.vibeAnchorCount),
        familiar: Math.max(0, settings.familiarAnchorCount),
    };
    const warnings: string[] = [];

    if (candidates.length === 0) {
        warnings.push("No library tracks matched the active vibe; no anchors selected");
        return {
            anchors: { vibeAnchors: [], familiarAnchors: [], targets },
            warnings,
        };
    }

    const familiarPool = qualifyingHistory(history, settings, now);
    const historyIds = new Set(familiarPool.map((candidate) => candidate.track.id));

    const discoveryPool = candidates.filter((track) => !historyIds.has(track.id));
    const vibeAnchors = sampleWithoutReplacement(discoveryPool, targets.vibe, random);
    const vibeIds = new Set(vibeAnchors.map((track) => track.id));

    // Recency still applies to familiar anchors; rating and skips do not.
    const vibeKeys = toTagKeySet([...vibe.moods, ...vibe.styles]);
    const eligible = familiarPool.filter(
        (candidate) =>
            !vibeIds.has(candidate.track.id) &&
            passesRecencyFilter(candidate.track, refinement.excludePlayedDays, now)
    );
    const tiers = new Map<number, FamiliarCandidate[]>();
    for (const candidate of eligible) {
        const shared = countSharedTags(
            [...candidate.track.moods, ...candidate.track.styles],
            vibeKeys
        );
        const tier = tiers.get(shared);
        if (tier) tier.push(candidate);
        else tiers.set(shared, [candidate]);
    }
    const ranked = [...tiers.keys()]
        .sort((a, b) => b - a)
        .flatMap((shared) => shuffleWithRandom(tiers.get(shared) ?? [], random));
    const familiarAnchors = ranked
        .slice(0, targets.familiar)
        .map((candidate) => candidate.track);

    if (vibeAnchors.length < targets.vibe) {
        warnings.push(
            `Only ${vibeAnchors.length} of ${targets.vibe} discovery anchors available`
        );
    }
    if (familiarAnchors.length < targets.familiar) {
        warnings.push(
            `Only ${familiarAnchors.length} of ${targets.familiar} familiar anchors available`
        );
    }

    return {
        anchors: { vibeAnchors, familiarAnchors, targets },
        warnings,
    };
}

export function anchorTracks(anchors: AnchorSet): Track[] {
    return [...anchors.vibeAnchors, ...anchors.familiarAnchors];
}
