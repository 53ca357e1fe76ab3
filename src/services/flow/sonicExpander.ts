import type { ResolvedDistance } from "./sonicDistance";
import type { AnchorSet, FlowTrack, SonicSettings, Track } from "./types";

export interface ExpansionResult {
    /** Expanded tracks in the order they were admitted. */
    tracks: Track[];
    /** Expanded tracks grouped under the seed that found them. */
    bySeed: Map<string, Track[]>;
}

/**
 * Number of slots expansion may fill: the configured share of the playlist,
 * never more than what the anchors leave free.
 */
export function expansionBudget(
    targetSize: number,
    finalMixRatio: number,
    anchorCount: number
): number {
    const ratio = Math.min(1, Math.max(0, finalMixRatio));
    return Math.max(
        0,
        Math.min(Math.round(targetSize * ratio), targetSize - anchorCount)
    );
}

export function selectSeeds(anchors: AnchorSet, seedTracks: number): Track[] {
    return [...anchors.vibeAnchors, ...anchors.familiarAnchors].slice(
        0,
        Math.max(0, seedTracks)
    );
}

/**
 * Adds candidates that sound like the seed anchors. Each seed contributes its
 * closest unselected candidates within `maxDistance`, up to
 * `similarTracksPerSeed`, until the budget runs out.
 */
export function expandFromSeeds(
    seeds: readonly Track[],
    candidates: readonly Track[],
    distance: ResolvedDistance,
    settings: Pick<SonicSettings, "similarTracksPerSeed" | "maxDistance">,
    budget: number,
    selectedIds: ReadonlySet<string>
): ExpansionResult {
    const taken = new Set(selectedIds);
    const tracks: Track[] = [];
    const bySeed = new Map<string, Track[]>();
    const perSeed = Math.max(0, Math.floor(settings.similarTracksPerSeed));

    for (const seed of seeds) {
        if (tracks.length >= budget) break;

        const nearest = candidates
            .map((track, index) => ({ track, index, distance: distance(seed, track) }))
            .filter(
                (entry) =>
                    !taken.has(entry.track.id) &&
                    entry.distance <= settings.maxDistance
            )
            .sort((a, b) => a.distance - b.distance || a.index - b.index)
            .slice(0, Math.min(perSeed, budget - tracks.length))
            .map((entry) => entry.track);

        for (const track of nearest) {
            taken.add(track.id);
            tracks.push(track);
        }
        if (nearest.length > 0) {
            bySeed.set(seed.id, nearest);
        }
    }

    return { tracks, bySeed };
}

export interface BridgeResult {
    sequence: FlowTrack[];
    bridged: number;
    unbridged: number;
}

function findBridge(
    from: Track,
    to: Track,
    candidates: readonly Track[],
    distance: ResolvedDistance,
    maxDistance: number,
    taken: ReadonlySet<string>
): Track | null {
    let best: { track: Track; worst: number; total: number } | null = null;
    for (const track of candidates) {
        if (taken.has(track.id)) continue;
        const toFrom = distance(from, track);
        const toNext = distance(track, to);
        if (toFrom > maxDistance || toNext > maxDistance) continue;

        const worst = Math.max(toFrom, toNext);
        const total = toFrom + toNext;
        if (
            best === null ||
            worst < best.worst ||
            (worst === best.worst && total < best.total)
        ) {
            best = { track, worst, total };
        }
    }
    return best?.track ?? null;
}

/**
 * Walks the anchors in the given order and slips at most one bridge track
 * between each neighbouring pair. A pair with no candidate close enough to
 * both ends stays adjacent.
 */
export function bridgeAnchors(
    orderedAnchors: readonly FlowTrack[],
    candidates: readonly Track[],
    distance: ResolvedDistance,
    maxDistance: number,
    selectedIds: ReadonlySet<string>
): BridgeResult {
    const taken = new Set(selectedIds);
    const sequence: FlowTrack[] = [];
    let bridged = 0;
    let unbridged = 0;

    orderedAnchors.forEach((anchor, index) => {
        sequence.push(anchor);
        const next = orderedAnchors[index + 1];
        if (next === undefined) return;

        const bridge = findBridge(
            anchor.track,
            next.track,
            candidates,
            distance,
            maxDistance,
            taken
        );
        if (bridge === null) {
            unbridged += 1;
            return;
        }
        taken.add(bridge.id);
        sequence.push({ track: bridge, source: "bridge" });
        bridged += 1;
    });

    return { sequence, bridged, unbridged };
}
