import { applyArtistCap } from "./artistCap";
import { vibeTags } from "./vibeSynthesizer";
import type { FlowTrack, FlowTrackSource, TrackId, VibeCriteria } from "./types";

export interface AssembleOptions {
    targetSize: number;
    maxTracksPerArtist: number;
    periodName: string;
    vibe: VibeCriteria;
}

export interface AssembledPlaylist {
    tracks: FlowTrack[];
    trackIds: TrackId[];
    description: string;
    sourceCounts: Record<FlowTrackSource, number>;
    warnings: string[];
}

export function countBySource(
    tracks: readonly FlowTrack[]
): Record<FlowTrackSource, number> {
    const counts: Record<FlowTrackSource, number> = {
        "vibe-anchor": 0,
        "familiar-anchor": 0,
        bridge: 0,
        expansion: 0,
    };
    for (const entry of tracks) {
        counts[entry.source] += 1;
    }
    return counts;
}

export function buildFlowDescription(
    periodName: string,
    vibe: VibeCriteria,
    counts: Record<FlowTrackSource, number>
): string {
    const total =
        counts["vibe-anchor"] +
        counts["familiar-anchor"] +
        counts.bridge +
        counts.expansion;
    const tags = vibeTags(vibe);
    return [
        `${periodName} flow`,
        `Vibe: ${tags.length > 0 ? tags.join(", ") : "none"}`,
        `${total} tracks: ${counts["vibe-anchor"]} discovery, ${counts["familiar-anchor"]} familiar, ${counts.bridge} bridging, ${counts.expansion} similar`,
    ].join(" | ");
}

/**
 * Final pass over the ordered tracks: stable dedupe (first occurrence wins),
 * per-artist cap, then truncation to the target size. A short list is left
 * short and reported in `warnings`.
 */
export function assemblePlaylist(
    ordered: readonly FlowTrack[],
    options: AssembleOptions
): AssembledPlaylist {
    const targetSize = Math.max(0, Math.floor(options.targetSize));
    const seen = new Set<string>();
    const unique = ordered.filter((entry) => {
        if (seen.has(entry.track.id)) return false;
        seen.add(entry.track.id);
        return true;
    });

    const capped = applyArtistCap(unique, {
        maxPerArtist: options.maxTracksPerArtist,
        targetCount: targetSize,
        fallback: { enabled: true },
    });
    const tracks = capped.slice(0, targetSize);

    const warnings: string[] = [];
    if (tracks.length < targetSize) {
        warnings.push(`Flow has ${tracks.length} of ${targetSize} requested tracks`);
    }

    const sourceCounts = countBySource(tracks);
    return {
        tracks,
        trackIds: tracks.map((entry) => entry.track.id),
        description: buildFlowDescription(options.periodName, options.vibe, sourceCounts),
        sourceCounts,
        warnings,
    };
}
