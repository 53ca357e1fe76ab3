import { logger } from "../../utils/logger";
import { getLocalHour } from "../../utils/localTime";
import { anchorTracks, selectAnchors } from "./anchorSelector";
import { selectCandidates } from "./candidateSelector";
import { resolvePeriod } from "./periodResolver";
import { assemblePlaylist } from "./playlistAssembler";
import { resolveDistance, type ResolvedDistance } from "./sonicDistance";
import {
    bridgeAnchors,
    expandFromSeeds,
    expansionBudget,
    selectSeeds,
    type ExpansionResult,
} from "./sonicExpander";
import { sonicSort } from "./sonicSorter";
import { learnVibe } from "./vibeLearner";
import { synthesizeVibe } from "./vibeSynthesizer";
import type {
    AnchorSet,
    FlowResult,
    FlowSettings,
    FlowTrack,
    LibraryCatalog,
    RandomSource,
    SonicDistance,
    Track,
} from "./types";

const flowLogger = logger.child("engine");

const noDistance: SonicDistance = () => undefined;

function anchorFlowTracks(anchors: AnchorSet): FlowTrack[] {
    return [
        ...anchors.vibeAnchors.map((track): FlowTrack => ({ track, source: "vibe-anchor" })),
        ...anchors.familiarAnchors.map(
            (track): FlowTrack => ({ track, source: "familiar-anchor" })
        ),
    ];
}

function sortFlowTracks(
    entries: readonly FlowTrack[],
    distance: ResolvedDistance,
    settings: FlowSettings,
    startId: string | undefined
): FlowTrack[] {
    const byId = new Map(entries.map((entry) => [entry.track.id, entry]));
    const ordered = sonicSort(
        entries.map((entry) => entry.track),
        distance,
        {
            similarityLimit: settings.sonic.sortSimilarityLimit,
            maxDistance: settings.sonic.sortMaxDistance,
            startId,
        }
    );
    return ordered.flatMap((track) => {
        const entry = byId.get(track.id);
        return entry ? [entry] : [];
    });
}

function uniqueTracks(tracks: readonly Track[]): Track[] {
    const seen = new Set<string>();
    return tracks.filter((track) => {
        if (seen.has(track.id)) return false;
        seen.add(track.id);
        return true;
    });
}

function runExpansion(
    anchors: AnchorSet,
    candidates: readonly Track[],
    distance: ResolvedDistance,
    settings: FlowSettings,
    selectedIds: ReadonlySet<string>,
    warnings: string[]
): ExpansionResult {
    const budget = expansionBudget(
        settings.targetSize,
        settings.sonic.finalMixRatio,
        selectedIds.size
    );
    const expansion = expandFromSeeds(
        selectSeeds(anchors, settings.sonic.seedTracks),
        candidates,
        distance,
        settings.sonic,
        budget,
        selectedIds
    );
    if (expansion.tracks.length < budget) {
        warnings.push(
            `Sonic expansion found ${expansion.tracks.length} of ${budget} similar tracks`
        );
    }
    return expansion;
}

/**
 * Builds one Flow playlist for `now`. Every random choice is drawn from
 * `random`, so identical inputs and seed give an identical result.
 *
 * Throws ConfigurationError for an invalid period list before any catalog
 * call is made. Every other shortfall degrades the result and is reported in
 * `warnings`.
 */
export async function generateFlow(
    now: Date,
    settings: FlowSettings,
    random: RandomSource,
    catalog: LibraryCatalog
): Promise<FlowResult> {
    const period = resolvePeriod(settings.periods, getLocalHour(now, settings.timeZone));
    const warnings: string[] = [];

    const history = await catalog.trackHistory(
        Math.max(settings.vibe.lookbackDays, settings.anchors.historyLookbackDays),
        now
    );
    if (history.length === 0) {
        warnings.push("No listening history available; using the base vibe only");
    }

    const learned = learnVibe(history, now, settings.vibe);
    const vibe = synthesizeVibe(period, learned);
    flowLogger.debug(`Resolved period "${period.name}"`, {
        moods: vibe.moods,
        styles: vibe.styles,
        learnedMoods: learned.moods,
        learnedStyles: learned.styles,
    });

    let libraryTracks: Track[] = [];
    if (vibe.moods.length === 0 && vibe.styles.length === 0) {
        warnings.push(`Period "${period.name}" has no vibe tags to match`);
    } else {
        libraryTracks = await catalog.tracksByTag(vibe.moods, vibe.styles);
    }

    const candidates = selectCandidates(libraryTracks, vibe, settings.refinement, now);
    const selection = selectAnchors(
        candidates,
        history,
        vibe,
        settings.anchors,
        settings.refinement,
        now,
        random
    );
    warnings.push(...selection.warnings);
    const anchors = selection.anchors;

    const anchorEntries = anchorFlowTracks(anchors);
    const anchorList = anchorTracks(anchors);
    const pool = uniqueTracks([...anchorList, ...candidates]);
    // Expansion and bridging only read pairs with an anchor at one end.
    const anchorDistance =
        anchorList.length > 0 && pool.length > 1
            ? await catalog.distanceFor(anchorList)
            : noDistance;
    const distance = resolveDistance(anchorDistance);
    const startId = anchors.vibeAnchors[0]?.id ?? anchors.familiarAnchors[0]?.id;
    const selectedIds = new Set(anchorEntries.map((entry) => entry.track.id));
    const sonic = settings.sonic;

    let ordered: FlowTrack[];
    if (sonic.adventureBridging) {
        const traversal = sortFlowTracks(anchorEntries, distance, settings, startId);
        const bridged = bridgeAnchors(
            traversal,
            candidates,
            distance,
            sonic.maxDistance,
            selectedIds
        );
        if (bridged.unbridged > 0) {
            warnings.push(
                `${bridged.unbridged} anchor transition(s) left without a bridge`
            );
        }
        ordered = bridged.sequence;

        if (sonic.expansionEnabled) {
            for (const entry of ordered) selectedIds.add(entry.track.id);
            const expansion = runExpansion(
                anchors,
                candidates,
                distance,
                settings,
                selectedIds,
                warnings
            );
            ordered = ordered.flatMap((entry) => {
                const similar = expansion.bySeed.get(entry.track.id) ?? [];
                return [
                    entry,
                    ...similar.map((track): FlowTrack => ({ track, source: "expansion" })),
                ];
            });
        }
    } else {
        let merged = anchorEntries;
        let sortDistance = distance;
        if (sonic.expansionEnabled) {
            const expansion = runExpansion(
                anchors,
                candidates,
                distance,
                settings,
                selectedIds,
                warnings
            );
            merged = [
                ...anchorEntries,
                ...expansion.tracks.map((track): FlowTrack => ({ track, source: "expansion" })),
            ];
            if (expansion.tracks.length > 1) {
                const expansionDistance = await catalog.distanceFor(expansion.tracks);
                sortDistance = resolveDistance(
                    (a, b) => anchorDistance(a, b) ?? expansionDistance(a, b)
                );
            }
        }
        ordered = sortFlowTracks(merged, sortDistance, settings, startId);
    }

    const playlist = assemblePlaylist(ordered, {
        targetSize: settings.targetSize,
        maxTracksPerArtist: settings.maxTracksPerArtist,
        periodName: period.name,
        vibe,
    });
    warnings.push(...playlist.warnings);

    flowLogger.debug(`Assembled ${playlist.trackIds.length} tracks`, {
        period: period.name,
        candidates: candidates.length,
        sources: playlist.sourceCounts,
    });

    return {
        trackIds: playlist.trackIds,
        description: playlist.description,
        period: period.name,
        vibe,
        sourceCounts: playlist.sourceCounts,
        warnings,
    };
}
