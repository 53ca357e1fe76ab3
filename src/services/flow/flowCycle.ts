import { logger as rootLogger, withLogTiming, type Logger } from "../../utils/logger";
import { getLocalDateKey, getLocalHour } from "../../utils/localTime";
import { createSeededRandom } from "../../utils/random";
import { generateFlow } from "./generateFlow";
import type { FlowResult, FlowSettings, LibraryCatalog, PlaylistSync } from "./types";

export interface FlowCycleDependencies {
    settings: FlowSettings;
    catalog: LibraryCatalog;
    sync: PlaylistSync;
    logger?: Logger;
}

/**
 * Seed key for a cycle: re-running within the same local hour rebuilds the
 * same playlist, the next hour reshuffles.
 */
export function flowSeedKey(playlistName: string, now: Date, timeZone: string): string {
    const hour = String(getLocalHour(now, timeZone)).padStart(2, "0");
    return `${playlistName}:${getLocalDateKey(now, timeZone)}T${hour}`;
}

/**
 * Generates the Flow for `now` and hands it to the playlist sync. An empty
 * result leaves the existing playlist untouched. Configuration and
 * collaborator errors propagate to the caller.
 */
export async function runFlowCycle(
    deps: FlowCycleDependencies,
    now: Date = new Date()
): Promise<FlowResult> {
    const { settings, catalog, sync } = deps;
    const seedKey = flowSeedKey(settings.playlistName, now, settings.timeZone);
    const cycleLogger = (deps.logger ?? rootLogger).child("cycle", {
        playlist: settings.playlistName,
    });

    return withLogTiming(
        cycleLogger,
        `Flow cycle for "${settings.playlistName}"`,
        async () => {
            const result = await generateFlow(
                now,
                settings,
                createSeededRandom(seedKey),
                catalog
            );

            for (const warning of result.warnings) {
                cycleLogger.warn(warning);
            }

            if (result.trackIds.length === 0) {
                cycleLogger.info(
                    `No tracks selected for "${settings.playlistName}"; playlist not updated`
                );
                return result;
            }

            await sync.upsertPlaylist(
                settings.playlistName,
                result.trackIds,
                result.description
            );
            cycleLogger.info(
                `Updated "${settings.playlistName}" with ${result.trackIds.length} tracks`,
                { period: result.period, sources: result.sourceCounts }
            );
            return result;
        },
        { seedKey }
    );
}
