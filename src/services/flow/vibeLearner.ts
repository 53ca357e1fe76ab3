import { subDays } from "date-fns";
import { normalizeTag } from "../../utils/tags";
import type { HistoryEntry, VibeCriteria, VibeLearningSettings } from "./types";

interface TagTally {
    label: string;
    count: number;
    lastSeenAt: number;
}

type TagTallies = Map<string, TagTally>;

function tally(
    tallies: TagTallies,
    tags: readonly string[],
    playedAt: number
): void {
    const seen = new Set<string>();
    for (const tag of tags) {
        const key = normalizeTag(tag);
        if (key.length === 0 || seen.has(key)) continue;
        seen.add(key);

        const existing = tallies.get(key);
        if (existing) {
            existing.count += 1;
            existing.lastSeenAt = Math.max(existing.lastSeenAt, playedAt);
        } else {
            tallies.set(key, { label: tag.trim(), count: 1, lastSeenAt: playedAt });
        }
    }
}

function topTags(tallies: TagTallies, limit: number, minOccurrences: number): string[] {
    if (limit <= 0) return [];
    return [...tallies.entries()]
        .filter(([, entry]) => entry.count >= minOccurrences)
        .sort(
            ([keyA, a], [keyB, b]) =>
                b.count - a.count ||
                b.lastSeenAt - a.lastSeenAt ||
                keyA.localeCompare(keyB)
        )
        .slice(0, limit)
        .map(([, entry]) => entry.label);
}

/**
 * Mines recent listening history for the moods and styles the listener keeps
 * coming back to. Returns an empty augmentation when nothing clears the
 * occurrence threshold.
 */
export function learnVibe(
    history: readonly HistoryEntry[],
    now: Date,
    settings: VibeLearningSettings
): VibeCriteria {
    const cutoff = subDays(now, settings.lookbackDays).getTime();
    const nowMs = now.getTime();

    // Most recent first, so the label kept for a tag is its latest spelling.
    const recent = history
        .filter((entry) => {
            const playedAt = entry.playedAt.getTime();
            return playedAt >= cutoff && playedAt <= nowMs;
        })
        .sort((a, b) => b.playedAt.getTime() - a.playedAt.getTime());

    const moods: TagTallies = new Map();
    const styles: TagTallies = new Map();
    const countedTracks = new Set<string>();

    for (const entry of recent) {
        if (!settings.countPerPlay) {
            if (countedTracks.has(entry.track.id)) continue;
            countedTracks.add(entry.track.id);
        }
        const playedAt = entry.playedAt.getTime();
        tally(moods, entry.track.moods, playedAt);
        tally(styles, entry.track.styles, playedAt);
    }

    return {
        moods: topTags(moods, settings.topMoods, settings.minOccurrences),
        styles: topTags(styles, settings.topStyles, settings.minOccurrences),
    };
}
