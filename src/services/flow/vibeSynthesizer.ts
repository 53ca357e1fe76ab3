import { mergeTags, normalizeTag } from "../../utils/tags";
import type { PeriodDefinition, VibeCriteria } from "./types";

// Built-in vibe for periods that declare no moods/styles of their own.
export const DEFAULT_PERIOD_VIBES = {
    morning: {
        moods: ["Cheerful", "Uplifting", "Warm"],
        styles: ["Acoustic", "Indie Pop"],
    },
    afternoon: {
        moods: ["Energetic", "Upbeat", "Confident"],
        styles: ["Pop Rock", "Funk"],
    },
    evening: {
        moods: ["Mellow", "Relaxed", "Smooth"],
        styles: ["Jazz", "Soul"],
    },
    night: {
        moods: ["Calm", "Atmospheric", "Dreamy"],
        styles: ["Ambient", "Downtempo"],
    },
} as const satisfies Record<string, VibeCriteria>;

type DefaultPeriodName = keyof typeof DEFAULT_PERIOD_VIBES;

function isDefaultPeriodName(name: string): name is DefaultPeriodName {
    return Object.prototype.hasOwnProperty.call(DEFAULT_PERIOD_VIBES, name);
}

export function baseVibeFor(period: PeriodDefinition): VibeCriteria {
    const moods = period.moods ?? [];
    const styles = period.styles ?? [];
    if (moods.length > 0 || styles.length > 0) {
        return { moods, styles };
    }

    const key = normalizeTag(period.name);
    return isDefaultPeriodName(key)
        ? DEFAULT_PERIOD_VIBES[key]
        : { moods: [], styles: [] };
}

/**
 * Union of the period's base vibe and the learned augmentation. Tags compare
 * case-insensitively and the base spelling wins.
 */
export function synthesizeVibe(
    period: PeriodDefinition,
    learned: VibeCriteria
): VibeCriteria {
    const base = baseVibeFor(period);
    return Object.freeze({
        moods: Object.freeze(mergeTags(base.moods, learned.moods)),
        styles: Object.freeze(mergeTags(base.styles, learned.styles)),
    });
}

export function vibeTags(vibe: VibeCriteria): string[] {
    return [...vibe.moods, ...vibe.styles];
}
