/**
 * A source of uniformly distributed numbers in [0, 1). Every random choice a
 * flow cycle makes is drawn from one of these, never from Math.random.
 */
export type RandomSource = () => number;

/** Stable 32-bit string hash used to turn a seed key into a numeric seed. */
export function hashSeedKey(seed: string): number {
    let hash = 0;
    for (let i = 0; i < seed.length; i++) {
        const char = seed.charCodeAt(i);
        hash = (hash << 5) - hash + char;
        hash = hash & hash;
    }
    return Math.abs(hash);
}

/** Linear congruential generator; identical seeds give identical sequences. */
export function createSeededRandom(seed: number | string): RandomSource {
    let state = (typeof seed === "string" ? hashSeedKey(seed) : seed) >>> 0;
    return () => {
        state = (state * 1664525 + 1013904223) >>> 0;
        return state / 4294967296;
    };
}

function clampRandomValue(value: number): number {
    if (!Number.isFinite(value)) return 0;
    if (value <= 0) return 0;
    if (value >= 1) return 0.999999999999;
    return value;
}

/** Fisher-Yates shuffle into a new array. */
export function shuffleWithRandom<T>(items: readonly T[], random: RandomSource): T[] {
    const shuffled = [...items];
    for (let i = shuffled.length - 1; i > 0; i -= 1) {
        const j = Math.floor(clampRandomValue(random()) * (i + 1));
        [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
    }
    return shuffled;
}

/** Sample without replacement; returns every item when count exceeds the pool. */
export function sampleWithoutReplacement<T>(
    items: readonly T[],
    count: number,
    random: RandomSource
): T[] {
    if (count <= 0 || items.length === 0) {
        return [];
    }
    return shuffleWithRandom(items, random).slice(0, Math.floor(count));
}
