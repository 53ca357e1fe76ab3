import type { SonicDistance, Track } from "./types";

/**
 * Cosine distance between two tracks' feature vectors, rescaled from [0, 2]
 * to [0, 1]. Undefined when either vector is missing, empty, mismatched in
 * length or all zeros.
 */
export const featureVectorDistance: SonicDistance = (a, b) => {
    const left = a.features;
    const right = b.features;
    if (!left || !right || left.length === 0 || left.length !== right.length) {
        return undefined;
    }

    let dot = 0;
    let leftNorm = 0;
    let rightNorm = 0;
    for (let i = 0; i < left.length; i += 1) {
        dot += left[i] * right[i];
        leftNorm += left[i] * left[i];
        rightNorm += right[i] * right[i];
    }
    if (leftNorm === 0 || rightNorm === 0) {
        return undefined;
    }

    const cosine = dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
    return Math.min(1, Math.max(0, (1 - cosine) / 2));
};

export type ResolvedDistance = (a: Track, b: Track) => number;

/**
 * Wraps a collaborator-supplied distance so it never throws: unknown pairs,
 * NaN and thrown errors all become Infinity. A track is at distance 0 from
 * itself.
 */
export function resolveDistance(distance: SonicDistance): ResolvedDistance {
    return (a, b) => {
        if (a.id === b.id) return 0;
        let value: number | undefined;
        try {
            value = distance(a, b);
        } catch {
            return Number.POSITIVE_INFINITY;
        }
        if (value === undefined || Number.isNaN(value)) {
            return Number.POSITIVE_INFINITY;
        }
        return value;
    };
}
