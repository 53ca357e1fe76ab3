/**
 * Normalize typographic quotes/apostrophes to ASCII equivalents.
 */
function normalizeQuotes(str: string): string {
    return str
        .replace(/[‘’ʼʻ]/g, "'")
        .replace(/[“”]/g, '"');
}

/**
 * Comparison key for a mood or style tag: "Rock ’n’ Roll ", "rock 'n' roll"
 * and "ROCK  'N' ROLL" all collapse to the same key.
 */
export function normalizeTag(tag: string): string {
    return normalizeQuotes(tag).trim().replace(/\s+/g, " ").toLowerCase();
}

/**
 * Case-insensitive union of tag lists. The first spelling seen for a key is
 * kept, and keys keep the order in which they first appear.
 */
export function mergeTags(...lists: ReadonlyArray<readonly string[]>): string[] {
    const seen = new Set<string>();
    const merged: string[] = [];
    for (const list of lists) {
        for (const tag of list) {
            const key = normalizeTag(tag);
            if (key.length === 0 || seen.has(key)) continue;
            seen.add(key);
            merged.push(tag.trim());
        }
    }
    return merged;
}

export function toTagKeySet(tags: readonly string[]): Set<string> {
    const keys = new Set<string>();
    for (const tag of tags) {
        const key = normalizeTag(tag);
        if (key.length > 0) keys.add(key);
    }
    return keys;
}

export function countSharedTags(
    tags: readonly string[],
    keys: ReadonlySet<string>
): number {
    let shared = 0;
    for (const key of toTagKeySet(tags)) {
        if (keys.has(key)) shared += 1;
    }
    return shared;
}
