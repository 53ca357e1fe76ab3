/**
 * Parses a base-10 integer from an env var, using `fallback` when the value is empty.
 */
export function parseEnvInt(value: string | undefined, fallback: number): number {
    const source =
        typeof value === "string" && value.trim().length > 0
            ? value
            : String(fallback);
    return Number.parseInt(source, 10);
}

export function parseEnvFloat(value: string | undefined, fallback: number): number {
    const source =
        typeof value === "string" && value.trim().length > 0
            ? value
            : String(fallback);
    return Number.parseFloat(source);
}

/**
 * Accepts the usual truthy spellings; anything else (including unset) falls
 * back to `fallback` only when the value is empty.
 */
export function isEnvFlagEnabled(
    value: string | undefined,
    fallback = false
): boolean {
    if (value === undefined || value.trim().length === 0) {
        return fallback;
    }
    return ["true", "1", "yes"].includes(value.trim().toLowerCase());
}

export function parseEnvCsv(value: string | undefined): string[] | undefined {
    if (value === undefined) {
        return undefined;
    }
    return value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
}
