import { ConfigurationError } from "../../utils/errors";
import { normalizeTag } from "../../utils/tags";
import type { PeriodDefinition } from "./types";

/**
 * Validates a period list and returns it sorted by start hour.
 * Throws ConfigurationError for an empty list, a start hour outside 0-23, a
 * repeated start hour or a repeated name.
 */
export function validatePeriods(
    periods: readonly PeriodDefinition[]
): PeriodDefinition[] {
    if (periods.length === 0) {
        throw new ConfigurationError("At least one flow period must be configured");
    }

    const names = new Set<string>();
    const hours = new Map<number, string>();

    for (const period of periods) {
        const name = period.name.trim();
        if (name.length === 0) {
            throw new ConfigurationError("Flow period names must not be empty");
        }
        if (
            !Number.isInteger(period.startHour) ||
            period.startHour < 0 ||
            period.startHour > 23
        ) {
            throw new ConfigurationError(
                `Flow period "${name}" has invalid start hour ${period.startHour}`,
                { period: name, startHour: period.startHour }
            );
        }

        const key = normalizeTag(name);
        if (names.has(key)) {
            throw new ConfigurationError(`Duplicate flow period name "${name}"`, {
                period: name,
            });
        }
        names.add(key);

        const clash = hours.get(period.startHour);
        if (clash !== undefined) {
            throw new ConfigurationError(
                `Flow periods "${clash}" and "${name}" both start at hour ${period.startHour}`,
                { periods: [clash, name], startHour: period.startHour }
            );
        }
        hours.set(period.startHour, name);
    }

    return [...periods].sort((a, b) => a.startHour - b.startHour);
}

/**
 * The active period is the latest one that has started by `hour`. Before the
 * first start hour of the day, the last period of the previous day is still
 * running.
 */
export function resolvePeriod(
    periods: readonly PeriodDefinition[],
    hour: number
): PeriodDefinition {
    const sorted = validatePeriods(periods);
    let active = sorted[sorted.length - 1];
    for (const period of sorted) {
        if (period.startHour <= hour) {
            active = period;
        }
    }
    return active;
}
