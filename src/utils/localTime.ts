import { ConfigurationError } from "./errors";

function formatterFor(timeZone: string): Intl.DateTimeFormat {
    try {
        return new Intl.DateTimeFormat("en-US", {
            timeZone,
            year: "numeric",
            month: "2-digit",
            day: "2-digit",
            hour: "2-digit",
            hourCycle: "h23",
        });
    } catch (error) {
        throw new ConfigurationError(`Unknown time zone: ${timeZone}`, {
            timeZone,
            originalError: error instanceof Error ? error.message : String(error),
        });
    }
}

function partValue(parts: Intl.DateTimeFormatPart[], type: string): string {
    return parts.find((part) => part.type === type)?.value ?? "";
}

export function assertValidTimeZone(timeZone: string): void {
    formatterFor(timeZone);
}

/** Wall-clock hour (0-23) of `now` in the given IANA zone. */
export function getLocalHour(now: Date, timeZone: string): number {
    const parts = formatterFor(timeZone).formatToParts(now);
    return Number.parseInt(partValue(parts, "hour"), 10) % 24;
}

/** `yyyy-MM-dd` of `now` in the given IANA zone. */
export function getLocalDateKey(now: Date, timeZone: string): string {
    const parts = formatterFor(timeZone).formatToParts(now);
    return `${partValue(parts, "year")}-${partValue(parts, "month")}-${partValue(parts, "day")}`;
}
