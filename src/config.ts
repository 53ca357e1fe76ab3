import dotenv from "dotenv";
import { z } from "zod";
import { validatePeriods } from "./services/flow/periodResolver";
import {
    SKIP_FILTER_DISABLED,
    type FlowSettings,
    type PeriodDefinition,
} from "./services/flow/types";
import { ConfigurationError } from "./utils/errors";
import {
    isEnvFlagEnabled,
    parseEnvCsv,
    parseEnvFloat,
    parseEnvInt,
} from "./utils/envParsers";
import { assertValidTimeZone } from "./utils/localTime";
import { logger } from "./utils/logger";

dotenv.config();

export interface PlexConfig {
    url: string;
    token: string;
    libraryNames: string[];
}

export interface AppConfig {
    plex: PlexConfig;
    /** Minutes between cycles; 0 or less runs a single cycle. */
    runIntervalMinutes: number;
    flow: FlowSettings;
}

export const DEFAULT_PERIODS: readonly PeriodDefinition[] = [
    { name: "Morning", startHour: 6 },
    { name: "Afternoon", startHour: 12 },
    { name: "Evening", startHour: 18 },
    { name: "Night", startHour: 22 },
];

const intVar = (fallback: number, min = 0) =>
    z
        .string()
        .optional()
        .transform((value) => parseEnvInt(value, fallback))
        .pipe(z.number().int().min(min));

const floatVar = (fallback: number, min: number, max: number) =>
    z
        .string()
        .optional()
        .transform((value) => parseEnvFloat(value, fallback))
        .pipe(z.number().min(min).max(max));

const flagVar = (fallback: boolean) =>
    z
        .string()
        .optional()
        .transform((value) => isEnvFlagEnabled(value, fallback));

const periodSchema = z.object({
    name: z.string().min(1),
    startHour: z.number().int().min(0).max(23),
    moods: z.array(z.string()).optional(),
    styles: z.array(z.string()).optional(),
});

const periodsVar = z
    .string()
    .optional()
    .transform((raw, ctx): unknown => {
        if (raw === undefined || raw.trim().length === 0) {
            return DEFAULT_PERIODS;
        }
        try {
            return JSON.parse(raw);
        } catch {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: "must be a JSON array of periods",
            });
            return z.NEVER;
        }
    })
    .pipe(z.array(periodSchema));

const envSchema = z.object({
    PLEX_URL: z.string().url("PLEX_URL must be a URL"),
    PLEX_TOKEN: z.string().min(1, "PLEX_TOKEN is required"),
    PLEX_MUSIC_LIBRARY_NAMES: z.string().optional(),
    RUN_INTERVAL_MINUTES: z
        .string()
        .optional()
        .transform((value) => parseEnvInt(value, 1440))
        .pipe(z.number().int()),
    TIMEZONE: z.string().optional(),

    FLOW_PLAYLIST_NAME: z.string().optional(),
    FLOW_PLAYLIST_SIZE: intVar(40, 1),
    FLOW_PERIODS: periodsVar,

    FLOW_VIBE_LOOKBACK_DAYS: intVar(14),
    FLOW_VIBE_TOP_MOODS: intVar(3),
    FLOW_VIBE_TOP_STYLES: intVar(2),
    FLOW_VIBE_MIN_OCCURRENCES: intVar(2, 1),
    FLOW_VIBE_COUNT_PER_PLAY: flagVar(true),

    FLOW_MIN_RATING: floatVar(0, 0, 5),
    FLOW_EXCLUDE_PLAYED_DAYS: intVar(0),
    FLOW_MAX_SKIP_COUNT: z
        .string()
        .optional()
        .transform((value) =>
            value === undefined || value.trim().length === 0
                ? SKIP_FILTER_DISABLED
                : Number.parseInt(value, 10)
        )
        .pipe(z.number().min(0)),

    FLOW_VIBE_ANCHOR_COUNT: intVar(10),
    FLOW_HISTORY_ANCHOR_COUNT: intVar(8),
    FLOW_HISTORY_MIN_PLAYS: intVar(2, 1),
    FLOW_HISTORY_MIN_RATING: floatVar(0, 0, 5),
    FLOW_HISTORY_LOOKBACK_DAYS: intVar(30),

    FLOW_SONIC_EXPANSION: flagVar(true),
    FLOW_SONIC_SEED_TRACKS: intVar(5),
    FLOW_SIMILAR_TRACKS_PER_SEED: intVar(4),
    FLOW_SONIC_MAX_DISTANCE: floatVar(0.3, 0, 1),
    FLOW_FINAL_MIX_RATIO: floatVar(0.5, 0, 1),
    FLOW_ADVENTURE_BRIDGING: flagVar(false),
    FLOW_SONIC_SORT_SIMILARITY_LIMIT: intVar(10, 1),
    FLOW_SONIC_SORT_MAX_DISTANCE: floatVar(0.4, 0, 1),

    FLOW_MAX_TRACKS_PER_ARTIST: intVar(3),
});

type ParsedEnv = z.infer<typeof envSchema>;

function parseEnv(env: NodeJS.ProcessEnv): ParsedEnv {
    const parsed = envSchema.safeParse(env);
    if (parsed.success) {
        return parsed.data;
    }

    const issues = parsed.error.errors.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    for (const issue of issues) {
        logger.error(`   - ${issue}`);
    }
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, {
        issues,
    });
}

/**
 * Builds the validated application config from the environment. Throws
 * ConfigurationError naming every offending variable; the period list and
 * time zone are validated here so a bad setup fails before the first cycle.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = parseEnv(env);

    const timeZone = parsed.TIMEZONE?.trim() || "UTC";
    assertValidTimeZone(timeZone);
    const periods = validatePeriods(parsed.FLOW_PERIODS);

    const config: AppConfig = {
        plex: {
            url: parsed.PLEX_URL.replace(/\/$/, ""),
            token: parsed.PLEX_TOKEN,
            libraryNames: parseEnvCsv(parsed.PLEX_MUSIC_LIBRARY_NAMES) ?? ["Music"],
        },
        runIntervalMinutes: parsed.RUN_INTERVAL_MINUTES,
        flow: {
            playlistName: parsed.FLOW_PLAYLIST_NAME?.trim() || "Daily Flow",
            targetSize: parsed.FLOW_PLAYLIST_SIZE,
            timeZone,
            periods,
            vibe: {
                lookbackDays: parsed.FLOW_VIBE_LOOKBACK_DAYS,
                topMoods: parsed.FLOW_VIBE_TOP_MOODS,
                topStyles: parsed.FLOW_VIBE_TOP_STYLES,
                minOccurrences: parsed.FLOW_VIBE_MIN_OCCURRENCES,
                countPerPlay: parsed.FLOW_VIBE_COUNT_PER_PLAY,
            },
            refinement: {
                minRating: parsed.FLOW_MIN_RATING,
                excludePlayedDays: parsed.FLOW_EXCLUDE_PLAYED_DAYS,
                maxSkipCount: parsed.FLOW_MAX_SKIP_COUNT,
            },
            anchors: {
                vibeAnchorCount: parsed.FLOW_VIBE_ANCHOR_COUNT,
                familiarAnchorCount: parsed.FLOW_HISTORY_ANCHOR_COUNT,
                historyMinPlays: parsed.FLOW_HISTORY_MIN_PLAYS,
                historyMinRating: parsed.FLOW_HISTORY_MIN_RATING,
                historyLookbackDays: parsed.FLOW_HISTORY_LOOKBACK_DAYS,
            },
            sonic: {
                expansionEnabled: parsed.FLOW_SONIC_EXPANSION,
                seedTracks: parsed.FLOW_SONIC_SEED_TRACKS,
                similarTracksPerSeed: parsed.FLOW_SIMILAR_TRACKS_PER_SEED,
                maxDistance: parsed.FLOW_SONIC_MAX_DISTANCE,
                finalMixRatio: parsed.FLOW_FINAL_MIX_RATIO,
                adventureBridging: parsed.FLOW_ADVENTURE_BRIDGING,
                sortSimilarityLimit: parsed.FLOW_SONIC_SORT_SIMILARITY_LIMIT,
                sortMaxDistance: parsed.FLOW_SONIC_SORT_MAX_DISTANCE,
            },
            maxTracksPerArtist: parsed.FLOW_MAX_TRACKS_PER_ARTIST,
        },
    };

    logger.debug("Configuration loaded", {
        plexUrl: config.plex.url,
        libraries: config.plex.libraryNames,
        runIntervalMinutes: config.runIntervalMinutes,
        timeZone,
        periods: periods.map((period) => `${period.name}@${period.startHour}`),
    });

    return config;
}
