jest.mock("dotenv", () => ({
    __esModule: true,
    default: { config: jest.fn() },
}));

jest.mock("../utils/logger", () => ({
    logger: {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
    },
}));

import { DEFAULT_PERIODS, loadAppConfig } from "../config";
import { ConfigurationError } from "../utils/errors";

const BASE_ENV = {
    PLEX_URL: "http://plex.local:32400/",
    PLEX_TOKEN: "test-token",
};

describe("loadAppConfig", () => {
    it("applies defaults for everything but the server credentials", () => {
        const config = loadAppConfig({ ...BASE_ENV });

        expect(config.plex).toEqual({
            url: "http://plex.local:32400",
            token: "test-token",
            libraryNames: ["Music"],
        });
        expect(config.runIntervalMinutes).toBe(1440);
        expect(config.flow).toEqual({
            playlistName: "Daily Flow",
            targetSize: 40,
            timeZone: "UTC",
            periods: DEFAULT_PERIODS,
            vibe: {
                lookbackDays: 14,
                topMoods: 3,
                topStyles: 2,
                minOccurrences: 2,
                countPerPlay: true,
            },
            refinement: {
                minRating: 0,
                excludePlayedDays: 0,
                maxSkipCount: Number.POSITIVE_INFINITY,
            },
            anchors: {
                vibeAnchorCount: 10,
                familiarAnchorCount: 8,
                historyMinPlays: 2,
                historyMinRating: 0,
                historyLookbackDays: 30,
            },
            sonic: {
                expansionEnabled: true,
                seedTracks: 5,
                similarTracksPerSeed: 4,
                maxDistance: 0.3,
                finalMixRatio: 0.5,
                adventureBridging: false,
                sortSimilarityLimit: 10,
                sortMaxDistance: 0.4,
            },
            maxTracksPerArtist: 3,
        });
    });

    it("reads overrides from the environment", () => {
        const config = loadAppConfig({
            ...BASE_ENV,
            PLEX_MUSIC_LIBRARY_NAMES: "Music, Jazz Vault",
            RUN_INTERVAL_MINUTES: "0",
            TIMEZONE: "Europe/Berlin",
            FLOW_PLAYLIST_NAME: " Evening Mix ",
            FLOW_PLAYLIST_SIZE: "25",
            FLOW_MAX_SKIP_COUNT: "3",
            FLOW_ADVENTURE_BRIDGING: "yes",
            FLOW_SONIC_EXPANSION: "false",
            FLOW_VIBE_COUNT_PER_PLAY: "0",
            FLOW_MIN_RATING: "3.5",
            FLOW_MAX_TRACKS_PER_ARTIST: "0",
        });

        expect(config.plex.libraryNames).toEqual(["Music", "Jazz Vault"]);
        expect(config.runIntervalMinutes).toBe(0);
        expect(config.flow.timeZone).toBe("Europe/Berlin");
        expect(config.flow.playlistName).toBe("Evening Mix");
        expect(config.flow.targetSize).toBe(25);
        expect(config.flow.refinement).toEqual({
            minRating: 3.5,
            excludePlayedDays: 0,
            maxSkipCount: 3,
        });
        expect(config.flow.sonic.adventureBridging).toBe(true);
        expect(config.flow.sonic.expansionEnabled).toBe(false);
        expect(config.flow.vibe.countPerPlay).toBe(false);
        expect(config.flow.maxTracksPerArtist).toBe(0);
    });

    it("parses custom periods and sorts them", () => {
        const config = loadAppConfig({
            ...BASE_ENV,
            FLOW_PERIODS: JSON.stringify([
                { name: "Late", startHour: 21, moods: ["Calm"] },
                { name: "Work", startHour: 9, styles: ["Ambient"] },
            ]),
        });

        expect(config.flow.periods).toEqual([
            { name: "Work", startHour: 9, styles: ["Ambient"] },
            { name: "Late", startHour: 21, moods: ["Calm"] },
        ]);
    });

    it("names every missing required variable", () => {
        expect(() => loadAppConfig({})).toThrow(
            "Invalid configuration: PLEX_URL: Required; PLEX_TOKEN: Required"
        );
    });

    it("rejects values outside their range", () => {
        expect(() => loadAppConfig({ ...BASE_ENV, FLOW_PLAYLIST_SIZE: "0" })).toThrow(
            /FLOW_PLAYLIST_SIZE/
        );
        expect(() => loadAppConfig({ ...BASE_ENV, FLOW_SONIC_MAX_DISTANCE: "1.5" })).toThrow(
            /FLOW_SONIC_MAX_DISTANCE/
        );
        expect(() => loadAppConfig({ ...BASE_ENV, FLOW_VIBE_TOP_MOODS: "many" })).toThrow(
            /FLOW_VIBE_TOP_MOODS/
        );
    });

    it("rejects malformed period JSON", () => {
        expect(() => loadAppConfig({ ...BASE_ENV, FLOW_PERIODS: "not json" })).toThrow(
            "Invalid configuration: FLOW_PERIODS: must be a JSON array of periods"
        );
    });

    it("rejects periods sharing a start hour", () => {
        expect(() =>
            loadAppConfig({
                ...BASE_ENV,
                FLOW_PERIODS: JSON.stringify([
                    { name: "Dawn", startHour: 6 },
                    { name: "Morning", startHour: 6 },
                ]),
            })
        ).toThrow('Flow periods "Dawn" and "Morning" both start at hour 6');
    });

    it("rejects an unknown time zone", () => {
        let caught: unknown;
        try {
            loadAppConfig({ ...BASE_ENV, TIMEZONE: "Mars/Olympus_Mons" });
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ConfigurationError);
        expect(caught).toMatchObject({ message: "Unknown time zone: Mars/Olympus_Mons" });
    });
});
