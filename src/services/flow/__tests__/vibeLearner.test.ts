import { learnVibe } from "../vibeLearner";
import type { VibeLearningSettings } from "../types";
import { daysBefore, makeTrack, play } from "./fixtures";

const NOW = new Date("2024-06-01T12:00:00Z");

const SETTINGS: VibeLearningSettings = {
    lookbackDays: 14,
    topMoods: 1,
    topStyles: 2,
    minOccurrences: 2,
    countPerPlay: true,
};

describe("learnVibe", () => {
    const calm = makeTrack("calm", { moods: ["Calm"], styles: ["Ambient"] });
    const loud = makeTrack("loud", { moods: ["Energetic"], styles: ["Rock"] });
    const old = makeTrack("old", { moods: ["Dreamy"], styles: ["Shoegaze"] });

    const history = [
        ...[1, 2, 3, 4, 5].map((days) => play(calm, daysBefore(NOW, days))),
        play(loud, daysBefore(NOW, 2)),
        play(old, daysBefore(NOW, 30)),
        play(old, daysBefore(NOW, 31)),
    ];

    it("keeps the most frequent tags above the occurrence threshold", () => {
        expect(learnVibe(history, NOW, SETTINGS)).toEqual({
            moods: ["Calm"],
            styles: ["Ambient"],
        });
    });

    it("returns an empty augmentation for empty history", () => {
        expect(learnVibe([], NOW, SETTINGS)).toEqual({ moods: [], styles: [] });
    });

    it("returns nothing when the limits are zero", () => {
        expect(learnVibe(history, NOW, { ...SETTINGS, topMoods: 0, topStyles: 0 })).toEqual({
            moods: [],
            styles: [],
        });
    });

    it("ignores plays outside the lookback window", () => {
        expect(
            learnVibe(history, NOW, { ...SETTINGS, lookbackDays: 60, topMoods: 2 }).moods
        ).toEqual(["Calm", "Dreamy"]);
    });

    it("counts each track once when per-play counting is off", () => {
        const echo = makeTrack("echo", { moods: ["calm"] });
        const withEcho = [play(echo, daysBefore(NOW, 0.5)), ...history];

        expect(learnVibe(history, NOW, { ...SETTINGS, countPerPlay: false }).moods).toEqual([]);
        expect(learnVibe(withEcho, NOW, { ...SETTINGS, countPerPlay: false }).moods).toEqual([
            "calm",
        ]);
    });

    it("breaks count ties by the most recent play", () => {
        const mellow = makeTrack("mellow", { moods: ["Mellow"] });
        const warm = makeTrack("warm", { moods: ["Warm"] });
        const tied = [
            play(mellow, daysBefore(NOW, 5)),
            play(mellow, daysBefore(NOW, 6)),
            play(warm, daysBefore(NOW, 1)),
            play(warm, daysBefore(NOW, 2)),
        ];

        expect(learnVibe(tied, NOW, SETTINGS).moods).toEqual(["Warm"]);
    });
});
