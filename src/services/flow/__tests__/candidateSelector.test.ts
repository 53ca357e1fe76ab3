import { selectCandidates } from "../candidateSelector";
import { SKIP_FILTER_DISABLED, type RefinementSettings } from "../types";
import { daysBefore, makeTrack } from "./fixtures";

const NOW = new Date("2024-06-01T12:00:00Z");
const VIBE = { moods: ["Mellow"], styles: ["Jazz"] };
const OPEN: RefinementSettings = {
    minRating: 0,
    excludePlayedDays: 0,
    maxSkipCount: SKIP_FILTER_DISABLED,
};

const ids = (tracks: { id: string }[]) => tracks.map((track) => track.id);

describe("selectCandidates", () => {
    it("matches moods against moods and styles against styles", () => {
        const tracks = [
            makeTrack("a", { moods: ["mellow"] }),
            makeTrack("b", { styles: [" JAZZ"] }),
            makeTrack("c", { moods: ["Jazz"] }),
            makeTrack("d", { styles: ["Rock"] }),
        ];

        expect(ids(selectCandidates(tracks, VIBE, OPEN, NOW))).toEqual(["a", "b"]);
    });

    it("keeps unrated tracks under a rating floor", () => {
        const tracks = [
            makeTrack("low", { moods: ["Mellow"], rating: 2 }),
            makeTrack("unrated", { moods: ["Mellow"] }),
            makeTrack("high", { moods: ["Mellow"], rating: 4 }),
        ];

        expect(ids(selectCandidates(tracks, VIBE, { ...OPEN, minRating: 3 }, NOW))).toEqual([
            "unrated",
            "high",
        ]);
    });

    it("holds back recently played tracks", () => {
        const tracks = [
            makeTrack("recent", { moods: ["Mellow"], lastPlayedAt: daysBefore(NOW, 3) }),
            makeTrack("stale", { moods: ["Mellow"], lastPlayedAt: daysBefore(NOW, 10) }),
            makeTrack("never", { moods: ["Mellow"] }),
        ];

        expect(
            ids(selectCandidates(tracks, VIBE, { ...OPEN, excludePlayedDays: 7 }, NOW))
        ).toEqual(["stale", "never"]);
    });

    it("drops tracks skipped too often only when the filter is set", () => {
        const tracks = [
            makeTrack("skipped", { moods: ["Mellow"], skipCount: 3 }),
            makeTrack("kept", { moods: ["Mellow"], skipCount: 2 }),
        ];

        expect(ids(selectCandidates(tracks, VIBE, { ...OPEN, maxSkipCount: 2 }, NOW))).toEqual([
            "kept",
        ]);
        expect(ids(selectCandidates(tracks, VIBE, OPEN, NOW))).toEqual(["skipped", "kept"]);
    });

    it("dedupes by id keeping the first occurrence", () => {
        const first = makeTrack("a", { moods: ["Mellow"], title: "first" });
        const second = makeTrack("a", { moods: ["Mellow"], title: "second" });

        const candidates = selectCandidates([first, second], VIBE, OPEN, NOW);
        expect(candidates).toEqual([first]);
    });

    it("returns nothing for an empty vibe", () => {
        const tracks = [makeTrack("a", { moods: ["Mellow"] })];
        expect(selectCandidates(tracks, { moods: [], styles: [] }, OPEN, NOW)).toEqual([]);
    });
});
