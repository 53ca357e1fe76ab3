import { applyArtistCap } from "../artistCap";
import type { FlowTrack } from "../types";
import { makeTrack } from "./fixtures";

function entry(id: string, artist: string): FlowTrack {
    return { track: makeTrack(id, { artist }), source: "vibe-anchor" };
}

const ids = (tracks: FlowTrack[]) => tracks.map((item) => item.track.id);

describe("applyArtistCap", () => {
    const tracks = [
        entry("a1", "Nina"),
        entry("a2", "nina "),
        entry("b1", "Miles"),
        entry("a3", "NINA"),
        entry("b2", "Miles"),
    ];

    it("limits tracks per artist case-insensitively, keeping input order", () => {
        expect(ids(applyArtistCap(tracks, { maxPerArtist: 2 }))).toEqual([
            "a1",
            "a2",
            "b1",
            "b2",
        ]);
        expect(ids(applyArtistCap(tracks, { maxPerArtist: 1 }))).toEqual(["a1", "b1"]);
    });

    it("is disabled by a non-positive cap", () => {
        const capped = applyArtistCap(tracks, { maxPerArtist: 0 });
        expect(ids(capped)).toEqual(["a1", "a2", "b1", "a3", "b2"]);
        expect(capped).not.toBe(tracks);
    });

    it("stops at the target count", () => {
        expect(ids(applyArtistCap(tracks, { maxPerArtist: 2, targetCount: 3 }))).toEqual([
            "a1",
            "a2",
            "b1",
        ]);
    });

    it("relaxes the cap to reach the target when fallback is enabled", () => {
        expect(
            ids(
                applyArtistCap(tracks, {
                    maxPerArtist: 1,
                    targetCount: 4,
                    fallback: { enabled: true },
                })
            )
        ).toEqual(["a1", "a2", "b1", "b2"]);
    });

    it("never relaxes beyond the configured ceiling", () => {
        expect(
            ids(
                applyArtistCap(tracks, {
                    maxPerArtist: 1,
                    targetCount: 5,
                    fallback: { enabled: true, maxRelaxedPerArtist: 1 },
                })
            )
        ).toEqual(["a1", "b1"]);
    });

    it("treats tracks without an artist as distinct", () => {
        const unknown = [entry("u1", ""), entry("u2", "  "), entry("u3", "")];
        expect(ids(applyArtistCap(unknown, { maxPerArtist: 1 }))).toEqual(["u1", "u2", "u3"]);
    });
});
