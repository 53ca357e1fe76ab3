import { assemblePlaylist, buildFlowDescription, countBySource } from "../playlistAssembler";
import type { FlowTrack, FlowTrackSource } from "../types";
import { makeTrack } from "./fixtures";

function entry(id: string, source: FlowTrackSource, artist = `Artist ${id}`): FlowTrack {
    return { track: makeTrack(id, { artist }), source };
}

const VIBE = { moods: ["Mellow"], styles: ["Jazz"] };

describe("buildFlowDescription", () => {
    it("summarises period, vibe and track sources", () => {
        expect(
            buildFlowDescription("Evening", VIBE, {
                "vibe-anchor": 5,
                "familiar-anchor": 3,
                bridge: 1,
                expansion: 3,
            })
        ).toBe(
            "Evening flow | Vibe: Mellow, Jazz | 12 tracks: 5 discovery, 3 familiar, 1 bridging, 3 similar"
        );
    });

    it("says so when the vibe is empty", () => {
        expect(
            buildFlowDescription("Void", { moods: [], styles: [] }, countBySource([]))
        ).toBe("Void flow | Vibe: none | 0 tracks: 0 discovery, 0 familiar, 0 bridging, 0 similar");
    });
});

describe("assemblePlaylist", () => {
    const options = {
        targetSize: 3,
        maxTracksPerArtist: 0,
        periodName: "Evening",
        vibe: VIBE,
    };

    it("dedupes keeping the first occurrence and truncates to the target", () => {
        const playlist = assemblePlaylist(
            [
                entry("a", "vibe-anchor"),
                entry("b", "expansion"),
                entry("a", "familiar-anchor"),
                entry("c", "bridge"),
                entry("d", "expansion"),
            ],
            options
        );

        expect(playlist.trackIds).toEqual(["a", "b", "c"]);
        expect(playlist.sourceCounts).toEqual({
            "vibe-anchor": 1,
            "familiar-anchor": 0,
            bridge: 1,
            expansion: 1,
        });
        expect(playlist.description).toBe(
            "Evening flow | Vibe: Mellow, Jazz | 3 tracks: 1 discovery, 0 familiar, 1 bridging, 1 similar"
        );
        expect(playlist.warnings).toEqual([]);
    });

    it("applies the artist cap before truncating", () => {
        const playlist = assemblePlaylist(
            [
                entry("a", "vibe-anchor", "Same"),
                entry("b", "expansion", "Same"),
                entry("c", "expansion", "Same"),
                entry("d", "expansion", "Other"),
                entry("e", "expansion", "Third"),
            ],
            { ...options, maxTracksPerArtist: 1 }
        );

        expect(playlist.trackIds).toEqual(["a", "d", "e"]);
    });

    it("reports a short playlist", () => {
        const playlist = assemblePlaylist([entry("a", "vibe-anchor")], options);

        expect(playlist.trackIds).toEqual(["a"]);
        expect(playlist.warnings).toEqual(["Flow has 1 of 3 requested tracks"]);
    });

    it("returns an empty playlist for empty input", () => {
        const playlist = assemblePlaylist([], options);
        expect(playlist.tracks).toEqual([]);
        expect(playlist.warnings).toEqual(["Flow has 0 of 3 requested tracks"]);
    });
});
