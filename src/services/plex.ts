import axios, { type AxiosInstance } from "axios";
import { subDays } from "date-fns";
import PQueue from "p-queue";
import { z } from "zod";
import type { PlexConfig } from "../config";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";
import { logger } from "../utils/logger";
import { matchesVibe } from "./flow/candidateSelector";
import type {
    HistoryEntry,
    LibraryCatalog,
    PlaylistSync,
    SonicDistance,
    Track,
    TrackId,
} from "./flow/types";

const plexLogger = logger.child("plex");

export type PlexHttpClient = Pick<AxiosInstance, "get" | "post" | "put" | "delete">;

export interface PlexLibraryOptions {
    client?: PlexHttpClient;
    cacheTtlMs?: number;
    distanceConcurrency?: number;
    /** Neighbours requested per track when preparing sonic distances. */
    neighbourLimit?: number;
    /** Largest distance requested from the server; farther pairs stay unknown. */
    neighbourMaxDistance?: number;
    clock?: () => number;
}

const ratingKeySchema = z.union([z.string(), z.number()]).transform(String);
const tagListSchema = z.array(z.object({ tag: z.string() })).default([]);

const trackSchema = z.object({
    ratingKey: ratingKeySchema,
    title: z.string().default(""),
    grandparentTitle: z.string().optional(),
    originalTitle: z.string().optional(),
    userRating: z.number().optional(),
    lastViewedAt: z.number().optional(),
    viewCount: z.number().default(0),
    skipCount: z.number().default(0),
    Mood: tagListSchema,
    Style: tagListSchema,
    Genre: tagListSchema,
    distance: z.number().optional(),
});

type PlexTrack = z.infer<typeof trackSchema>;

const tracksResponseSchema = z.object({
    MediaContainer: z.object({ Metadata: z.array(trackSchema).default([]) }),
});

const historyResponseSchema = z.object({
    MediaContainer: z.object({
        Metadata: z
            .array(z.object({ ratingKey: ratingKeySchema, viewedAt: z.number() }))
            .default([]),
    }),
});

const sectionsResponseSchema = z.object({
    MediaContainer: z.object({
        Directory: z
            .array(z.object({ key: ratingKeySchema, title: z.string(), type: z.string() }))
            .default([]),
    }),
});

const identityResponseSchema = z.object({
    MediaContainer: z.object({ machineIdentifier: z.string() }),
});

const playlistsResponseSchema = z.object({
    MediaContainer: z.object({
        Metadata: z
            .array(
                z.object({
                    ratingKey: ratingKeySchema,
                    title: z.string(),
                    smart: z.union([z.boolean(), z.number()]).optional(),
                })
            )
            .default([]),
    }),
});

interface MusicSection {
    key: string;
    title: string;
}

interface TrackCache {
    tracks: Track[];
    byId: Map<TrackId, Track>;
    expiresAt: number;
}

function tagsOf(list: readonly { tag: string }[]): string[] {
    return list.map((entry) => entry.tag);
}

/** Plex rates 0-10 in half-star steps; flows work on 0-5. */
export function toTrack(item: PlexTrack): Track {
    return {
        id: item.ratingKey,
        artist: item.originalTitle ?? item.grandparentTitle ?? "",
        title: item.title,
        moods: tagsOf(item.Mood),
        styles: [...tagsOf(item.Style), ...tagsOf(item.Genre)],
        rating: item.userRating === undefined ? null : item.userRating / 2,
        lastPlayedAt:
            item.lastViewedAt === undefined ? null : new Date(item.lastViewedAt * 1000),
        skipCount: item.skipCount,
        playCount: item.viewCount,
        features: null,
    };
}

function pairKey(a: TrackId, b: TrackId): string {
    return a < b ? `${a}|${b}` : `${b}|${a}`;
}

/**
 * Plex Media Server adapter: serves the library, listening history and
 * sonic neighbours to the flow engine, and writes the generated playlist.
 */
export class PlexLibrary implements LibraryCatalog, PlaylistSync {
    private readonly client: PlexHttpClient;
    private readonly cacheTtlMs: number;
    private readonly distanceConcurrency: number;
    private readonly neighbourLimit: number;
    private readonly neighbourMaxDistance: number;
    private readonly clock: () => number;
    private trackCache: TrackCache | null = null;
    private sections: MusicSection[] | null = null;
    private machineIdentifier: string | null = null;

    constructor(
        private readonly config: PlexConfig,
        options: PlexLibraryOptions = {}
    ) {
        this.client =
            options.client ??
            axios.create({
                baseURL: config.url,
                headers: {
                    "X-Plex-Token": config.token,
                    Accept: "application/json",
                },
                timeout: 30000,
            });
        this.cacheTtlMs = options.cacheTtlMs ?? 5 * 60 * 1000;
        this.distanceConcurrency = options.distanceConcurrency ?? 4;
        this.neighbourLimit = options.neighbourLimit ?? 50;
        this.neighbourMaxDistance = options.neighbourMaxDistance ?? 1;
        this.clock = options.clock ?? Date.now;
    }

    private toAppError(error: unknown, operation: string): AppError {
        if (error instanceof AppError) {
            return error;
        }
        if (error instanceof z.ZodError) {
            return new AppError(
                ErrorCode.PLEX_REQUEST_FAILED,
                ErrorCategory.RECOVERABLE,
                `Unexpected Plex response for ${operation}`,
                { issues: error.errors.map((issue) => issue.message) }
            );
        }
        if (axios.isAxiosError(error)) {
            const status = error.response?.status;
            if (status === 401) {
                return new AppError(
                    ErrorCode.PLEX_UNAUTHORIZED,
                    ErrorCategory.FATAL,
                    "Plex rejected the configured token"
                );
            }
            return new AppError(
                ErrorCode.PLEX_REQUEST_FAILED,
                ErrorCategory.TRANSIENT,
                `Plex request failed for ${operation}: ${error.message}`,
                { status }
            );
        }
        return new AppError(
            ErrorCode.PLEX_REQUEST_FAILED,
            ErrorCategory.TRANSIENT,
            `Plex request failed for ${operation}: ${
                error instanceof Error ? error.message : String(error)
            }`
        );
    }

    private async fetch<S extends z.ZodTypeAny>(
        url: string,
        schema: S,
        params?: Record<string, string | number>
    ): Promise<z.output<S>> {
        try {
            const response = await this.client.get(url, { params });
            return schema.parse(response.data);
        } catch (error) {
            throw this.toAppError(error, `GET ${url}`);
        }
    }

    private async send(
        method: "post" | "put" | "delete",
        url: string,
        params?: Record<string, string | number>
    ): Promise<unknown> {
        try {
            if (method === "delete") {
                return (await this.client.delete(url, { params })).data;
            }
            if (method === "post") {
                return (await this.client.post(url, undefined, { params })).data;
            }
            return (await this.client.put(url, undefined, { params })).data;
        } catch (error) {
            throw this.toAppError(error, `${method.toUpperCase()} ${url}`);
        }
    }

    private async getMachineIdentifier(): Promise<string> {
        if (this.machineIdentifier) return this.machineIdentifier;
        const identity = await this.fetch("/identity", identityResponseSchema);
        this.machineIdentifier = identity.MediaContainer.machineIdentifier;
        return this.machineIdentifier;
    }

    /**
     * Resolves the configured library names to music sections. Names that are
     * missing or not music libraries are logged and skipped.
     */
    async getMusicSections(): Promise<MusicSection[]> {
        if (this.sections) return this.sections;

        const response = await this.fetch("/library/sections", sectionsResponseSchema);
        const directories = response.MediaContainer.Directory;
        const sections: MusicSection[] = [];

        for (const name of this.config.libraryNames) {
            const directory = directories.find((entry) => entry.title === name);
            if (!directory) {
                plexLogger.error(`Music library "${name}" not found on the Plex server`);
                continue;
            }
            if (directory.type !== "artist") {
                plexLogger.error(
                    `Section "${name}" is not a music library (type: ${directory.type})`
                );
                continue;
            }
            sections.push({ key: directory.key, title: directory.title });
        }

        if (sections.length === 0) {
            throw new AppError(
                ErrorCode.PLEX_LIBRARY_NOT_FOUND,
                ErrorCategory.FATAL,
                `None of the configured music libraries exist: ${this.config.libraryNames.join(", ")}`
            );
        }

        this.sections = sections;
        return sections;
    }

    private async loadTracks(): Promise<TrackCache> {
        if (this.trackCache && this.trackCache.expiresAt > this.clock()) {
            return this.trackCache;
        }

        const tracks: Track[] = [];
        for (const section of await this.getMusicSections()) {
            const response = await this.fetch(
                `/library/sections/${section.key}/all`,
                tracksResponseSchema,
                { type: 10 }
            );
            tracks.push(...response.MediaContainer.Metadata.map(toTrack));
            plexLogger.debug(
                `Loaded ${response.MediaContainer.Metadata.length} tracks from "${section.title}"`
            );
        }

        this.trackCache = {
            tracks,
            byId: new Map(tracks.map((track) => [track.id, track])),
            expiresAt: this.clock() + this.cacheTtlMs,
        };
        return this.trackCache;
    }

    async tracksByTag(
        moods: readonly string[],
        styles: readonly string[]
    ): Promise<Track[]> {
        const { tracks } = await this.loadTracks();
        return tracks.filter((track) => matchesVibe(track, { moods, styles }));
    }

    /**
     * Plays within the lookback window, newest first. Plays of tracks outside
     * the configured libraries are dropped.
     */
    async trackHistory(lookbackDays: number, now: Date): Promise<HistoryEntry[]> {
        const { byId } = await this.loadTracks();
        const since = Math.floor(subDays(now, lookbackDays).getTime() / 1000);
        const entries: HistoryEntry[] = [];

        for (const section of await this.getMusicSections()) {
            const response = await this.fetch(
                "/status/sessions/history/all",
                historyResponseSchema,
                {
                    sort: "viewedAt:desc",
                    librarySectionID: section.key,
                    "viewedAt>>": since,
                }
            );
            for (const item of response.MediaContainer.Metadata) {
                const track = byId.get(item.ratingKey);
                if (!track) continue;
                entries.push({
                    track,
                    playedAt: new Date(item.viewedAt * 1000),
                    rating: track.rating,
                });
            }
        }

        return entries.sort((a, b) => b.playedAt.getTime() - a.playedAt.getTime());
    }

    /**
     * Asks the server for each track's sonic neighbours and answers distance
     * queries from the collected pairs. A track whose lookup fails simply has
     * no known neighbours.
     */
    async distanceFor(tracks: readonly Track[]): Promise<SonicDistance> {
        const distances = new Map<string, number>();
        const queue = new PQueue({ concurrency: this.distanceConcurrency });
        let failures = 0;

        await queue.addAll(
            tracks.map((track) => async () => {
                try {
                    const response = await this.fetch(
                        `/library/metadata/${track.id}/nearest`,
                        tracksResponseSchema,
                        {
                            limit: this.neighbourLimit,
                            maxDistance: this.neighbourMaxDistance,
                        }
                    );
                    for (const neighbour of response.MediaContainer.Metadata) {
                        if (neighbour.distance === undefined) continue;
                        const key = pairKey(track.id, neighbour.ratingKey);
                        const known = distances.get(key);
                        distances.set(
                            key,
                            known === undefined
                                ? neighbour.distance
                                : Math.min(known, neighbour.distance)
                        );
                    }
                } catch (error) {
                    failures += 1;
                    plexLogger.warn(`Sonic neighbours unavailable for track ${track.id}`, {
                        error,
                    });
                }
            })
        );

        plexLogger.debug(`Collected ${distances.size} sonic pairs`, {
            tracks: tracks.length,
            failures,
        });
        return (a, b) => distances.get(pairKey(a.id, b.id));
    }

    /**
     * Replaces the contents of the named audio playlist, creating it when it
     * does not exist, and sets its summary.
     */
    async upsertPlaylist(
        name: string,
        trackIds: readonly TrackId[],
        description: string
    ): Promise<void> {
        if (trackIds.length === 0) {
            plexLogger.debug(`No tracks for "${name}"; leaving playlist untouched`);
            return;
        }

        const machineIdentifier = await this.getMachineIdentifier();
        const uri = `server://${machineIdentifier}/com.plexapp.plugins.library/library/metadata/${trackIds.join(",")}`;

        const playlists = await this.fetch("/playlists", playlistsResponseSchema, {
            playlistType: "audio",
        });
        const existing = playlists.MediaContainer.Metadata.find(
            (playlist) => playlist.title === name && !playlist.smart
        );

        let playlistKey: string;
        if (existing) {
            playlistKey = existing.ratingKey;
            await this.send("delete", `/playlists/${playlistKey}/items`);
            try {
                await this.send("put", `/playlists/${playlistKey}/items`, { uri });
            } catch (error) {
                plexLogger.error(
                    `Playlist "${name}" was cleared but its new items were not added; the next cycle replaces them`,
                    { playlistKey, error }
                );
                throw error;
            }
            plexLogger.debug(`Replaced items of playlist "${name}"`, {
                tracks: trackIds.length,
            });
        } else {
            const created = playlistsResponseSchema.safeParse(
                await this.send("post", "/playlists", {
                    type: "audio",
                    title: name,
                    smart: 0,
                    uri,
                })
            );
            const createdKey = created.success
                ? created.data.MediaContainer.Metadata[0]?.ratingKey
                : undefined;
            if (createdKey === undefined) {
                throw new AppError(
                    ErrorCode.PLEX_REQUEST_FAILED,
                    ErrorCategory.TRANSIENT,
                    `Plex did not return the created playlist "${name}"`
                );
            }
            playlistKey = createdKey;
            plexLogger.debug(`Created playlist "${name}"`, { tracks: trackIds.length });
        }

        await this.send("put", `/playlists/${playlistKey}`, { summary: description });
    }
}
