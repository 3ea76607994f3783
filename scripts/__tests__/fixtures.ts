import type { Logger } from "../logger.js";
import type { LibraryClient, SavedTracksPage, UserProfile } from "../types.js";

export interface MemoryLogger extends Logger {
  lines: string[];
}

export function memoryLogger(): MemoryLogger {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(message),
    warn: (message) => lines.push(message),
    error: (message) => lines.push(message),
  };
}

export function savedItem(id: string | null, overrides: Record<string, unknown> = {}) {
  return {
    added_at: "2024-03-01T10:00:00Z",
    track: {
      id,
      uri: id ? `spotify:track:${id}` : "spotify:local:Someone:Demo::180",
      name: `Track ${id ?? "local"}`,
      album: { name: "Album", release_date: "2020-05-01" },
      artists: [{ name: "Artist A" }, { name: "Artist B" }],
      duration_ms: 180000,
      popularity: 42,
      explicit: false,
      ...overrides,
    },
  };
}

export function features(id: string, values: Record<string, unknown> = {}) {
  return {
    id,
    tempo: 120,
    key: 0,
    mode: 1,
    danceability: 0.5,
    energy: 0.6,
    valence: 0.7,
    acousticness: 0.1,
    instrumentalness: 0,
    liveness: 0.2,
    speechiness: 0.05,
    time_signature: 4,
    ...values,
  };
}

/**
 * In-memory library: pages are served in order, audio features are looked
 * up in `featureTable`. Pass `failBatches` to make specific batch calls throw.
 */
export class FakeLibraryClient implements LibraryClient {
  readonly savedTrackLimits: number[] = [];
  readonly featureRequests: string[][] = [];
  private readonly pages: unknown[][];
  private readonly featureTable: Map<string, unknown>;
  private readonly failBatches: Set<number>;

  constructor(
    pages: unknown[][],
    featureTable: Record<string, unknown> = {},
    failBatches: number[] = [],
  ) {
    this.pages = pages;
    this.featureTable = new Map(Object.entries(featureTable));
    this.failBatches = new Set(failBatches);
  }

  async currentUser(): Promise<UserProfile> {
    return { id: "user-1", displayName: "Test User" };
  }

  async savedTracks(limit: number): Promise<SavedTracksPage> {
    this.savedTrackLimits.push(limit);
    return this.page(0);
  }

  async nextPage(page: SavedTracksPage): Promise<SavedTracksPage> {
    if (!page.next) throw new Error("no next page");
    return this.page(Number(page.next.split("=")[1]));
  }

  async audioFeatures(ids: string[]): Promise<unknown[]> {
    this.featureRequests.push(ids);
    if (this.failBatches.has(this.featureRequests.length)) {
      throw new Error("Spotify request failed (502)");
    }
    return ids.map((id) => this.featureTable.get(id) ?? null);
  }

  private page(index: number): SavedTracksPage {
    const next = index + 1 < this.pages.length ? `https://api.test/me/tracks?page=${index + 1}` : null;
    return { items: this.pages[index] ?? [], next };
  }
}
