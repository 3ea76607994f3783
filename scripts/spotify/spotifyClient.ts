import type { z } from "zod";
import { SpotifyApiError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { LibraryClient, SavedTracksPage, UserProfile } from "../types.js";
import {
  AudioFeaturesResponseSchema,
  SavedTracksPageSchema,
  UserProfileSchema,
} from "./spotifySchemas.js";
import { SPOTIFY_CONFIG } from "./spotifyConfig.js";

// ─── Utilities ──────────────────────────────────────────────────────────

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface TokenProvider {
  getAccessToken(): Promise<string>;
}

export interface SpotifyClientOptions {
  auth: TokenProvider;
  logger: Logger;
  apiBase?: string;
  maxRetries?: number;
  fetch?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

// ─── Client ─────────────────────────────────────────────────────────────

/**
 * Spotify Web API client for the endpoints the export uses.
 * Rate-limited (429) requests wait for `Retry-After` and are retried;
 * every other failure throws a {@link SpotifyApiError}.
 */
export class SpotifyClient implements LibraryClient {
  private readonly auth: TokenProvider;
  private readonly logger: Logger;
  private readonly apiBase: string;
  private readonly maxRetries: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: SpotifyClientOptions) {
    this.auth = options.auth;
    this.logger = options.logger;
    this.apiBase = options.apiBase ?? SPOTIFY_CONFIG.API_BASE;
    this.maxRetries = options.maxRetries ?? SPOTIFY_CONFIG.MAX_RETRIES;
    this.fetchImpl = options.fetch ?? fetch;
    this.sleep = options.sleep ?? sleep;
  }

  currentUser(): Promise<UserProfile> {
    return this.get(`${this.apiBase}/me`, UserProfileSchema);
  }

  savedTracks(limit: number): Promise<SavedTracksPage> {
    return this.get(`${this.apiBase}/me/tracks?limit=${limit}`, SavedTracksPageSchema);
  }

  async nextPage(page: SavedTracksPage): Promise<SavedTracksPage> {
    if (!page.next) return { items: [], next: null };
    return this.get(page.next, SavedTracksPageSchema);
  }

  async audioFeatures(ids: string[]): Promise<unknown[]> {
    if (ids.length === 0) return [];
    const data = await this.get(
      `${this.apiBase}/audio-features?ids=${ids.join(",")}`,
      AudioFeaturesResponseSchema,
    );
    return data.audio_features;
  }

  private async get<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      const token = await this.auth.getAccessToken();
      const response = await this.fetchImpl(url, {
        headers: { Authorization: `Bearer ${token}` },
      });

      if (response.status === 429) {
        const retryAfter = Number.parseInt(
          response.headers.get("retry-after") ?? String(SPOTIFY_CONFIG.DEFAULT_RETRY_AFTER_S),
          10,
        );
        const waitS = Number.isNaN(retryAfter) ? SPOTIFY_CONFIG.DEFAULT_RETRY_AFTER_S : retryAfter;
        if (attempt + 1 < this.maxRetries) {
          this.logger.warn(`  Rate limited. Waiting ${waitS}s...`);
          await this.sleep(waitS * 1000);
        }
        continue;
      }

      if (!response.ok) {
        throw new SpotifyApiError(response.status, url, await response.text());
      }

      const parsed = schema.safeParse(await response.json());
      if (!parsed.success) {
        throw new SpotifyApiError(response.status, url, "unexpected response shape");
      }
      return parsed.data;
    }

    throw new SpotifyApiError(429, url, `still rate limited after ${this.maxRetries} attempts`);
  }
}
