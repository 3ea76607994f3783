// ─── Export Rows ────────────────────────────────────────────────────────

export interface BaseRow {
  trackId: string;
  uri: string;
  trackName: string;
  artists: string;
  album: string;
  releaseDate: string;
  durationMs: number;
  popularity: number;
  explicit: boolean;
  addedAt: string;
}

// null: no value from Spotify
export interface AudioFeatures {
  id: string;
  tempo: number | null;
  key: number | null;
  mode: number | null;
  danceability: number | null;
  energy: number | null;
  valence: number | null;
  acousticness: number | null;
  instrumentalness: number | null;
  liveness: number | null;
  speechiness: number | null;
  timeSignature: number | null;
}

export type FeatureValues = Omit<AudioFeatures, "id">;

export interface ExportRow extends BaseRow, FeatureValues {
  camelot: string;
}

// ─── Spotify Client ─────────────────────────────────────────────────────

export interface UserProfile {
  id: string;
  displayName: string | null;
}

export interface SavedTracksPage {
  items: unknown[];
  next: string | null;
}

export interface LibraryClient {
  currentUser(): Promise<UserProfile>;
  savedTracks(limit: number): Promise<SavedTracksPage>;
  nextPage(page: SavedTracksPage): Promise<SavedTracksPage>;
  // Up to 100 ids per call
  audioFeatures(ids: string[]): Promise<unknown[]>;
}

export interface ThrottleOptions {
  delayMs: number;
  sleep?: (ms: number) => Promise<void>;
}
