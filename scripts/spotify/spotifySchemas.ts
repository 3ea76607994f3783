import { z } from "zod";
import type { AudioFeatures, SavedTracksPage, UserProfile } from "../types.js";

// Every per-field default lives here. Malformed values degrade to the
// default instead of failing the item.

const text = z.string().catch("");
const feature = z.number().nullable().catch(null);
const identifier = z.string().min(1).nullable().catch(null);

// ─── Saved Tracks ───────────────────────────────────────────────────────

const ArtistSchema = z.object({ name: text }).catch({ name: "" });

const AlbumSchema = z
  .object({ name: text, release_date: text })
  .catch({ name: "", release_date: "" });

const TrackSchema = z.object({
  id: identifier,
  uri: text,
  name: text,
  album: AlbumSchema,
  artists: z.array(ArtistSchema).catch([]),
  duration_ms: z.number().int().nonnegative().catch(0),
  popularity: z.number().int().catch(0),
  explicit: z.boolean().catch(false),
});

const SavedItemSchema = z
  .object({
    added_at: text,
    track: TrackSchema.nullable().catch(null),
  })
  .catch({ added_at: "", track: null });

export type SavedItem = z.infer<typeof SavedItemSchema>;
export type SavedTrack = z.infer<typeof TrackSchema>;

export function parseSavedItem(raw: unknown): SavedItem {
  return SavedItemSchema.parse(raw);
}

// ─── Audio Features ─────────────────────────────────────────────────────

const AudioFeaturesSchema = z.object({
  id: identifier,
  tempo: feature,
  key: feature,
  mode: feature,
  danceability: feature,
  energy: feature,
  valence: feature,
  acousticness: feature,
  instrumentalness: feature,
  liveness: feature,
  speechiness: feature,
  time_signature: feature,
});

/** Returns null for empty entries and entries without an id. */
export function parseAudioFeatures(raw: unknown): AudioFeatures | null {
  const parsed = AudioFeaturesSchema.safeParse(raw);
  if (!parsed.success) return null;

  const { id, time_signature, ...values } = parsed.data;
  if (!id) return null;
  return { id, ...values, timeSignature: time_signature };
}

// ─── Response Envelopes ─────────────────────────────────────────────────

export const SavedTracksPageSchema: z.ZodType<SavedTracksPage, z.ZodTypeDef, unknown> = z.object({
  items: z.array(z.unknown()).catch([]),
  next: z.string().nullable().catch(null),
});

export const AudioFeaturesResponseSchema = z.object({
  audio_features: z.array(z.unknown()).catch([]),
});

export const UserProfileSchema: z.ZodType<UserProfile, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string(),
    display_name: z.string().nullable().catch(null),
  })
  .transform((user) => ({ id: user.id, displayName: user.display_name }));
