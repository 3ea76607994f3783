import type { Logger } from "../logger.js";
import { parseSavedItem } from "../spotify/spotifySchemas.js";
import type { BaseRow } from "../types.js";

export interface CollectedRows {
  rows: BaseRow[];
  // First-seen order
  trackIds: string[];
}

// Local files and other id-less items are dropped
export function collectBaseRows(items: unknown[], logger: Logger): CollectedRows {
  const rows: BaseRow[] = [];
  const trackIds: string[] = [];
  const seenIds = new Set<string>();

  for (const raw of items) {
    const { added_at, track } = parseSavedItem(raw);
    if (!track?.id) continue;

    rows.push({
      trackId: track.id,
      uri: track.uri,
      trackName: track.name,
      artists: track.artists.map((a) => a.name).join("; "),
      album: track.album.name,
      releaseDate: track.album.release_date,
      durationMs: track.duration_ms,
      popularity: track.popularity,
      explicit: track.explicit,
      addedAt: added_at,
    });

    if (!seenIds.has(track.id)) {
      seenIds.add(track.id);
      trackIds.push(track.id);
    }
  }

  logger.info(`Base rows collected: ${rows.length}`);
  logger.info(`Unique track IDs for audio features: ${trackIds.length}`);
  return { rows, trackIds };
}
