import type { Logger } from "../logger.js";
import type { LibraryClient, ThrottleOptions } from "../types.js";
import { assembleRows } from "./assembleRows.js";
import { collectBaseRows } from "./collectBaseRows.js";
import { fetchAudioFeatures } from "./fetchAudioFeatures.js";
import { fetchLikedTracks } from "./fetchLikedTracks.js";
import { writeLikedSongsCsv } from "./writeLikedSongsCsv.js";

export interface ExportOptions extends ThrottleOptions {
  outPath: string;
  logger: Logger;
}

export interface ExportResult {
  outPath: string;
  rowCount: number;
}

// Empty library: nothing written, returns null
export async function exportLikedSongs(
  client: LibraryClient,
  { outPath, logger, ...throttle }: ExportOptions,
): Promise<ExportResult | null> {
  const me = await client.currentUser();
  logger.info(`Authed as: ${me.displayName || me.id} (${me.id})`);

  const items = await fetchLikedTracks(client, logger, throttle);
  if (items.length === 0) {
    logger.info("No liked tracks found; nothing to export.");
    return null;
  }

  const { rows: baseRows, trackIds } = collectBaseRows(items, logger);
  const featuresById = await fetchAudioFeatures(client, trackIds, logger, throttle);
  const rows = assembleRows(baseRows, featuresById, logger);
  writeLikedSongsCsv(rows, outPath, logger);

  logger.info(`Done. Exported ${rows.length} tracks to ${outPath}`);
  return { outPath, rowCount: rows.length };
}
