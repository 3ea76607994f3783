import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { sleep as defaultSleep } from "../spotify/spotifyClient.js";
import { parseAudioFeatures } from "../spotify/spotifySchemas.js";
import { SPOTIFY_CONFIG } from "../spotify/spotifyConfig.js";
import type { AudioFeatures, LibraryClient, ThrottleOptions } from "../types.js";

export async function fetchAudioFeatures(
  client: LibraryClient,
  trackIds: string[],
  logger: Logger,
  { delayMs, sleep = defaultSleep }: ThrottleOptions,
): Promise<Map<string, AudioFeatures>> {
  const featuresById = new Map<string, AudioFeatures>();
  if (trackIds.length === 0) return featuresById;

  const batchSize = SPOTIFY_CONFIG.AUDIO_FEATURES_BATCH_SIZE;
  const total = trackIds.length;
  logger.info("Fetching audio features...");

  for (let start = 0; start < total; start += batchSize) {
    const end = Math.min(start + batchSize, total);
    const batch = trackIds.slice(start, end);

    let entries: unknown[] = [];
    try {
      entries = await client.audioFeatures(batch);
    } catch (err) {
      logger.warn(`  Request failed on batch ${start}-${end}: ${errorMessage(err)}`);
    }

    for (const entry of entries) {
      const features = parseAudioFeatures(entry);
      if (features) featuresById.set(features.id, features);
    }

    logger.info(`  Processed batch ${start}-${end} (accumulated ${featuresById.size})`);
    await sleep(delayMs);
  }

  logger.info(`Total tracks with audio features: ${featuresById.size}`);
  return featuresById;
}
