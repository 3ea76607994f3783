import type { Logger } from "../logger.js";
import { sleep as defaultSleep } from "../spotify/spotifyClient.js";
import { SPOTIFY_CONFIG } from "../spotify/spotifyConfig.js";
import type { LibraryClient, ThrottleOptions } from "../types.js";

export async function fetchLikedTracks(
  client: LibraryClient,
  logger: Logger,
  { delayMs, sleep = defaultSleep }: ThrottleOptions,
): Promise<unknown[]> {
  const items: unknown[] = [];

  logger.info("Fetching Liked Songs (saved tracks)...");
  let page = await client.savedTracks(SPOTIFY_CONFIG.SAVED_TRACKS_PAGE_SIZE);
  items.push(...page.items);
  logger.info(`  Fetched first page: ${items.length} tracks`);

  while (page.next) {
    await sleep(delayMs);
    page = await client.nextPage(page);
    items.push(...page.items);
    logger.info(`  Fetched another page: +${page.items.length} (total ${items.length})`);
  }

  logger.info(`Total liked tracks fetched: ${items.length}`);
  return items;
}
