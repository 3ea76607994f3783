import path from "node:path";
import { ConfigError, errorMessage } from "./errors.js";
import { exportLikedSongs } from "./export/exportLikedSongs.js";
import { type ExportSettings, ROOT, loadExportSettings, parseCliArgs } from "./exportConfig.js";
import { type Logger, createRunLogger } from "./logger.js";
import { SpotifyUserAuth } from "./spotify/spotifyAuth.js";
import { SpotifyClient } from "./spotify/spotifyClient.js";
import { SPOTIFY_CONFIG } from "./spotify/spotifyConfig.js";
import type { LibraryClient } from "./types.js";

export interface RunDeps {
  envPath?: string;
  createClient?: (settings: ExportSettings, logger: Logger) => LibraryClient;
  sleep?: (ms: number) => Promise<void>;
}

function createSpotifyClient(settings: ExportSettings, logger: Logger): LibraryClient {
  const auth = new SpotifyUserAuth({
    clientId: settings.clientId,
    clientSecret: settings.clientSecret,
    redirectUri: settings.redirectUri,
    cachePath: path.join(ROOT, SPOTIFY_CONFIG.TOKEN_CACHE_PATH),
    logger,
  });
  return new SpotifyClient({ auth, logger });
}

/** One export run. Resolves to the process exit code. */
export async function run(
  argv: string[],
  env: NodeJS.ProcessEnv,
  { envPath, createClient = createSpotifyClient, sleep }: RunDeps = {},
): Promise<number> {
  const { outPath, logPath } = parseCliArgs(argv);

  let settings: ExportSettings;
  try {
    settings = loadExportSettings(env, envPath);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    console.error(err.message);
    console.error("Get credentials at https://developer.spotify.com/dashboard");
    return 1;
  }

  const logger = createRunLogger(logPath);
  try {
    const client = createClient(settings, logger);
    await exportLikedSongs(client, { outPath, logger, delayMs: settings.delayMs, sleep });
    return 0;
  } catch (err) {
    logger.error(`Fatal error: ${errorMessage(err)}`);
    return 1;
  } finally {
    await logger.close();
  }
}
