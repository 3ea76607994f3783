export const SPOTIFY_CONFIG = {
  // Spotify Web API
  API_BASE: "https://api.spotify.com/v1",
  AUTHORIZE_URL: "https://accounts.spotify.com/authorize",
  TOKEN_URL: "https://accounts.spotify.com/api/token",
  SCOPE: "user-library-read",

  // Token cache (relative to project root)
  TOKEN_CACHE_PATH: ".spotify-token.json",

  // Endpoint limits
  SAVED_TRACKS_PAGE_SIZE: 50,
  AUDIO_FEATURES_BATCH_SIZE: 100,

  // Rate limiting
  DEFAULT_DELAY_MS: 200,
  MAX_RETRIES: 3,
  DEFAULT_RETRY_AFTER_S: 5,
};
