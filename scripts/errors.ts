/** Missing or invalid settings. Raised before any request is made. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** OAuth failures: token exchange, refresh, or an aborted authorization. */
export class SpotifyAuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SpotifyAuthError";
  }
}

export class SpotifyApiError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, detail: string) {
    super(`Spotify request failed (${status}): ${url}${detail ? ` ${detail}` : ""}`);
    this.name = "SpotifyApiError";
    this.status = status;
    this.url = url;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
