import crypto from "node:crypto";
import fs from "node:fs";
import http from "node:http";
import path from "node:path";
import { z } from "zod";
import { SpotifyAuthError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { TokenProvider } from "./spotifyClient.js";
import { SPOTIFY_CONFIG } from "./spotifyConfig.js";

// ─── Types ──────────────────────────────────────────────────────────────

const TokenCacheSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
  expiresAt: z.number(),
});

type TokenCache = z.infer<typeof TokenCacheSchema>;

const TokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
  refresh_token: z.string().optional(),
});

export interface SpotifyUserAuthOptions {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  cachePath: string;
  logger: Logger;
  fetch?: typeof fetch;
  now?: () => number;
  waitForCode?: (redirectUri: string, state: string) => Promise<string>;
}

// ─── Token Cache ────────────────────────────────────────────────────────

function readTokenCache(cachePath: string, logger: Logger): TokenCache | null {
  if (!fs.existsSync(cachePath)) return null;

  try {
    const parsed = TokenCacheSchema.safeParse(JSON.parse(fs.readFileSync(cachePath, "utf-8")));
    if (parsed.success) return parsed.data;
  } catch (err) {
    logger.warn(`Could not read token cache ${cachePath}: ${errorMessage(err)}`);
    return null;
  }

  logger.warn(`Ignoring malformed token cache ${cachePath}.`);
  return null;
}

function writeTokenCache(cachePath: string, tokens: TokenCache): void {
  fs.mkdirSync(path.dirname(cachePath), { recursive: true });
  fs.writeFileSync(cachePath, JSON.stringify(tokens, null, 2), { mode: 0o600 });
}

// ─── Spotify Auth ───────────────────────────────────────────────────────

/**
 * Authorization Code flow for a single local user.
 *
 * Tokens are cached on disk. A cached token is reused until it is about to
 * expire, then refreshed; without a usable cache the user is sent to the
 * Spotify consent page and the redirect is caught on a local HTTP listener.
 */
export class SpotifyUserAuth implements TokenProvider {
  private readonly options: SpotifyUserAuthOptions;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => number;
  private readonly waitForCode: (redirectUri: string, state: string) => Promise<string>;
  private tokens: TokenCache | null;

  constructor(options: SpotifyUserAuthOptions) {
    this.options = options;
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? Date.now;
    this.waitForCode = options.waitForCode ?? waitForAuthorizationCode;
    this.tokens = readTokenCache(options.cachePath, options.logger);
  }

  async getAccessToken(): Promise<string> {
    let tokens = this.tokens;

    if (tokens && this.now() >= tokens.expiresAt) {
      this.options.logger.info("Refreshing Spotify token...");
      tokens = await this.refresh(tokens.refreshToken);
    }
    if (!tokens) {
      tokens = await this.authorize();
    }

    this.tokens = tokens;
    return tokens.accessToken;
  }

  authorizeUrl(state: string): string {
    const params = new URLSearchParams({
      response_type: "code",
      client_id: this.options.clientId,
      scope: SPOTIFY_CONFIG.SCOPE,
      redirect_uri: this.options.redirectUri,
      state,
    });
    return `${SPOTIFY_CONFIG.AUTHORIZE_URL}?${params}`;
  }

  private async refresh(refreshToken: string): Promise<TokenCache | null> {
    try {
      return await this.requestTokens(
        new URLSearchParams({ grant_type: "refresh_token", refresh_token: refreshToken }),
        refreshToken,
      );
    } catch (err) {
      this.options.logger.warn(`Token refresh failed, re-authorizing: ${errorMessage(err)}`);
      return null;
    }
  }

  private async authorize(): Promise<TokenCache> {
    const state = crypto.randomBytes(16).toString("base64url");
    this.options.logger.info("Open this URL in a browser to authorize access to your library:");
    this.options.logger.info(`  ${this.authorizeUrl(state)}`);

    const code = await this.waitForCode(this.options.redirectUri, state);
    const tokens = await this.requestTokens(
      new URLSearchParams({
        grant_type: "authorization_code",
        code,
        redirect_uri: this.options.redirectUri,
      }),
    );
    this.options.logger.info("Spotify authentication successful.");
    return tokens;
  }

  private async requestTokens(
    body: URLSearchParams,
    previousRefreshToken?: string,
  ): Promise<TokenCache> {
    const { clientId, clientSecret } = this.options;
    const response = await this.fetchImpl(SPOTIFY_CONFIG.TOKEN_URL, {
      method: "POST",
      headers: {
        "Content-Type": "application/x-www-form-urlencoded",
        Authorization: `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString("base64")}`,
      },
      body,
    });

    if (!response.ok) {
      const text = await response.text();
      throw new SpotifyAuthError(`Spotify auth failed (${response.status}): ${text}`);
    }

    const parsed = TokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new SpotifyAuthError("Spotify auth failed: unexpected token response");
    }

    const refreshToken = parsed.data.refresh_token ?? previousRefreshToken;
    if (!refreshToken) {
      throw new SpotifyAuthError("Spotify auth failed: no refresh token issued");
    }

    const tokens: TokenCache = {
      accessToken: parsed.data.access_token,
      refreshToken,
      // Refresh 60s before expiry
      expiresAt: this.now() + (parsed.data.expires_in - 60) * 1000,
    };
    writeTokenCache(this.options.cachePath, tokens);
    return tokens;
  }
}

// ─── Redirect Listener ──────────────────────────────────────────────────

/** Pull the code out of the redirect URL, rejecting denials and foreign `state`. */
export function readAuthorizationResponse(url: URL, state: string): string {
  const error = url.searchParams.get("error");
  if (error) throw new SpotifyAuthError(`Authorization denied: ${error}`);
  if (url.searchParams.get("state") !== state) {
    throw new SpotifyAuthError("Authorization state mismatch");
  }

  const code = url.searchParams.get("code");
  if (!code) throw new SpotifyAuthError("Authorization response had no code");
  return code;
}

export function waitForAuthorizationCode(redirectUri: string, state: string): Promise<string> {
  const redirect = new URL(redirectUri);

  return new Promise((resolve, reject) => {
    const server = http.createServer((req, res) => {
      const url = new URL(req.url ?? "/", redirect);
      if (url.pathname !== redirect.pathname) {
        res.writeHead(404).end();
        return;
      }

      res.writeHead(200, { "Content-Type": "text/plain" });
      server.close();
      try {
        const code = readAuthorizationResponse(url, state);
        res.end("Authorization complete. You can close this window.");
        resolve(code);
      } catch (err) {
        res.end(`Authorization failed: ${errorMessage(err)}`);
        reject(err);
      }
    });

    server.on("error", (err) => {
      reject(new SpotifyAuthError(`Could not listen on ${redirect.host}: ${err.message}`));
    });
    server.listen(Number(redirect.port || 80), redirect.hostname);
  });
}
