import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { SPOTIFY_CONFIG } from "./spotify/spotifyConfig.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
export const ROOT = path.join(__dirname, "..");

export const EXPORT_CONFIG = {
  // Output (relative to project root)
  OUTPUT_PATH: "output/Liked_Songs.csv",
  LOG_PATH: "logs/likedSongsExport.log",

  DEFAULT_REDIRECT_URI: "http://localhost:8888/callback",
};

// ─── Environment ────────────────────────────────────────────────────────

export function loadEnvVar(
  name: string,
  env: NodeJS.ProcessEnv = process.env,
  envPath: string = path.join(ROOT, ".env"),
): string | undefined {
  const fromEnv = env[name]?.trim();
  if (fromEnv) return fromEnv;

  if (fs.existsSync(envPath)) {
    const content = fs.readFileSync(envPath, "utf-8");
    const match = content.match(new RegExp(`^${name}=(.+)$`, "m"));
    // Blank values count as unset so defaults apply
    const value = match?.[1].trim().replace(/^["']|["']$/g, "").trim();
    if (value) return value;
  }

  return undefined;
}

// ─── Settings ───────────────────────────────────────────────────────────

const requiredVar = (name: string) =>
  z
    .string({ required_error: `${name} must be set in .env or as an environment variable` })
    .min(1, `${name} must be set in .env or as an environment variable`);

const SettingsSchema = z.object({
  clientId: requiredVar("SPOTIFY_CLIENT_ID"),
  clientSecret: requiredVar("SPOTIFY_CLIENT_SECRET"),
  redirectUri: z
    .string()
    .url("SPOTIFY_REDIRECT_URI must be a valid URL")
    .default(EXPORT_CONFIG.DEFAULT_REDIRECT_URI),
  delayMs: z.coerce
    .number({ invalid_type_error: "SPOTIFY_SLEEP_MS must be a non-negative integer" })
    .int("SPOTIFY_SLEEP_MS must be a non-negative integer")
    .nonnegative("SPOTIFY_SLEEP_MS must be a non-negative integer")
    .default(SPOTIFY_CONFIG.DEFAULT_DELAY_MS),
});

export type ExportSettings = z.infer<typeof SettingsSchema>;

/** Read credentials and the request delay from the environment, falling back to `.env`. */
export function loadExportSettings(
  env: NodeJS.ProcessEnv = process.env,
  envPath: string = path.join(ROOT, ".env"),
): ExportSettings {
  const parsed = SettingsSchema.safeParse({
    clientId: loadEnvVar("SPOTIFY_CLIENT_ID", env, envPath),
    clientSecret: loadEnvVar("SPOTIFY_CLIENT_SECRET", env, envPath),
    redirectUri: loadEnvVar("SPOTIFY_REDIRECT_URI", env, envPath),
    delayMs: loadEnvVar("SPOTIFY_SLEEP_MS", env, envPath),
  });

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => issue.message).join("; "));
  }
  return parsed.data;
}

// ─── CLI ────────────────────────────────────────────────────────────────

export interface CliOptions {
  outPath: string;
  logPath: string;
}

function argValue(argv: string[], flag: string): string | undefined {
  return argv.find((a) => a.startsWith(`--${flag}=`))?.split("=").slice(1).join("=");
}

export function parseCliArgs(argv: string[]): CliOptions {
  const out = argValue(argv, "out");
  const log = argValue(argv, "log");

  return {
    outPath: out ? path.resolve(out) : path.join(ROOT, EXPORT_CONFIG.OUTPUT_PATH),
    logPath: log ? path.resolve(log) : path.join(ROOT, EXPORT_CONFIG.LOG_PATH),
  };
}
