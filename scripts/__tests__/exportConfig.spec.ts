import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "../errors.js";
import { EXPORT_CONFIG, ROOT, loadExportSettings, parseCliArgs } from "../exportConfig.js";

describe("loadExportSettings", () => {
  let dir: string;
  let envPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "liked-songs-config-"));
    envPath = path.join(dir, ".env");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads settings from the environment", () => {
    const settings = loadExportSettings(
      {
        SPOTIFY_CLIENT_ID: "test-client",
        SPOTIFY_CLIENT_SECRET: "test-secret",
        SPOTIFY_REDIRECT_URI: "http://127.0.0.1:9000/cb",
        SPOTIFY_SLEEP_MS: "350",
      },
      envPath,
    );

    expect(settings).toEqual({
      clientId: "test-client",
      clientSecret: "test-secret",
      redirectUri: "http://127.0.0.1:9000/cb",
      delayMs: 350,
    });
  });

  it("falls back to the .env file and to defaults", () => {
    fs.writeFileSync(envPath, 'SPOTIFY_CLIENT_ID="file-client"\nSPOTIFY_CLIENT_SECRET=file-secret\n');

    expect(loadExportSettings({ SPOTIFY_CLIENT_SECRET: "env-secret" }, envPath)).toEqual({
      clientId: "file-client",
      clientSecret: "env-secret",
      redirectUri: EXPORT_CONFIG.DEFAULT_REDIRECT_URI,
      delayMs: 200,
    });
  });

  it("names every missing credential", () => {
    expect(() => loadExportSettings({}, envPath)).toThrow(
      new ConfigError(
        "SPOTIFY_CLIENT_ID must be set in .env or as an environment variable; " +
          "SPOTIFY_CLIENT_SECRET must be set in .env or as an environment variable",
      ),
    );
  });

  it("rejects a delay that is not a non-negative integer", () => {
    const env = { SPOTIFY_CLIENT_ID: "test-client", SPOTIFY_CLIENT_SECRET: "test-secret" };

    for (const value of ["fast", "-5", "1.5"]) {
      expect(() => loadExportSettings({ ...env, SPOTIFY_SLEEP_MS: value }, envPath)).toThrow(
        "SPOTIFY_SLEEP_MS must be a non-negative integer",
      );
    }
  });

  it("accepts a zero delay", () => {
    const env = { SPOTIFY_CLIENT_ID: "test-client", SPOTIFY_CLIENT_SECRET: "test-secret" };

    expect(loadExportSettings({ ...env, SPOTIFY_SLEEP_MS: "0" }, envPath).delayMs).toBe(0);
  });

  it("uses the default delay when the .env value is blank", () => {
    fs.writeFileSync(envPath, "SPOTIFY_SLEEP_MS= \nSPOTIFY_REDIRECT_URI=\"\"\n");
    const env = { SPOTIFY_CLIENT_ID: "test-client", SPOTIFY_CLIENT_SECRET: "test-secret" };

    const settings = loadExportSettings(env, envPath);

    expect(settings.delayMs).toBe(200);
    expect(settings.redirectUri).toBe(EXPORT_CONFIG.DEFAULT_REDIRECT_URI);
  });

  it("uses the default delay when the environment value is whitespace", () => {
    const env = {
      SPOTIFY_CLIENT_ID: "test-client",
      SPOTIFY_CLIENT_SECRET: "test-secret",
      SPOTIFY_SLEEP_MS: "   ",
    };

    expect(loadExportSettings(env, envPath).delayMs).toBe(200);
  });

  it("treats a blank credential as missing", () => {
    fs.writeFileSync(envPath, "SPOTIFY_CLIENT_ID= \n");

    expect(() => loadExportSettings({ SPOTIFY_CLIENT_SECRET: "test-secret" }, envPath)).toThrow(
      "SPOTIFY_CLIENT_ID must be set in .env or as an environment variable",
    );
  });
});

describe("parseCliArgs", () => {
  it("defaults to the project output and log paths", () => {
    expect(parseCliArgs([])).toEqual({
      outPath: path.join(ROOT, "output", "Liked_Songs.csv"),
      logPath: path.join(ROOT, "logs", "likedSongsExport.log"),
    });
  });

  it("resolves --out and --log against the working directory", () => {
    expect(parseCliArgs(["--out=exports/likes.csv", "--log=/tmp/run.log"])).toEqual({
      outPath: path.resolve("exports/likes.csv"),
      logPath: "/tmp/run.log",
    });
  });
});
