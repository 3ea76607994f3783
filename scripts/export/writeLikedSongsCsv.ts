import fs from "node:fs";
import path from "node:path";
import Papa from "papaparse";
import type { Logger } from "../logger.js";
import type { ExportRow } from "../types.js";

type CellValue = string | number | boolean | null;

// Output columns, in order
export const CSV_COLUMNS = {
  track_id: (r: ExportRow): CellValue => r.trackId,
  uri: (r) => r.uri,
  track_name: (r) => r.trackName,
  artists: (r) => r.artists,
  album: (r) => r.album,
  release_date: (r) => r.releaseDate,
  duration_ms: (r) => r.durationMs,
  popularity: (r) => r.popularity,
  explicit: (r) => r.explicit,
  added_at: (r) => r.addedAt,
  // Audio feature raw values
  tempo: (r) => r.tempo,
  key: (r) => r.key,
  mode: (r) => r.mode,
  camelot: (r) => r.camelot,
  danceability: (r) => r.danceability,
  energy: (r) => r.energy,
  valence: (r) => r.valence,
  acousticness: (r) => r.acousticness,
  instrumentalness: (r) => r.instrumentalness,
  liveness: (r) => r.liveness,
  speechiness: (r) => r.speechiness,
  time_signature: (r) => r.timeSignature,
} satisfies Record<string, (row: ExportRow) => CellValue>;

export const CSV_FIELDS = Object.keys(CSV_COLUMNS);

function formatCsvValue(value: CellValue): string {
  if (value === null) return "";
  if (typeof value === "boolean") return value ? "true" : "false";
  return String(value);
}

export function formatCsv(rows: ExportRow[]): string {
  const columns = Object.values(CSV_COLUMNS);
  const data = [
    CSV_FIELDS,
    ...rows.map((row) => columns.map((column) => formatCsvValue(column(row)))),
  ];
  return `${Papa.unparse(data, { newline: "\r\n" })}\r\n`;
}

export function writeLikedSongsCsv(rows: ExportRow[], outPath: string, logger: Logger): string {
  logger.info(`Writing CSV: ${outPath}`);

  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, formatCsv(rows), "utf-8");

  logger.info("CSV write complete.");
  return outPath;
}
