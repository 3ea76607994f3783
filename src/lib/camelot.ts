/**
 * Spotify key/mode → Camelot wheel code.
 * key: pitch class 0–11 (0 = C), mode: 0 = minor, 1 = major.
 */
const KEYMODE_TO_CAMELOT: ReadonlyMap<string, string> = new Map([
  // minor (mode = 0)
  ["0:0", "5A"], // C minor
  ["1:0", "12A"], // C#/Db minor
  ["2:0", "7A"], // D minor
  ["3:0", "2A"], // D#/Eb minor
  ["4:0", "9A"], // E minor
  ["5:0", "4A"], // F minor
  ["6:0", "11A"], // F#/Gb minor
  ["7:0", "6A"], // G minor
  ["8:0", "1A"], // G#/Ab minor
  ["9:0", "8A"], // A minor
  ["10:0", "3A"], // A#/Bb minor
  ["11:0", "10A"], // B minor

  // major (mode = 1)
  ["0:1", "8B"], // C major
  ["1:1", "3B"], // C#/Db major
  ["2:1", "10B"], // D major
  ["3:1", "5B"], // D#/Eb major
  ["4:1", "12B"], // E major
  ["5:1", "7B"], // F major
  ["6:1", "2B"], // F#/Gb major
  ["7:1", "9B"], // G major
  ["8:1", "4B"], // G#/Ab major
  ["9:1", "11B"], // A major
  ["10:1", "6B"], // A#/Bb major
  ["11:1", "1B"], // B major
]);

function toInteger(value: unknown): number | null {
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return null;
}

/**
 * Map a key/mode pair to its Camelot code, or "" when either is missing,
 * not an integer, or outside the 24-key table.
 */
export function toCamelot(key: unknown, mode: unknown): string {
  if (key === null || key === undefined || mode === null || mode === undefined) return "";

  const k = toInteger(key);
  const m = toInteger(mode);
  if (k === null || m === null) return "";

  return KEYMODE_TO_CAMELOT.get(`${k}:${m}`) ?? "";
}
