import fs from "node:fs";
import path from "node:path";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface RunLogger extends Logger {
  /** Flush and close the log file. */
  close(): Promise<void>;
}

function pad(n: number): string {
  return n.toString().padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Console + append-only file logger for one export run.
 * Every line is prefixed with `[timestamp]`.
 */
export function createRunLogger(logPath: string, now: () => Date = () => new Date()): RunLogger {
  fs.mkdirSync(path.dirname(logPath), { recursive: true });
  const stream = fs.createWriteStream(logPath, { flags: "a", encoding: "utf-8" });
  stream.on("error", (err) => {
    console.error(`Log file ${logPath} is not writable: ${err.message}`);
  });

  function write(print: (line: string) => void, message: string) {
    const line = `[${formatTimestamp(now())}] ${message}`;
    print(line);
    stream.write(`${line}\n`);
  }

  return {
    info: (message) => write(console.log, message),
    warn: (message) => write(console.warn, message),
    error: (message) => write(console.error, message),
    close: () =>
      new Promise<void>((resolve) => {
        if (stream.destroyed) return resolve();
        stream.end(() => resolve());
      }),
  };
}
