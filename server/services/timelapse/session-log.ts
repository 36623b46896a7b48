import fs from "node:fs";
import path from "node:path";
import { log, type LogLevel } from "../../utils/log";

export type SessionLog = {
  readonly path: string;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  /** Appends tool output verbatim, without a timestamp. */
  appendRaw: (chunk: string) => void;
};

export type SessionLogOptions = {
  echo?: boolean;
  now?: () => Date;
};

const pad = (value: number): string => String(value).padStart(2, "0");

export const formatLogTimestamp = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

const PREFIX: Record<LogLevel, string> = {
  info: "",
  warn: "Warning: ",
  error: "Error: ",
};

export const createSessionLog = (logPath: string, options: SessionLogOptions = {}): SessionLog => {
  const echo = options.echo ?? true;
  const now = options.now ?? (() => new Date());
  fs.mkdirSync(path.dirname(logPath), { recursive: true });

  const write = (level: LogLevel, message: string) => {
    const text = `${PREFIX[level]}${message}`;
    fs.appendFileSync(logPath, `[${formatLogTimestamp(now())}] ${text}\n`, "utf8");
    if (echo) {
      log(text, "timelapse", level);
    }
  };

  return {
    path: logPath,
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
    appendRaw: (chunk) => {
      if (!chunk) return;
      fs.appendFileSync(logPath, chunk.endsWith("\n") ? chunk : `${chunk}\n`, "utf8");
    },
  };
};
