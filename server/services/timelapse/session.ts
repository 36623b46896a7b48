import fs from "node:fs";
import path from "node:path";
import type { StatusRecord } from "@shared/timelapse";
import { DEFAULT_FRAME_COUNT, DEFAULT_INTERVAL_SECONDS, TimelapseConfigError } from "../../config/timelapse";
import { createSessionLog, type SessionLog } from "./session-log";
import { StatusPublisher } from "./status-publisher";

export const STATUS_FILE_NAME = "timelapse_status.json";
export const SESSION_DIR_PREFIX = "timelapse_";
export const FRAMES_DIR_NAME = "video_frames";
export const VIDEO_DIR_NAME = "video";
export const LOG_FILE_NAME = "timelapse.log";

export type Session = Readonly<{
  id: string;
  baseDir: string;
  outputDir: string;
  framesDir: string;
  videoDir: string;
  videoPath: string;
  logPath: string;
  statusPath: string;
  total: number;
  intervalSeconds: number;
}>;

export type InitializedSession = {
  session: Session;
  log: SessionLog;
  publisher: StatusPublisher;
  status: StatusRecord;
};

export type CreateSessionOptions = {
  baseDir: string;
  intervalSeconds?: number;
  total?: number;
  now?: () => Date;
  echoLog?: boolean;
};

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

/** Local wall-clock `YYYYMMDD_HHMMSS`; one session per second is assumed. */
export const formatSessionId = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
  `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

export const frameFileName = (sequence: number): string => `frame_${pad(sequence, 4)}.jpg`;

export const framePath = (session: Pick<Session, "framesDir">, sequence: number): string =>
  path.join(session.framesDir, frameFileName(sequence));

export const statusPathFor = (baseDir: string): string => path.join(baseDir, STATUS_FILE_NAME);

export const describeSession = (baseDir: string, id: string, total: number, intervalSeconds: number): Session => {
  const outputDir = path.join(baseDir, `${SESSION_DIR_PREFIX}${id}`);
  const videoDir = path.join(outputDir, VIDEO_DIR_NAME);
  return Object.freeze({
    id,
    baseDir,
    outputDir,
    framesDir: path.join(outputDir, FRAMES_DIR_NAME),
    videoDir,
    videoPath: path.join(videoDir, `timelapse_${id}.mp4`),
    logPath: path.join(outputDir, LOG_FILE_NAME),
    statusPath: statusPathFor(baseDir),
    total,
    intervalSeconds,
  });
};

export function createSession(options: CreateSessionOptions): InitializedSession {
  const total = options.total ?? DEFAULT_FRAME_COUNT;
  const intervalSeconds = options.intervalSeconds ?? DEFAULT_INTERVAL_SECONDS;
  if (!Number.isInteger(total) || total < 1) {
    throw new TimelapseConfigError(`frame count must be a whole number >= 1 (got ${total})`);
  }
  if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
    throw new TimelapseConfigError(`interval must be greater than 0 seconds (got ${intervalSeconds})`);
  }

  const now = options.now ?? (() => new Date());
  const session = describeSession(path.resolve(options.baseDir), formatSessionId(now()), total, intervalSeconds);

  fs.mkdirSync(session.framesDir, { recursive: true });
  fs.mkdirSync(session.videoDir, { recursive: true });

  const log = createSessionLog(session.logPath, { echo: options.echoLog, now });
  log.info(`Starting timelapse: ${total} frames at ${intervalSeconds} second intervals`);
  log.info(`Output folder: ${session.outputDir}`);

  const publisher = new StatusPublisher(session.statusPath);
  const status = publisher.publish({
    status: "running",
    captured: 0,
    total,
    folder: session.outputDir,
    error: null,
  });

  return { session, log, publisher, status };
}
