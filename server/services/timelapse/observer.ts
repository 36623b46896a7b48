import fs from "node:fs";
import path from "node:path";
import fg from "fast-glob";
import { IDLE_STATUS, statusRecordSchema, type ObservedStatus } from "@shared/timelapse";
import { FRAMES_DIR_NAME, LOG_FILE_NAME, SESSION_DIR_PREFIX, VIDEO_DIR_NAME, statusPathFor } from "./session";

// Read-only views for a dashboard. Nothing here writes to the session tree.

export const DEFAULT_FRAME_LISTING = 50;
export const DEFAULT_LOG_TAIL = 50;

export const readStatus = (statusPath: string): ObservedStatus => {
  let raw: string;
  try {
    raw = fs.readFileSync(statusPath, "utf8");
  } catch {
    return { ...IDLE_STATUS };
  }
  try {
    const parsed = statusRecordSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : { ...IDLE_STATUS };
  } catch {
    return { ...IDLE_STATUS };
  }
};

export const findLatestSession = async (baseDir: string): Promise<string | null> => {
  if (!fs.existsSync(baseDir)) return null;
  const names = await fg(`${SESSION_DIR_PREFIX}*`, { cwd: baseDir, onlyDirectories: true, deep: 1 });
  let latest: { dir: string; mtimeMs: number } | null = null;
  for (const name of names.sort()) {
    const dir = path.join(baseDir, name);
    const { mtimeMs } = fs.statSync(dir);
    if (!latest || mtimeMs >= latest.mtimeMs) {
      latest = { dir, mtimeMs };
    }
  }
  return latest?.dir ?? null;
};

export const listRecentFrames = async (sessionDir: string, limit = DEFAULT_FRAME_LISTING): Promise<string[]> => {
  const framesDir = path.join(sessionDir, FRAMES_DIR_NAME);
  if (!fs.existsSync(framesDir)) return [];
  const files = await fg("*.{jpg,jpeg,png}", { cwd: framesDir, onlyFiles: true, caseSensitiveMatch: false });
  return limit > 0 ? files.sort().slice(-limit) : [];
};

export const findLatestVideo = async (sessionDir: string): Promise<string | null> => {
  const videoDir = path.join(sessionDir, VIDEO_DIR_NAME);
  if (!fs.existsSync(videoDir)) return null;
  const videos = (await fg("*.mp4", { cwd: videoDir, onlyFiles: true })).sort();
  const last = videos.at(-1);
  return last ? path.join(videoDir, last) : null;
};

export const tailLog = (sessionDir: string, lines = DEFAULT_LOG_TAIL): string[] => {
  let text: string;
  try {
    text = fs.readFileSync(path.join(sessionDir, LOG_FILE_NAME), "utf8");
  } catch {
    return [];
  }
  const all = text.split("\n").filter((line) => line.length > 0);
  return lines > 0 ? all.slice(-lines) : [];
};

export type TimelapseSnapshot = {
  status: ObservedStatus;
  session: string | null;
  frames: string[];
  video: string | null;
  log: string[];
};

export const snapshot = async (
  baseDir: string,
  options: { frameLimit?: number; logLines?: number } = {},
): Promise<TimelapseSnapshot> => {
  const status = readStatus(statusPathFor(baseDir));
  const session = await findLatestSession(baseDir);
  if (!session) {
    return { status, session: null, frames: [], video: null, log: [] };
  }
  return {
    status,
    session,
    frames: await listRecentFrames(session, options.frameLimit),
    video: await findLatestVideo(session),
    log: tailLog(session, options.logLines),
  };
};
