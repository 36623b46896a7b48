#!/usr/bin/env -S tsx

import path from "node:path";
import { fileURLToPath, pathToFileURL } from "node:url";
import { DEFAULT_SHARED_MOUNT, resolveBaseDir } from "../server/config/timelapse";
import { snapshot, type TimelapseSnapshot } from "../server/services/timelapse/observer";

const controllerDir = path.dirname(fileURLToPath(import.meta.url));

const usage = (): void => {
  console.log("Usage: timelapse-status [options]");
  console.log("Options:");
  console.log("  --base-dir <path>   Directory holding sessions and the status file.");
  console.log("  --frames <n>        Number of most recent frames to list (default 50).");
  console.log("  --log-lines <n>     Number of trailing log lines (default 50).");
  console.log("  -h, --help          Show this help.");
};

const toCount = (value: string | undefined, flag: string): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${flag} expects a whole number, got ${value ?? "nothing"}`);
  }
  return parsed;
};

export async function collectStatus(argv: string[], env: NodeJS.ProcessEnv): Promise<TimelapseSnapshot | null> {
  let baseDirOverride: string | undefined;
  let frameLimit: number | undefined;
  let logLines: number | undefined;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === "-h" || token === "--help") {
      usage();
      return null;
    }
    if (token === "--base-dir") {
      baseDirOverride = argv[++i];
    } else if (token === "--frames") {
      frameLimit = toCount(argv[++i], token);
    } else if (token === "--log-lines") {
      logLines = toCount(argv[++i], token);
    } else {
      throw new Error(`Unknown argument: ${token}`);
    }
  }

  const { baseDir } = resolveBaseDir({
    override: baseDirOverride || env.TIMELAPSE_BASE_DIR?.trim() || env.BASE_DIR?.trim() || undefined,
    sharedMount: env.TIMELAPSE_SHARED_MOUNT?.trim() || DEFAULT_SHARED_MOUNT,
    controllerDir,
  });
  return snapshot(baseDir, { frameLimit, logLines });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  collectStatus(process.argv.slice(2), process.env).then(
    (result) => {
      if (result) process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    },
    (error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(2);
    },
  );
}
