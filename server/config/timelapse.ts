import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export const DEFAULT_INTERVAL_SECONDS = 5;
export const DEFAULT_FRAME_COUNT = 10;
export const DEFAULT_SHARED_MOUNT = "/mnt/share";
export const DEFAULT_CAPTURE_KILL_TIMEOUT_MS = 15_000;

export class TimelapseConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TimelapseConfigError";
  }
}

export type TimelapseConfig = {
  intervalSeconds: number;
  total: number;
  baseDir: string;
  baseDirSource: "override" | "shared-mount" | "controller-dir";
  logToStdout: boolean;
  captureKillTimeoutMs: number;
};

export type ParsedArgs = {
  help: boolean;
  intervalSeconds: number;
  total: number;
  baseDirOverride?: string;
};

const positionalSchema = z.object({
  interval: z.coerce
    .number({ invalid_type_error: "interval must be a number" })
    .finite()
    .positive("interval must be greater than 0")
    .default(DEFAULT_INTERVAL_SECONDS),
  frames: z.coerce
    .number({ invalid_type_error: "frames must be a number" })
    .int("frames must be a whole number")
    .min(1, "frames must be at least 1")
    .default(DEFAULT_FRAME_COUNT),
});

export const usage = (): string =>
  [
    "Usage: timelapse [interval] [frames] [--base-dir <path>]",
    "Arguments:",
    `  interval               Seconds between frames (default ${DEFAULT_INTERVAL_SECONDS}).`,
    `  frames                 Number of frames to capture (default ${DEFAULT_FRAME_COUNT}).`,
    "Options:",
    "  --base-dir <path>      Directory that receives sessions and the status file.",
    "  -h, --help             Show this help.",
  ].join("\n");

const parseBooleanFlag = (value: string | undefined, defaultValue: boolean): boolean => {
  if (!value?.trim()) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

const toPositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (Number.isFinite(parsed) && parsed > 0) return Math.floor(parsed);
  return fallback;
};

export const parseArgs = (argv: string[]): ParsedArgs => {
  const positional: string[] = [];
  let baseDirOverride: string | undefined;
  let help = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") {
      help = true;
      continue;
    }
    if (arg === "--base-dir" || arg.startsWith("--base-dir=")) {
      const eqIndex = arg.indexOf("=");
      const value = eqIndex !== -1 ? arg.slice(eqIndex + 1) : argv[++i];
      if (!value?.trim()) {
        throw new TimelapseConfigError("--base-dir requires a path");
      }
      baseDirOverride = value.trim();
      continue;
    }
    if (arg.startsWith("-") && Number.isNaN(Number(arg))) {
      throw new TimelapseConfigError(`Unknown option: ${arg}`);
    }
    positional.push(arg);
  }

  if (positional.length > 2) {
    throw new TimelapseConfigError(`Unexpected argument: ${positional[2]}`);
  }

  const parsed = positionalSchema.safeParse({ interval: positional[0], frames: positional[1] });
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new TimelapseConfigError(message);
  }

  return {
    help,
    intervalSeconds: parsed.data.interval,
    total: parsed.data.frames,
    baseDirOverride,
  };
};

export const isWritableDirectory = (dir: string): boolean => {
  try {
    if (!fs.statSync(dir).isDirectory()) return false;
    fs.accessSync(dir, fs.constants.W_OK);
    return true;
  } catch {
    return false;
  }
};

export type BaseDirInputs = {
  override?: string;
  sharedMount: string;
  controllerDir: string;
  isWritable?: (dir: string) => boolean;
};

export const resolveBaseDir = (inputs: BaseDirInputs): Pick<TimelapseConfig, "baseDir" | "baseDirSource"> => {
  const isWritable = inputs.isWritable ?? isWritableDirectory;
  if (inputs.override?.trim()) {
    return { baseDir: path.resolve(inputs.override.trim()), baseDirSource: "override" };
  }
  if (isWritable(inputs.sharedMount)) {
    return { baseDir: inputs.sharedMount, baseDirSource: "shared-mount" };
  }
  return { baseDir: inputs.controllerDir, baseDirSource: "controller-dir" };
};

export type ResolveConfigOptions = {
  env: NodeJS.ProcessEnv;
  args: ParsedArgs;
  controllerDir: string;
  isWritable?: (dir: string) => boolean;
};

export const resolveTimelapseConfig = (options: ResolveConfigOptions): TimelapseConfig => {
  const { env, args } = options;
  const override = args.baseDirOverride || env.TIMELAPSE_BASE_DIR?.trim() || env.BASE_DIR?.trim();
  const sharedMount = env.TIMELAPSE_SHARED_MOUNT?.trim() || DEFAULT_SHARED_MOUNT;

  return {
    intervalSeconds: args.intervalSeconds,
    total: args.total,
    ...resolveBaseDir({
      override: override || undefined,
      sharedMount,
      controllerDir: options.controllerDir,
      isWritable: options.isWritable,
    }),
    logToStdout: parseBooleanFlag(env.TIMELAPSE_LOG_STDOUT, true),
    captureKillTimeoutMs: toPositiveInt(env.TIMELAPSE_CAPTURE_KILL_TIMEOUT_MS, DEFAULT_CAPTURE_KILL_TIMEOUT_MS),
  };
};
