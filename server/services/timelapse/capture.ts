import fs from "node:fs";
import { execa } from "execa";
import { captureFailedMessage } from "@shared/timelapse";
import { DEFAULT_CAPTURE_KILL_TIMEOUT_MS } from "../../config/timelapse";
import type { SessionLog } from "./session-log";
import { framePath, type Session } from "./session";
import type { ToolProbe } from "./tool-probe";

export const FRAME_WIDTH = 1920;
export const FRAME_HEIGHT = 1080;
export const JPEG_QUALITY = 85;
export const SHOT_TIMEOUT_MS = 1000;
export const PLACEHOLDER_POINT_SIZE = 72;

export type Frame = {
  sequence: number;
  path: string;
};

export type CaptureKind = "hardware" | "placeholder" | "absent";

export interface CaptureCapability {
  readonly kind: CaptureKind;
  readonly tool: string | null;
  /** Logged before every shot when the camera is not in use. */
  readonly notice: string | null;
  shoot(target: string, sequence: number): Promise<void>;
}

export class CaptureFailureError extends Error {
  constructor(
    readonly sequence: number,
    readonly framePath: string,
  ) {
    super(captureFailedMessage(sequence));
    this.name = "CaptureFailureError";
  }
}

type HardwareTool = {
  name: string;
  args: (target: string) => string[];
};

const libcameraArgs = (target: string): string[] => [
  "-n",
  "-o",
  target,
  "--width",
  String(FRAME_WIDTH),
  "--height",
  String(FRAME_HEIGHT),
  "-q",
  String(JPEG_QUALITY),
  "-t",
  String(SHOT_TIMEOUT_MS),
];

// Probe order: legacy camera stack first, then its libcamera successors.
export const HARDWARE_TOOLS: readonly HardwareTool[] = [
  {
    name: "raspistill",
    args: (target) => [
      "-o",
      target,
      "-w",
      String(FRAME_WIDTH),
      "-h",
      String(FRAME_HEIGHT),
      "-q",
      String(JPEG_QUALITY),
      "-t",
      String(SHOT_TIMEOUT_MS),
    ],
  },
  { name: "rpicam-still", args: libcameraArgs },
  { name: "libcamera-still", args: libcameraArgs },
];

export const PLACEHOLDER_TOOL = "convert";

const pad = (value: number): string => String(value).padStart(2, "0");

export const formatClock = (date: Date): string =>
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const placeholderArgs = (target: string, sequence: number, at: Date): string[] => [
  "-size",
  `${FRAME_WIDTH}x${FRAME_HEIGHT}`,
  "-pointsize",
  String(PLACEHOLDER_POINT_SIZE),
  "-gravity",
  "center",
  // ImageMagick expands the literal "\n" escape in label text.
  `label:Frame ${sequence}\\n${formatClock(at)}`,
  target,
];

const touch = async (target: string): Promise<void> => {
  await fs.promises.appendFile(target, "");
};

type ToolRun = {
  tool: string;
  file: string;
  args: string[];
  killTimeoutMs: number;
  log: SessionLog;
  sequence: number;
};

const runTool = async ({ tool, file, args, killTimeoutMs, log, sequence }: ToolRun): Promise<boolean> => {
  const result = await execa(file, args, { reject: false, timeout: killTimeoutMs, stdin: "ignore" });
  if (result.stderr) {
    log.appendRaw(result.stderr);
  }
  if (result.timedOut) {
    log.warn(`${tool} timed out after ${killTimeoutMs} ms on frame ${sequence}`);
    return false;
  }
  if (result.exitCode !== 0) {
    log.warn(`${tool} exited with code ${result.exitCode ?? "unknown"} on frame ${sequence}`);
    return false;
  }
  return true;
};

export class HardwareCapture implements CaptureCapability {
  readonly kind = "hardware" as const;
  readonly notice = null;

  constructor(
    private readonly hardware: HardwareTool,
    private readonly file: string,
    private readonly log: SessionLog,
    private readonly killTimeoutMs: number,
  ) {}

  get tool(): string {
    return this.hardware.name;
  }

  async shoot(target: string, sequence: number): Promise<void> {
    await runTool({
      tool: this.hardware.name,
      file: this.file,
      args: this.hardware.args(target),
      killTimeoutMs: this.killTimeoutMs,
      log: this.log,
      sequence,
    });
  }
}

export class PlaceholderCapture implements CaptureCapability {
  readonly kind = "placeholder" as const;
  readonly tool = PLACEHOLDER_TOOL;
  readonly notice = "camera tool not found, creating placeholder image";

  constructor(
    private readonly file: string,
    private readonly log: SessionLog,
    private readonly killTimeoutMs: number,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async shoot(target: string, sequence: number): Promise<void> {
    const ok = await runTool({
      tool: PLACEHOLDER_TOOL,
      file: this.file,
      args: placeholderArgs(target, sequence, this.now()),
      killTimeoutMs: this.killTimeoutMs,
      log: this.log,
      sequence,
    });
    if (!ok) {
      await touch(target);
    }
  }
}

export class EmptyFrameCapture implements CaptureCapability {
  readonly kind = "absent" as const;
  readonly tool = null;
  readonly notice = "camera tool and convert not found, writing empty placeholder frame";

  async shoot(target: string): Promise<void> {
    await touch(target);
  }
}

export type SelectCaptureOptions = {
  probe: ToolProbe;
  log: SessionLog;
  killTimeoutMs?: number;
  now?: () => Date;
};

export const selectCaptureCapability = (options: SelectCaptureOptions): CaptureCapability => {
  const killTimeoutMs = options.killTimeoutMs ?? DEFAULT_CAPTURE_KILL_TIMEOUT_MS;
  for (const hardware of HARDWARE_TOOLS) {
    const file = options.probe(hardware.name);
    if (file) {
      return new HardwareCapture(hardware, file, options.log, killTimeoutMs);
    }
  }
  const convert = options.probe(PLACEHOLDER_TOOL);
  if (convert) {
    return new PlaceholderCapture(convert, options.log, killTimeoutMs, options.now);
  }
  return new EmptyFrameCapture();
};

/** Produces one frame file per tick and checks it landed on disk. */
export class CaptureStage {
  constructor(
    private readonly session: Session,
    private readonly capability: CaptureCapability,
    private readonly log: SessionLog,
  ) {}

  async capture(sequence: number): Promise<Frame> {
    const target = framePath(this.session, sequence);
    this.log.info(`Capturing frame ${sequence}/${this.session.total}`);
    if (this.capability.notice) {
      this.log.warn(this.capability.notice);
    }
    try {
      await this.capability.shoot(target, sequence);
    } catch (error) {
      this.log.error(`capture tool failed on frame ${sequence}: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (!fs.existsSync(target)) {
      throw new CaptureFailureError(sequence, target);
    }
    return { sequence, path: target };
  }
}
