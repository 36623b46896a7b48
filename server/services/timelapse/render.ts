import fs from "node:fs";
import path from "node:path";
import fg from "fast-glob";
import { execa } from "execa";
import type { SessionLog } from "./session-log";
import { frameFileName, type Session } from "./session";
import type { ToolProbe } from "./tool-probe";

export const OUTPUT_FRAME_RATE = 30;
export const VIDEO_CODEC = "libx264";
export const PIXEL_FORMAT = "yuv420p";
export const ENCODER_PRESET = "medium";
export const ENCODER_CRF = 23;
export const ENCODER_TOOL = "ffmpeg";

export type RenderOutcome =
  | { kind: "success"; videoPath: string }
  | { kind: "failed"; exitCode: number | null }
  | { kind: "skipped" };

export type EncodeRequest = {
  framesDir: string;
  frameCount: number;
  outputPath: string;
};

export type EncodeResult = {
  ok: boolean;
  exitCode: number | null;
  output: string;
};

export type EncoderCapability =
  | { kind: "available"; tool: string; encode: (request: EncodeRequest) => Promise<EncodeResult> }
  | { kind: "absent" };

export class FrameSequenceError extends Error {
  constructor(readonly missing: number[]) {
    super(`frame sequence incomplete, missing ${missing.map(frameFileName).join(", ")}`);
    this.name = "FrameSequenceError";
  }
}

export const ffmpegArgs = (request: EncodeRequest): string[] => [
  "-y",
  "-framerate",
  String(OUTPUT_FRAME_RATE),
  "-start_number",
  "1",
  "-i",
  path.join(request.framesDir, "frame_%04d.jpg"),
  "-frames:v",
  String(request.frameCount),
  "-c:v",
  VIDEO_CODEC,
  "-pix_fmt",
  PIXEL_FORMAT,
  "-preset",
  ENCODER_PRESET,
  "-crf",
  String(ENCODER_CRF),
  request.outputPath,
];

// No timeout: a hung encoder hangs the session.
export const createFfmpegEncoder = (file: string): EncoderCapability => ({
  kind: "available",
  tool: ENCODER_TOOL,
  encode: async (request) => {
    const result = await execa(file, ffmpegArgs(request), { reject: false, all: true, stdin: "ignore" });
    return {
      ok: result.exitCode === 0 && !result.failed,
      exitCode: typeof result.exitCode === "number" ? result.exitCode : null,
      output: result.all ?? "",
    };
  },
});

export const selectEncoderCapability = (probe: ToolProbe): EncoderCapability => {
  const file = probe(ENCODER_TOOL);
  return file ? createFfmpegEncoder(file) : { kind: "absent" };
};

/** Lists frames 1..count on disk and reports the gaps. */
export const findMissingFrames = async (framesDir: string, count: number): Promise<number[]> => {
  const present = new Set(await fg("frame_*.jpg", { cwd: framesDir, onlyFiles: true }));
  const missing: number[] = [];
  for (let sequence = 1; sequence <= count; sequence += 1) {
    if (!present.has(frameFileName(sequence))) missing.push(sequence);
  }
  return missing;
};

export class RenderStage {
  constructor(
    private readonly session: Session,
    private readonly encoder: EncoderCapability,
    private readonly log: SessionLog,
  ) {}

  async render(captured: number): Promise<RenderOutcome> {
    if (!Number.isInteger(captured) || captured < 1) {
      throw new RangeError(`render needs at least one captured frame (got ${captured})`);
    }
    if (this.encoder.kind === "absent") {
      this.log.warn(`${ENCODER_TOOL} not found, skipping video creation`);
      return { kind: "skipped" };
    }

    const { framesDir, videoPath } = this.session;
    try {
      const missing = await findMissingFrames(framesDir, captured);
      if (missing.length > 0) {
        throw new FrameSequenceError(missing);
      }
    } catch (error) {
      if (!(error instanceof FrameSequenceError)) throw error;
      this.log.error(error.message);
      return { kind: "failed", exitCode: null };
    }

    this.log.info(`Creating video from ${captured} frames with ${this.encoder.tool}`);
    const result = await this.encoder.encode({ framesDir, frameCount: captured, outputPath: videoPath });
    this.log.appendRaw(result.output);

    if (result.ok && fs.existsSync(videoPath)) {
      this.log.info(`Video created successfully: ${videoPath}`);
      return { kind: "success", videoPath };
    }
    this.log.error(`${this.encoder.tool} failed to create video (exit code ${result.exitCode ?? "unknown"})`);
    return { kind: "failed", exitCode: result.exitCode };
  }
}
