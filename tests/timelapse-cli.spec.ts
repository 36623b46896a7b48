import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { main } from "../cli/timelapse";
import { collectStatus } from "../cli/timelapse-status";
import { usage } from "../server/config/timelapse";

const tempRoots: string[] = [];

const makeRoot = () => {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "timelapse-cli-"));
  tempRoots.push(root);
  return root;
};

// An empty PATH directory: no camera, no convert, no ffmpeg.
const isolatedEnv = (baseDir: string): NodeJS.ProcessEnv => ({
  PATH: makeRoot(),
  TIMELAPSE_BASE_DIR: baseDir,
  TIMELAPSE_LOG_STDOUT: "0",
});

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
  for (const root of tempRoots.splice(0)) {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

describe("timelapse cli", () => {
  it("runs a short session end to end without any capture tools", async () => {
    const baseDir = makeRoot();

    const code = await main(["0.01", "2"], isolatedEnv(baseDir));

    expect(code).toBe(0);
    const status = JSON.parse(fs.readFileSync(path.join(baseDir, "timelapse_status.json"), "utf8"));
    expect(status.status).toBe("done");
    expect(status.captured).toBe(2);
    expect(status.total).toBe(2);
    expect(status.error).toBe("ffmpeg not available");
    expect(fs.readdirSync(path.join(status.folder, "video_frames")).sort()).toEqual([
      "frame_0001.jpg",
      "frame_0002.jpg",
    ]);
    expect(fs.existsSync(path.join(baseDir, "timelapse.lock"))).toBe(false);
  });

  it("exits 2 with usage on bad arguments", async () => {
    const baseDir = makeRoot();

    expect(await main(["fast"], isolatedEnv(baseDir))).toBe(2);
    expect(console.error).toHaveBeenCalledWith("interval must be a number");
    expect(console.error).toHaveBeenCalledWith(usage());
    expect(fs.readdirSync(baseDir)).toEqual([]);
  });

  it("prints usage for --help", async () => {
    const baseDir = makeRoot();

    expect(await main(["--help"], isolatedEnv(baseDir))).toBe(0);
    expect(console.log).toHaveBeenCalledWith(usage());
    expect(fs.readdirSync(baseDir)).toEqual([]);
  });

  it("exits 1 while another session holds the base directory", async () => {
    const baseDir = makeRoot();
    fs.writeFileSync(path.join(baseDir, "timelapse.lock"), `${process.ppid}\n`);

    expect(await main(["1", "1"], isolatedEnv(baseDir))).toBe(1);
    expect(fs.existsSync(path.join(baseDir, "timelapse_status.json"))).toBe(false);
  });
});

describe("timelapse-status cli", () => {
  it("reports the latest session under the base directory", async () => {
    const baseDir = makeRoot();
    await main(["0.01", "1"], isolatedEnv(baseDir));

    const result = await collectStatus(["--base-dir", baseDir, "--log-lines", "1"], {});

    expect(result?.status.status).toBe("done");
    expect(result?.frames).toEqual(["frame_0001.jpg"]);
    expect(result?.video).toBeNull();
    expect(result?.log).toHaveLength(1);
    expect(result?.log[0]).toMatch(/\] Timelapse complete!$/);
  });

  it("uses the environment base directory when no flag is given", async () => {
    const baseDir = makeRoot();
    const result = await collectStatus([], { TIMELAPSE_BASE_DIR: baseDir });
    expect(result).toEqual({
      status: { status: "idle", captured: 0, total: 0, error: null },
      session: null,
      frames: [],
      video: null,
      log: [],
    });
  });

  it("prints usage and returns nothing for --help", async () => {
    expect(await collectStatus(["-h"], {})).toBeNull();
    expect(console.log).toHaveBeenCalledWith("Usage: timelapse-status [options]");
  });

  it("rejects unknown arguments and bad counts", async () => {
    await expect(collectStatus(["--watch"], {})).rejects.toThrow("Unknown argument: --watch");
    await expect(collectStatus(["--frames", "-1"], {})).rejects.toThrow("--frames expects a whole number, got -1");
  });
});
