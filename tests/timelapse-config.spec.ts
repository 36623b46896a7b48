import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  DEFAULT_CAPTURE_KILL_TIMEOUT_MS,
  parseArgs,
  resolveBaseDir,
  resolveTimelapseConfig,
  TimelapseConfigError,
} from "../server/config/timelapse";

describe("parseArgs", () => {
  it("falls back to 5 second interval and 10 frames", () => {
    expect(parseArgs([])).toEqual({ help: false, intervalSeconds: 5, total: 10, baseDirOverride: undefined });
  });

  it("reads positional interval, frames and a base directory override", () => {
    expect(parseArgs(["2", "30", "--base-dir", "/srv/lapse"])).toEqual({
      help: false,
      intervalSeconds: 2,
      total: 30,
      baseDirOverride: "/srv/lapse",
    });
  });

  it("accepts --base-dir=<path> and fractional intervals", () => {
    const parsed = parseArgs(["--base-dir=/data", "1.5"]);
    expect(parsed.baseDirOverride).toBe("/data");
    expect(parsed.intervalSeconds).toBe(1.5);
    expect(parsed.total).toBe(10);
  });

  it("flags help", () => {
    expect(parseArgs(["-h"]).help).toBe(true);
    expect(parseArgs(["--help"]).help).toBe(true);
  });

  it("rejects non-positive intervals", () => {
    expect(() => parseArgs(["0"])).toThrow(TimelapseConfigError);
    expect(() => parseArgs(["-3"])).toThrow("interval must be greater than 0");
  });

  it("rejects fractional and non-numeric frame counts", () => {
    expect(() => parseArgs(["5", "2.5"])).toThrow("frames must be a whole number");
    expect(() => parseArgs(["5", "abc"])).toThrow("frames must be a number");
    expect(() => parseArgs(["5", "0"])).toThrow("frames must be at least 1");
  });

  it("rejects unknown options and extra positionals", () => {
    expect(() => parseArgs(["--verbose"])).toThrow("Unknown option: --verbose");
    expect(() => parseArgs(["1", "2", "3"])).toThrow("Unexpected argument: 3");
    expect(() => parseArgs(["--base-dir"])).toThrow("--base-dir requires a path");
  });
});

describe("resolveBaseDir", () => {
  const controllerDir = "/opt/timelapse/cli";

  it("prefers an explicit override", () => {
    expect(
      resolveBaseDir({ override: "/srv/lapse", sharedMount: "/mnt/share", controllerDir, isWritable: () => true }),
    ).toEqual({ baseDir: path.resolve("/srv/lapse"), baseDirSource: "override" });
  });

  it("uses the shared mount when it is writable", () => {
    expect(resolveBaseDir({ sharedMount: "/mnt/share", controllerDir, isWritable: () => true })).toEqual({
      baseDir: "/mnt/share",
      baseDirSource: "shared-mount",
    });
  });

  it("falls back to the controller directory", () => {
    expect(resolveBaseDir({ sharedMount: "/mnt/share", controllerDir, isWritable: () => false })).toEqual({
      baseDir: controllerDir,
      baseDirSource: "controller-dir",
    });
  });
});

describe("resolveTimelapseConfig", () => {
  const args = { help: false, intervalSeconds: 3, total: 4 };

  it("reads the base directory and switches from the environment", () => {
    const config = resolveTimelapseConfig({
      env: {
        TIMELAPSE_BASE_DIR: "/srv/env-base",
        TIMELAPSE_LOG_STDOUT: "0",
        TIMELAPSE_CAPTURE_KILL_TIMEOUT_MS: "2500",
      },
      args,
      controllerDir: "/opt/timelapse/cli",
      isWritable: () => true,
    });
    expect(config).toEqual({
      intervalSeconds: 3,
      total: 4,
      baseDir: path.resolve("/srv/env-base"),
      baseDirSource: "override",
      logToStdout: false,
      captureKillTimeoutMs: 2500,
    });
  });

  it("honours the legacy BASE_DIR variable and lets the flag win over both", () => {
    const legacy = resolveTimelapseConfig({
      env: { BASE_DIR: "/srv/legacy" },
      args,
      controllerDir: "/opt/timelapse/cli",
      isWritable: () => false,
    });
    expect(legacy.baseDir).toBe(path.resolve("/srv/legacy"));

    const flagged = resolveTimelapseConfig({
      env: { BASE_DIR: "/srv/legacy", TIMELAPSE_BASE_DIR: "/srv/env-base" },
      args: { ...args, baseDirOverride: "/srv/flag" },
      controllerDir: "/opt/timelapse/cli",
      isWritable: () => false,
    });
    expect(flagged.baseDir).toBe(path.resolve("/srv/flag"));
  });

  it("uses a configured shared mount and default timeouts", () => {
    const seen: string[] = [];
    const config = resolveTimelapseConfig({
      env: { TIMELAPSE_SHARED_MOUNT: "/media/usb", TIMELAPSE_CAPTURE_KILL_TIMEOUT_MS: "soon" },
      args,
      controllerDir: "/opt/timelapse/cli",
      isWritable: (dir) => {
        seen.push(dir);
        return true;
      },
    });
    expect(seen).toEqual(["/media/usb"]);
    expect(config.baseDir).toBe("/media/usb");
    expect(config.baseDirSource).toBe("shared-mount");
    expect(config.logToStdout).toBe(true);
    expect(config.captureKillTimeoutMs).toBe(DEFAULT_CAPTURE_KILL_TIMEOUT_MS);
  });
});
