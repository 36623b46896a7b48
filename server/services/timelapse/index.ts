import type { TimelapseConfig } from "../../config/timelapse";
import { selectCaptureCapability, type CaptureCapability } from "./capture";
import { TimelapseController, type SessionResult, type SleepFn } from "./controller";
import { installInterruptHandler, type SignalSource } from "./interrupt";
import { selectEncoderCapability, type EncoderCapability } from "./render";
import { createSession, type Session } from "./session";
import { acquireSessionLock } from "./session-lock";
import { createToolProbe, type ToolProbe } from "./tool-probe";

export type RunTimelapseOptions = {
  config: TimelapseConfig;
  probe?: ToolProbe;
  signalSource?: SignalSource;
  abortController?: AbortController;
  now?: () => Date;
  sleep?: SleepFn;
  /** Test seams: bypass probing with fixed capabilities. */
  capture?: CaptureCapability;
  encoder?: EncoderCapability;
};

export type TimelapseRun = SessionResult & { session: Session };

/**
 * One complete invocation: lock the base directory, initialize the session,
 * pick capabilities once, run the controller and release everything.
 * Throws `SessionLockedError` before touching the status file when another
 * session owns the base directory.
 */
export async function runTimelapse(options: RunTimelapseOptions): Promise<TimelapseRun> {
  const { config } = options;
  const lock = acquireSessionLock(config.baseDir);
  let disposeInterrupts: (() => void) | null = null;
  try {
    const initialized = createSession({
      baseDir: config.baseDir,
      intervalSeconds: config.intervalSeconds,
      total: config.total,
      now: options.now,
      echoLog: config.logToStdout,
    });
    const { session, log } = initialized;

    const abortController = options.abortController ?? new AbortController();
    disposeInterrupts = installInterruptHandler(abortController, { log, source: options.signalSource });

    const probe = options.probe ?? createToolProbe();
    const capture =
      options.capture ??
      selectCaptureCapability({ probe, log, killTimeoutMs: config.captureKillTimeoutMs, now: options.now });
    const encoder = options.encoder ?? selectEncoderCapability(probe);
    log.info(
      `Capture: ${capture.kind}${capture.tool ? ` (${capture.tool})` : ""}, encoder: ${
        encoder.kind === "available" ? encoder.tool : "absent"
      }`,
    );

    const controller = new TimelapseController({
      initialized,
      capture,
      encoder,
      signal: abortController.signal,
      sleep: options.sleep,
    });
    const result = await controller.run();
    return { ...result, session };
  } finally {
    disposeInterrupts?.();
    lock.release();
  }
}

export { TimelapseController, resolveTerminalStatus } from "./controller";
export type { SessionResult } from "./controller";
export { SessionLockedError } from "./session-lock";
