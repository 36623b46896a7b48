import {
  ENCODER_FAILED_MESSAGE,
  ENCODER_UNAVAILABLE_MESSAGE,
  type SessionStatus,
  type StatusRecord,
} from "@shared/timelapse";
import { CaptureFailureError, CaptureStage, type CaptureCapability } from "./capture";
import { abortableSleep } from "./interrupt";
import { RenderStage, type EncoderCapability, type RenderOutcome } from "./render";
import type { InitializedSession } from "./session";

export type ExitCode = 0 | 1;

export type SessionResult = {
  exitCode: ExitCode;
  status: StatusRecord;
  interrupted: boolean;
};

export type TerminalResolution = {
  status: Extract<SessionStatus, "done" | "stopped" | "error">;
  video?: string;
  error: string | null;
  exitCode: ExitCode;
};

/** Interruption always ends as `stopped` with exit 0, whatever the encoder did. */
export const resolveTerminalStatus = (outcome: RenderOutcome, interrupted: boolean): TerminalResolution => {
  switch (outcome.kind) {
    case "success":
      return { status: interrupted ? "stopped" : "done", video: outcome.videoPath, error: null, exitCode: 0 };
    case "skipped":
      return { status: interrupted ? "stopped" : "done", error: ENCODER_UNAVAILABLE_MESSAGE, exitCode: 0 };
    case "failed":
      return interrupted
        ? { status: "stopped", error: ENCODER_FAILED_MESSAGE, exitCode: 0 }
        : { status: "error", error: ENCODER_FAILED_MESSAGE, exitCode: 1 };
  }
};

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<boolean>;

export type ControllerOptions = {
  initialized: InitializedSession;
  capture: CaptureCapability;
  encoder: EncoderCapability;
  signal: AbortSignal;
  sleep?: SleepFn;
};

type Transition = {
  status: SessionStatus;
  captured?: number;
  video?: string;
  error?: string | null;
};

/**
 * running -> (running)* -> rendering -> done | error, with cancellation
 * short-circuiting into rendering (-> stopped) or straight to stopped when
 * nothing was captured. Capture failure goes to error without rendering.
 */
export class TimelapseController {
  private status: StatusRecord;
  private interrupted = false;
  private readonly captureStage: CaptureStage;
  private readonly renderStage: RenderStage;
  private readonly sleep: SleepFn;

  constructor(private readonly options: ControllerOptions) {
    const { session, log } = options.initialized;
    this.status = options.initialized.status;
    this.captureStage = new CaptureStage(session, options.capture, log);
    this.renderStage = new RenderStage(session, options.encoder, log);
    this.sleep = options.sleep ?? abortableSleep;
  }

  async run(): Promise<SessionResult> {
    try {
      return await this.execute();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const { log } = this.options.initialized;
      log.error(message);
      try {
        this.transition({ status: "error", error: message });
      } catch (publishError) {
        log.error(
          `could not publish error status: ${publishError instanceof Error ? publishError.message : String(publishError)}`,
        );
      }
      return this.result(1);
    }
  }

  private async execute(): Promise<SessionResult> {
    const { session, log } = this.options.initialized;
    const { signal } = this.options;
    let captured = this.status.captured;

    while (captured < session.total) {
      if (signal.aborted) {
        this.interrupted = true;
        break;
      }
      const sequence = captured + 1;
      try {
        await this.captureStage.capture(sequence);
      } catch (error) {
        if (!(error instanceof CaptureFailureError)) throw error;
        if (signal.aborted) {
          log.warn(`Frame ${sequence} was interrupted before it was written`);
          this.interrupted = true;
          break;
        }
        log.error(error.message);
        this.transition({ status: "error", error: error.message });
        return this.result(1);
      }

      captured = sequence;
      this.transition({ status: "running", captured, error: null });

      if (captured < session.total) {
        const slept = await this.sleep(session.intervalSeconds * 1000, signal);
        if (!slept) {
          this.interrupted = true;
          break;
        }
      }
    }

    if (signal.aborted) {
      this.interrupted = true;
    }
    return this.finish(captured);
  }

  private async finish(captured: number): Promise<SessionResult> {
    const { log } = this.options.initialized;

    if (captured === 0) {
      log.info("No frames captured, skipping video creation");
      this.transition({ status: "stopped", error: null });
      return this.result(0);
    }

    log.info(
      this.interrupted
        ? `Creating video from ${captured} captured frames...`
        : "All frames captured, starting video rendering",
    );
    this.transition({ status: "rendering", error: null });

    const outcome = await this.renderStage.render(captured);
    // A signal during the encode usually kills the encoder too.
    if (this.options.signal.aborted) {
      this.interrupted = true;
    }
    const terminal = resolveTerminalStatus(outcome, this.interrupted);
    this.transition({ status: terminal.status, video: terminal.video, error: terminal.error });

    if (terminal.status === "done") {
      log.info("Timelapse complete!");
    } else if (terminal.status === "stopped") {
      log.info(`Timelapse stopped after ${captured}/${this.status.total} frames`);
    }
    return this.result(terminal.exitCode);
  }

  private transition(change: Transition): void {
    const next: StatusRecord = {
      status: change.status,
      captured: change.captured ?? this.status.captured,
      total: this.status.total,
      folder: this.status.folder,
      error: change.error ?? null,
    };
    if (change.video !== undefined) {
      next.video = change.video;
    }
    this.status = this.options.initialized.publisher.publish(next);
  }

  private result(exitCode: ExitCode): SessionResult {
    return { exitCode, status: this.status, interrupted: this.interrupted };
  }
}
