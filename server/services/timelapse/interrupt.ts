import type { SessionLog } from "./session-log";

export const INTERRUPT_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

type SignalListener = (signal: NodeJS.Signals) => void;

export interface SignalSource {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
}

export type InterruptHandlerOptions = {
  log: Pick<SessionLog, "info" | "warn">;
  source?: SignalSource;
  signals?: readonly NodeJS.Signals[];
};

/**
 * Turns termination signals into a cancellation of `controller`. The capture
 * loop only looks at the signal between frames, so an in-flight capture call
 * always finishes. Returns a disposer that unregisters the listeners.
 */
export const installInterruptHandler = (
  controller: AbortController,
  options: InterruptHandlerOptions,
): (() => void) => {
  const source: SignalSource = options.source ?? process;
  const signals = options.signals ?? INTERRUPT_SIGNALS;

  const onSignal: SignalListener = (signal) => {
    if (controller.signal.aborted) {
      options.log.warn(`Received ${signal} while already stopping, ignoring`);
      return;
    }
    options.log.info("Received interrupt signal, cleaning up...");
    controller.abort(signal);
  };

  for (const signal of signals) {
    source.on(signal, onSignal);
  }
  return () => {
    for (const signal of signals) {
      source.off(signal, onSignal);
    }
  };
};

/** Resolves `true` when the full interval elapsed, `false` when cancelled first. */
export const abortableSleep = (ms: number, signal: AbortSignal): Promise<boolean> => {
  if (signal.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, Math.max(0, ms));
    signal.addEventListener("abort", onAbort, { once: true });
  });
};
