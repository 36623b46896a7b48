import { EventEmitter } from "node:events";
import { afterEach, describe, expect, it, vi } from "vitest";
import { abortableSleep, installInterruptHandler } from "../server/services/timelapse/interrupt";

const makeLog = () => ({ info: vi.fn(), warn: vi.fn() });

describe("installInterruptHandler", () => {
  it("aborts on the first SIGINT or SIGTERM and ignores repeats", () => {
    const source = new EventEmitter();
    const log = makeLog();
    const controller = new AbortController();
    installInterruptHandler(controller, { log, source });

    source.emit("SIGTERM", "SIGTERM");
    source.emit("SIGINT", "SIGINT");

    expect(controller.signal.aborted).toBe(true);
    expect(controller.signal.reason).toBe("SIGTERM");
    expect(log.info).toHaveBeenCalledWith("Received interrupt signal, cleaning up...");
    expect(log.warn).toHaveBeenCalledWith("Received SIGINT while already stopping, ignoring");
  });

  it("removes its listeners when disposed", () => {
    const source = new EventEmitter();
    const controller = new AbortController();
    const dispose = installInterruptHandler(controller, { log: makeLog(), source });
    expect(source.listenerCount("SIGINT")).toBe(1);
    expect(source.listenerCount("SIGTERM")).toBe(1);

    dispose();
    source.emit("SIGINT", "SIGINT");

    expect(source.listenerCount("SIGINT")).toBe(0);
    expect(source.listenerCount("SIGTERM")).toBe(0);
    expect(controller.signal.aborted).toBe(false);
  });
});

describe("abortableSleep", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves true once the interval elapses", async () => {
    vi.useFakeTimers();
    const pending = abortableSleep(5000, new AbortController().signal);
    await vi.advanceTimersByTimeAsync(5000);
    await expect(pending).resolves.toBe(true);
  });

  it("resolves false as soon as the signal fires", async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const pending = abortableSleep(60_000, controller.signal);
    await vi.advanceTimersByTimeAsync(100);
    controller.abort();
    await expect(pending).resolves.toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("does not wait when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(abortableSleep(60_000, controller.signal)).resolves.toBe(false);
  });
});
