import { z } from "zod";

export const sessionStatusSchema = z.enum(["running", "rendering", "done", "stopped", "error"]);
export type SessionStatus = z.infer<typeof sessionStatusSchema>;

export const TERMINAL_STATUSES: readonly SessionStatus[] = ["done", "stopped", "error"];

export const isTerminalStatus = (status: SessionStatus): boolean => TERMINAL_STATUSES.includes(status);

export const statusRecordSchema = z
  .object({
    status: sessionStatusSchema,
    captured: z.number().int().nonnegative(),
    total: z.number().int().positive(),
    folder: z.string().min(1),
    video: z.string().min(1).optional(),
    error: z.string().nullable(),
  })
  .strict()
  .superRefine((record, ctx) => {
    if (record.captured > record.total) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["captured"],
        message: `captured (${record.captured}) exceeds total (${record.total})`,
      });
    }
    if (record.video !== undefined && record.status !== "done" && record.status !== "stopped") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["video"],
        message: `video is only set on a finished session, not "${record.status}"`,
      });
    }
  });
export type StatusRecord = z.infer<typeof statusRecordSchema>;

// What an observer sees before any session has written the status file.
export const idleStatusSchema = z.object({
  status: z.literal("idle"),
  captured: z.literal(0),
  total: z.literal(0),
  error: z.null(),
});
export type IdleStatus = z.infer<typeof idleStatusSchema>;

export type ObservedStatus = StatusRecord | IdleStatus;

export const IDLE_STATUS: IdleStatus = { status: "idle", captured: 0, total: 0, error: null };

/** Key order matches the on-disk document; `video` is dropped when unset. */
export const serializeStatusRecord = (record: StatusRecord): string => {
  const ordered: Record<string, unknown> = {
    status: record.status,
    captured: record.captured,
    total: record.total,
    folder: record.folder,
  };
  if (record.video !== undefined) {
    ordered.video = record.video;
  }
  ordered.error = record.error;
  return `${JSON.stringify(ordered, null, 2)}\n`;
};

export const ENCODER_UNAVAILABLE_MESSAGE = "ffmpeg not available";
export const ENCODER_FAILED_MESSAGE = "Failed to create video";
export const captureFailedMessage = (sequence: number): string => `Failed to capture frame ${sequence}`;
