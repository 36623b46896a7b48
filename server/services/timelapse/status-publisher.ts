import fs from "node:fs";
import path from "node:path";
import { isTerminalStatus, serializeStatusRecord, statusRecordSchema, type StatusRecord } from "@shared/timelapse";

export class StatusInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StatusInvariantError";
  }
}

/**
 * Sole writer of the shared status file.
 *
 * Every publish is a whole-document overwrite: the record goes to a sibling
 * temp file first and is renamed over the visible path, so concurrent readers
 * see either the previous or the next document, never a partial one.
 */
export class StatusPublisher {
  private last: StatusRecord | null = null;

  constructor(readonly statusPath: string) {}

  get current(): StatusRecord | null {
    return this.last;
  }

  publish(record: StatusRecord): StatusRecord {
    const parsed = statusRecordSchema.safeParse(record);
    if (!parsed.success) {
      const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      throw new StatusInvariantError(`invalid status record: ${detail}`);
    }
    const next = parsed.data;
    const prev = this.last;
    if (prev) {
      if (isTerminalStatus(prev.status)) {
        throw new StatusInvariantError(`session already ended as ${prev.status}`);
      }
      if (next.folder !== prev.folder || next.total !== prev.total) {
        throw new StatusInvariantError("folder and total are fixed for the life of a session");
      }
      if (next.captured < prev.captured) {
        throw new StatusInvariantError(`captured went backwards (${prev.captured} -> ${next.captured})`);
      }
    }

    fs.mkdirSync(path.dirname(this.statusPath), { recursive: true });
    const tmpPath = `${this.statusPath}.${process.pid}.tmp`;
    fs.writeFileSync(tmpPath, serializeStatusRecord(next), "utf8");
    fs.renameSync(tmpPath, this.statusPath);
    this.last = next;
    return next;
  }
}
