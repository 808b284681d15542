import { promises as fs } from "fs";
import { dirname } from "path";
import { ControlFileError, formatError } from "../shared/errors";
import { formatLocalTimestamp, toUnixSeconds } from "../shared/time";
import type { ControlPaths, ControlState, LogKind, StatusRecord } from "../shared/types";

export type ControlChannelOptions = {
  heartbeatSec: number;
  latestMaxChars: number;
  logMaxLines: number;
  pid?: number;
  clock?: () => number;
  notice?: (message: string) => void;
};

const isMissingFile = (error: unknown) =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

const removeIfPresent = async (file: string) => {
  try {
    await fs.unlink(file);
  } catch (error: unknown) {
    if (!isMissingFile(error)) {
      throw error;
    }
  }
};

const writeText = async (file: string, text: string) => {
  await fs.mkdir(dirname(file), { recursive: true });
  await fs.writeFile(file, text, "utf-8");
};

export const formatStatusLine = (state: ControlState, timestamp: number) => `${state}|${timestamp}`;

export const parseStatusLine = (line: string): StatusRecord => {
  const trimmed = line.trim();
  if (!trimmed.includes("|")) {
    return { state: trimmed === "running" || trimmed === "stopped" ? trimmed : "unknown", timestamp: null };
  }
  const [state, ts] = trimmed.split("|", 2).map((part) => part.trim());
  const timestamp = /^\d+$/.test(ts) ? Number.parseInt(ts, 10) : null;
  if (state === "running" || state === "stopped") {
    return { state, timestamp };
  }
  return { state: "unknown", timestamp };
};

export const readStatus = async (file: string): Promise<StatusRecord> => {
  try {
    const raw = await fs.readFile(file, "utf-8");
    return parseStatusLine(raw.split(/\r?\n/, 1)[0] ?? "");
  } catch {
    return { state: "unknown", timestamp: null };
  }
};

/**
 * Supervisor view of liveness: the record must say running and be younger than
 * three heartbeat intervals.
 */
export const isAlive = (status: StatusRecord, heartbeatSec: number, nowMs: number = Date.now()) => {
  if (status.state !== "running" || status.timestamp === null) {
    return false;
  }
  return toUnixSeconds(nowMs) - status.timestamp <= heartbeatSec * 3;
};

export const requestStop = async (stopFile: string) => {
  await writeText(stopFile, "stop\n");
};

export class ControlChannel {
  private readonly clock: () => number;
  private readonly notice: (message: string) => void;
  private readonly pid: number;
  private lastStatusTimestamp = 0;
  private lastHeartbeatAt = 0;
  private signalled = false;
  private ended = false;

  constructor(
    private readonly paths: ControlPaths,
    private readonly options: ControlChannelOptions
  ) {
    this.clock = options.clock ?? Date.now;
    this.notice = options.notice ?? ((message) => console.warn(message));
    this.pid = options.pid ?? process.pid;
  }

  get isEnded() {
    return this.ended;
  }

  /** Clears a stale stop record, then publishes pid and `running`. Failures are fatal. */
  async begin(): Promise<void> {
    try {
      await removeIfPresent(this.paths.stopFile);
      await writeText(this.paths.pidFile, `${this.pid}\n`);
      await this.writeStatus("running");
      this.lastHeartbeatAt = this.clock();
    } catch (error: unknown) {
      throw new ControlFileError(`Unable to publish control files: ${formatError(error)}`);
    }
  }

  /** Rewrites the status record when a heartbeat interval has elapsed. */
  async heartbeat(): Promise<boolean> {
    const now = this.clock();
    if (now - this.lastHeartbeatAt < this.options.heartbeatSec * 1000) {
      return false;
    }
    this.lastHeartbeatAt = now;
    try {
      await this.writeStatus("running");
      return true;
    } catch (error: unknown) {
      this.notice(`heartbeat write failed: ${formatError(error)}`);
      return false;
    }
  }

  signalStop() {
    this.signalled = true;
  }

  async shouldStop(): Promise<boolean> {
    if (this.signalled) {
      return true;
    }
    try {
      await fs.access(this.paths.stopFile);
      return true;
    } catch {
      return false;
    }
  }

  /** Publishes `stopped` and drops the pid record. Runs at most once. */
  async end(): Promise<void> {
    if (this.ended) {
      return;
    }
    this.ended = true;
    try {
      await this.writeStatus("stopped");
    } catch (error: unknown) {
      this.notice(`status write failed: ${formatError(error)}`);
    }
    try {
      await removeIfPresent(this.paths.pidFile);
    } catch (error: unknown) {
      this.notice(`pid removal failed: ${formatError(error)}`);
    }
  }

  async appendLog(kind: LogKind, text: string): Promise<void> {
    try {
      if (kind === "latest") {
        await writeText(this.paths.latestLogFile, text.slice(0, this.options.latestMaxChars));
        return;
      }
      const file = kind === "recent" ? this.paths.recentLogFile : this.paths.webhookLogFile;
      const line = `[${formatLocalTimestamp(new Date(this.clock()))}] ${text.replace(/\r?\n/g, " / ")}`;
      await this.appendRolling(file, line);
    } catch (error: unknown) {
      this.notice(`${kind} log write failed: ${formatError(error)}`);
    }
  }

  private async appendRolling(file: string, line: string) {
    let existing = "";
    try {
      existing = await fs.readFile(file, "utf-8");
    } catch (error: unknown) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }
    const lines = existing.split("\n").filter((entry) => entry.length > 0);
    lines.push(line);
    await writeText(file, `${lines.slice(-this.options.logMaxLines).join("\n")}\n`);
  }

  private async writeStatus(state: ControlState) {
    this.lastStatusTimestamp = Math.max(this.lastStatusTimestamp, toUnixSeconds(this.clock()));
    await writeText(this.paths.statusFile, `${formatStatusLine(state, this.lastStatusTimestamp)}\n`);
  }
}
