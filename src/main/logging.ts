import { promises as fs } from "fs";
import { dirname } from "path";

type LogLevel = "INFO" | "WARN" | "ERROR";

export type Logger = {
  info: (event: string, data?: unknown) => Promise<void>;
  warn: (event: string, data?: unknown) => Promise<void>;
  error: (event: string, data?: unknown) => Promise<void>;
};

export type LoggerOptions = {
  file: string | null;
  echo?: boolean;
};

const formatPayload = (data?: unknown) => {
  if (data === undefined) {
    return "";
  }
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
};

export const formatLogLine = (level: LogLevel, event: string, data?: unknown, at = new Date()) => {
  const payload = formatPayload(data);
  return `[${at.toISOString()}] [${level}] ${event}${payload ? ` ${payload}` : ""}`;
};

export const createLogger = ({ file, echo = true }: LoggerOptions): Logger => {
  let dirPromise: Promise<unknown> | null = null;

  const ensureDir = (path: string) => {
    if (!dirPromise) {
      dirPromise = fs.mkdir(dirname(path), { recursive: true });
    }
    return dirPromise;
  };

  const appendLog = async (level: LogLevel, event: string, data?: unknown) => {
    const line = formatLogLine(level, event, data);
    if (echo) {
      if (level === "ERROR") {
        console.error(line);
      } else {
        console.log(line);
      }
    }
    if (!file) {
      return;
    }
    try {
      await ensureDir(file);
      await fs.appendFile(file, `${line}\n`, "utf-8");
    } catch (error: unknown) {
      console.warn(`log write failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  };

  return {
    info: (event, data) => appendLog("INFO", event, data),
    warn: (event, data) => appendLog("WARN", event, data),
    error: (event, data) => appendLog("ERROR", event, data)
  };
};
