import { promises as fs } from "fs";
import { dirname, resolve } from "path";
import { parse } from "dotenv";
import { captureConfigSchema } from "../shared/configSchema";
import { ConfigError, MissingEndpointError } from "../shared/errors";
import type { CaptureConfig, ControlPaths, Rect } from "../shared/types";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

export type ConfigStore = Record<string, string>;

export type LoadConfigOptions = {
  file: string;
  env?: NodeJS.ProcessEnv;
};

export type LoadedConfig = {
  config: CaptureConfig;
  source: string;
  warnings: string[];
};

/**
 * Strict boolean parser for store values. Values outside both the truthy and the
 * falsy vocabulary (including an empty or missing value) yield the fallback.
 */
export const parseBool = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }
  if (FALSE_VALUES.has(normalized)) {
    return false;
  }
  return fallback;
};

export const parseCropRect = (value: string | undefined): Rect | null => {
  if (!value || !value.trim()) {
    return null;
  }
  const parts = value.split(",").map((part) => part.trim());
  if (parts.length !== 4 || parts.some((part) => !/^-?\d+$/.test(part))) {
    return null;
  }
  const [x1, y1, x2, y2] = parts.map((part) => Number.parseInt(part, 10));
  return {
    left: Math.min(x1, x2),
    top: Math.min(y1, y2),
    right: Math.max(x1, x2),
    bottom: Math.max(y1, y2)
  };
};

export const formatCropRect = (rect: Rect) =>
  `${rect.left},${rect.top},${rect.right},${rect.bottom}`;

const parseCropMode = (value: string | undefined): string => {
  const normalized = (value ?? "").trim().toLowerCase();
  return normalized || "relative";
};

export const readConfigStore = async (file: string): Promise<ConfigStore> => {
  try {
    const raw = await fs.readFile(file, "utf-8");
    return parse(raw);
  } catch (error: unknown) {
    if (isMissingFile(error)) {
      return {};
    }
    throw new ConfigError(
      `Unable to read config store ${file}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
};

const isMissingFile = (error: unknown) =>
  typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";

const mergeEnv = (store: ConfigStore, env: NodeJS.ProcessEnv | undefined): ConfigStore => {
  if (!env) {
    return store;
  }
  const merged: ConfigStore = { ...store };
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
};

const createReaders = (store: ConfigStore, baseDir: string) => {
  const text = (key: string, fallback: string) => {
    const value = store[key];
    return value !== undefined && value.trim() !== "" ? value.trim() : fallback;
  };
  const path = (key: string, fallback: string) => resolve(baseDir, text(key, fallback));
  const flag = (key: string, fallback: boolean) => parseBool(store[key], fallback);
  return { text, path, flag };
};

const readControlPaths = (path: (key: string, fallback: string) => string): ControlPaths => ({
  pidFile: path("PID_FILE", "ocr.pid"),
  stopFile: path("STOP_FILE", "STOP"),
  statusFile: path("STATUS_FILE", "ocr.status"),
  latestLogFile: path("LATEST_LOG_FILE", "ocr_latest.txt"),
  recentLogFile: path("RECENT_LOG_FILE", "ocr_recent.log"),
  webhookLogFile: path("WEBHOOK_LOG_FILE", "webhook.log")
});

export const buildConfig = (store: ConfigStore, baseDir: string): CaptureConfig => {
  const webhookUrl = (store.WEBHOOK_URL ?? "").trim();
  if (!webhookUrl) {
    throw new MissingEndpointError();
  }
  const { text, path, flag } = createReaders(store, baseDir);

  const input = {
    windowTitle: text("LINE_WINDOW_TITLE", "LINE"),
    webhookUrl,
    pollSec: text("POLL_SEC", "1.0"),
    ocrLang: text("OCR_LANG", "jpn+eng"),
    cropRect: parseCropRect(store.CROP_RECT),
    cropMode: parseCropMode(store.CROP_MODE),
    onlyOnChange: flag("ONLY_ON_CHANGE", true),
    normalizeWhitespace: flag("NORMALIZE_WHITESPACE", true),
    keepNewlines: flag("KEEP_NEWLINES", false),
    preprocess: flag("PREPROCESS", false),
    invert: flag("INVERT", false),
    sharpen: flag("SHARPEN", false),
    addTimestamp: flag("ADD_TIMESTAMP", true),
    saveScreenshot: flag("SAVE_SCREENSHOT", false),
    saveScreenshotOnce: flag("SAVE_SCREENSHOT_ONCE", false),
    saveLayoutDump: flag("SAVE_LAYOUT_DUMP", false),
    threshold: text("THRESHOLD", "160"),
    ocrScale: text("OCR_SCALE", "1.0"),
    medianFilter: text("MEDIAN_FILTER", "0"),
    pageSegMode: text("OCR_PSM", "6"),
    ocrDataDir: path("OCR_DATA_DIR", "tessdata"),
    screenshotDir: path("SCREENSHOT_DIR", "screenshots"),
    layoutDir: path("LAYOUT_DIR", "layout"),
    appLogFile: path("APP_LOG_FILE", "ocr.log"),
    heartbeatSec: text("HEARTBEAT_SEC", "5"),
    latestMaxChars: text("LATEST_MAX_CHARS", "2000"),
    logMaxLines: text("LOG_MAX_LINES", "200"),
    webhookTimeoutSec: text("WEBHOOK_TIMEOUT_SEC", "10"),
    control: readControlPaths(path)
  };

  const validation = captureConfigSchema.safeParse(input);
  if (!validation.success) {
    throw new ConfigError(
      `Invalid configuration: ${validation.error.errors.map((err) => err.message).join("; ")}`
    );
  }
  return validation.data;
};

/**
 * Loads the key/value store once. Environment variables take precedence over the
 * file; relative paths resolve against the store's directory.
 */
export const loadConfig = async ({ file, env }: LoadConfigOptions): Promise<LoadedConfig> => {
  const source = resolve(file);
  const store = mergeEnv(await readConfigStore(source), env);
  const warnings: string[] = [];
  if (store.CROP_RECT && store.CROP_RECT.trim() && !parseCropRect(store.CROP_RECT)) {
    warnings.push(`Ignoring malformed CROP_RECT "${store.CROP_RECT}"; capturing the full client area.`);
  }
  return { config: buildConfig(store, dirname(source)), source, warnings };
};

export type ControlSettings = {
  control: ControlPaths;
  heartbeatSec: number;
};

/** Control-file locations only; usable without a configured endpoint. */
export const loadControlSettings = async ({ file, env }: LoadConfigOptions): Promise<ControlSettings> => {
  const source = resolve(file);
  const store = mergeEnv(await readConfigStore(source), env);
  const { text, path } = createReaders(store, dirname(source));
  const heartbeatSec = Number(text("HEARTBEAT_SEC", "5"));
  if (!Number.isFinite(heartbeatSec) || heartbeatSec <= 0) {
    throw new ConfigError("HEARTBEAT_SEC must be > 0");
  }
  return { control: readControlPaths(path), heartbeatSec };
};

/**
 * Rewrites KEY=VALUE in place (also reviving a commented-out `#KEY=` line) or
 * appends it when absent.
 */
export const setConfigValue = async (file: string, key: string, value: string): Promise<void> => {
  let lines: string[] = [];
  try {
    const raw = await fs.readFile(file, "utf-8");
    lines = raw ? raw.replace(/\r?\n$/, "").split(/\r?\n/) : [];
  } catch (error: unknown) {
    if (!isMissingFile(error)) {
      throw error;
    }
  }
  let found = false;
  const next = lines.map((line) => {
    const stripped = line.trim();
    if (stripped.startsWith(`${key}=`) || stripped.startsWith(`#${key}=`)) {
      found = true;
      return `${key}=${value}`;
    }
    return line;
  });
  if (!found) {
    next.push(`${key}=${value}`);
  }
  await fs.writeFile(file, `${next.join("\n")}\n`, "utf-8");
};
