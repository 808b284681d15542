export type Rect = {
  left: number;
  top: number;
  right: number;
  bottom: number;
};

export type CropMode = "relative" | "absolute";

export type ControlPaths = {
  pidFile: string;
  stopFile: string;
  statusFile: string;
  latestLogFile: string;
  recentLogFile: string;
  webhookLogFile: string;
};

export type CaptureConfig = {
  windowTitle: string;
  webhookUrl: string;
  pollSec: number;
  ocrLang: string;
  /** Directory the recognizer loads `<lang>.traineddata.gz` from. */
  ocrDataDir: string;
  cropRect: Rect | null;
  cropMode: CropMode;
  onlyOnChange: boolean;
  normalizeWhitespace: boolean;
  keepNewlines: boolean;
  preprocess: boolean;
  invert: boolean;
  sharpen: boolean;
  addTimestamp: boolean;
  saveScreenshot: boolean;
  saveScreenshotOnce: boolean;
  saveLayoutDump: boolean;
  threshold: number;
  ocrScale: number;
  medianFilter: number;
  pageSegMode: number;
  screenshotDir: string;
  layoutDir: string;
  appLogFile: string;
  heartbeatSec: number;
  latestMaxChars: number;
  logMaxLines: number;
  webhookTimeoutSec: number;
  control: ControlPaths;
};

export type PreprocessOptions = Pick<
  CaptureConfig,
  "ocrScale" | "medianFilter" | "sharpen" | "preprocess" | "invert" | "threshold"
>;

export type WindowInfo = {
  id: string;
  title: string;
  minimized: boolean;
  outer: Rect;
  client: Rect;
  /** Restored-position bounds; differs from `outer` while the window is minimized. */
  normal?: Rect;
};

export type LoopPhase = "starting" | "running" | "stopping" | "stopped";

export type LoopState = {
  lastSentText: string;
  lastHeartbeatAt: number;
  savedScreenshotOnce: boolean;
  lastRecognizedText: string;
  stopRequested: boolean;
};

export type ControlState = "running" | "stopped";

export type StatusRecord = {
  state: ControlState | "unknown";
  timestamp: number | null;
};

export type LogKind = "latest" | "recent" | "webhook";

export type DeliveryOutcome =
  | { delivered: false; reason: "empty" }
  | { delivered: true; status: number; length: number; truncated: boolean };
