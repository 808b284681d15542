import { promises as fs } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { PNG } from "pngjs";
import type { CaptureConfig, ControlPaths } from "../src/shared/types";

export const makeTempDir = () => fs.mkdtemp(join(tmpdir(), "chat-relay-"));

export const removeDir = (dir: string) => fs.rm(dir, { recursive: true, force: true });

export const makeControlPaths = (dir: string): ControlPaths => ({
  pidFile: join(dir, "ocr.pid"),
  stopFile: join(dir, "STOP"),
  statusFile: join(dir, "ocr.status"),
  latestLogFile: join(dir, "ocr_latest.txt"),
  recentLogFile: join(dir, "ocr_recent.log"),
  webhookLogFile: join(dir, "webhook.log")
});

export const makeConfig = (dir: string, overrides: Partial<CaptureConfig> = {}): CaptureConfig => ({
  windowTitle: "LINE",
  webhookUrl: "https://hooks.example.test/relay",
  pollSec: 1,
  ocrLang: "jpn+eng",
  cropRect: { left: 0, top: 0, right: 10, bottom: 10 },
  cropMode: "absolute",
  onlyOnChange: true,
  normalizeWhitespace: true,
  keepNewlines: false,
  preprocess: false,
  invert: false,
  sharpen: false,
  addTimestamp: false,
  saveScreenshot: false,
  saveScreenshotOnce: false,
  saveLayoutDump: false,
  threshold: 160,
  ocrScale: 1,
  medianFilter: 0,
  pageSegMode: 6,
  ocrDataDir: join(dir, "tessdata"),
  screenshotDir: join(dir, "screenshots"),
  layoutDir: join(dir, "layout"),
  appLogFile: join(dir, "ocr.log"),
  heartbeatSec: 5,
  latestMaxChars: 2000,
  logMaxLines: 200,
  webhookTimeoutSec: 10,
  control: makeControlPaths(dir),
  ...overrides
});

export type Rgb = [number, number, number];

export const makePng = (width: number, height: number, pixel: (x: number, y: number) => Rgb) => {
  const png = new PNG({ width, height });
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const i = (y * width + x) * 4;
      const [r, g, b] = pixel(x, y);
      png.data[i] = r;
      png.data[i + 1] = g;
      png.data[i + 2] = b;
      png.data[i + 3] = 255;
    }
  }
  return PNG.sync.write(png);
};

export const readPixel = (image: Buffer, x: number, y: number): Rgb => {
  const png = PNG.sync.read(image);
  const i = (y * png.width + x) * 4;
  return [png.data[i], png.data[i + 1], png.data[i + 2]];
};

export const readSize = (image: Buffer) => {
  const png = PNG.sync.read(image);
  return { width: png.width, height: png.height };
};

export const fileExists = async (file: string) => {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
};
