import { z } from "zod";

/**
 * Corner order is normalized when parsed; a zero-size crop is left to the resolver,
 * which clamps it (relative) or skips the poll (absolute).
 */
export const rectSchema = z.object({
  left: z.number().int(),
  top: z.number().int(),
  right: z.number().int(),
  bottom: z.number().int()
});

const controlPathsSchema = z.object({
  pidFile: z.string().min(1),
  stopFile: z.string().min(1),
  statusFile: z.string().min(1),
  latestLogFile: z.string().min(1),
  recentLogFile: z.string().min(1),
  webhookLogFile: z.string().min(1)
});

export const captureConfigSchema = z.object({
  windowTitle: z.string().min(1, "LINE_WINDOW_TITLE must not be empty"),
  webhookUrl: z.string().url("WEBHOOK_URL must be a valid URL"),
  pollSec: z.coerce.number().positive("POLL_SEC must be > 0"),
  ocrLang: z.string().min(1, "OCR_LANG must not be empty"),
  cropRect: rectSchema.nullable(),
  cropMode: z
    .string()
    .pipe(
      z.enum(["relative", "absolute"], {
        errorMap: () => ({ message: "CROP_MODE must be relative or absolute" })
      })
    ),
  onlyOnChange: z.boolean(),
  normalizeWhitespace: z.boolean(),
  keepNewlines: z.boolean(),
  preprocess: z.boolean(),
  invert: z.boolean(),
  sharpen: z.boolean(),
  addTimestamp: z.boolean(),
  saveScreenshot: z.boolean(),
  saveScreenshotOnce: z.boolean(),
  saveLayoutDump: z.boolean(),
  threshold: z.coerce.number().int().min(0).max(255),
  ocrScale: z.coerce.number().min(1, "OCR_SCALE must be >= 1.0"),
  medianFilter: z.coerce.number().int().min(0),
  pageSegMode: z.coerce.number().int().min(0).max(13),
  ocrDataDir: z.string().min(1),
  screenshotDir: z.string().min(1),
  layoutDir: z.string().min(1),
  appLogFile: z.string().min(1),
  heartbeatSec: z.coerce.number().positive("HEARTBEAT_SEC must be > 0"),
  latestMaxChars: z.coerce.number().int().positive(),
  logMaxLines: z.coerce.number().int().positive(),
  webhookTimeoutSec: z.coerce.number().positive(),
  control: controlPathsSchema
});
