import { formatError } from "../shared/errors";
import type { CaptureConfig } from "../shared/types";
import { DesktopScreenGrabber, FrameCapturer } from "./capture";
import { loadConfig } from "./config";
import { ControlChannel } from "./control";
import { CoordinateResolver } from "./coordinates";
import { WebhookDispatcher } from "./dispatcher";
import { createLogger, type Logger } from "./logging";
import { CaptureLoop } from "./loop";
import { TesseractRecognizer } from "./ocr";
import { Win32WindowSystem } from "./windows";

export type StartOptions = {
  configFile: string;
  env?: NodeJS.ProcessEnv;
};

export const createCaptureLoop = (config: CaptureConfig, logger: Logger) => {
  const control = new ControlChannel(config.control, {
    heartbeatSec: config.heartbeatSec,
    latestMaxChars: config.latestMaxChars,
    logMaxLines: config.logMaxLines,
    notice: (message) => {
      logger.warn("control.notice", { message }).catch(() => undefined);
    }
  });
  const loop = new CaptureLoop({
    config,
    resolver: new CoordinateResolver(new Win32WindowSystem()),
    capturer: new FrameCapturer(new DesktopScreenGrabber()),
    recognizer: new TesseractRecognizer(config.ocrDataDir),
    dispatcher: new WebhookDispatcher(config.webhookUrl, {
      timeoutMs: config.webhookTimeoutSec * 1000,
      log: control
    }),
    control,
    logger
  });
  return { loop, control };
};

/**
 * Loads configuration once, runs the loop until it stops and resolves to the exit
 * code. Configuration problems fail before any control file is written.
 */
export const startRelay = async ({ configFile, env }: StartOptions): Promise<number> => {
  let config: CaptureConfig;
  let logger: Logger;
  try {
    const loaded = await loadConfig({ file: configFile, env });
    config = loaded.config;
    logger = createLogger({ file: config.appLogFile });
    await logger.info("config.loaded", { source: loaded.source });
    for (const warning of loaded.warnings) {
      await logger.warn("config.warning", { message: warning });
    }
  } catch (error: unknown) {
    console.error(`[config] ${formatError(error)} (exiting)`);
    return 1;
  }

  const { loop, control } = createCaptureLoop(config, logger);
  const onSignal = (signal: NodeJS.Signals) => {
    control.signalStop();
    logger.info("signal.received", { signal }).catch(() => undefined);
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  try {
    return await loop.run();
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
};
