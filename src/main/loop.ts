import { RelayError, formatError, type RelayStage } from "../shared/errors";
import { sleep as defaultSleep } from "../shared/time";
import type { CaptureConfig, DeliveryOutcome, LoopPhase, LoopState, Rect } from "../shared/types";
import type { CapturedFrame } from "./capture";
import type { ControlChannel } from "./control";
import { needsWindow, type CoordinateResolver } from "./coordinates";
import type { Logger } from "./logging";
import type { Recognizer } from "./ocr";
import { preprocessForOcr, type PreprocessMeta } from "./ocrPreprocess";
import { saveScreenshots } from "./storage";
import { buildPreview, formatMessage, normalizeOcrText, shouldSend } from "./textFilter";

export type LoopDependencies = {
  config: CaptureConfig;
  resolver: Pick<CoordinateResolver, "locateWindow" | "resolveCaptureRect">;
  capturer: { capture: (rect: Rect) => Promise<CapturedFrame> };
  recognizer: Recognizer;
  dispatcher: { dispatch: (message: string) => Promise<DeliveryOutcome> };
  control: ControlChannel;
  logger: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  preprocess?: typeof preprocessForOcr;
  persistScreenshots?: typeof saveScreenshots;
};

type LoopStage = RelayStage | "preprocess";

/**
 * Poll loop: resolve region, capture, preprocess, recognize, dedupe, dispatch.
 * Region, capture and recognition problems are retried on the next poll; a failed
 * delivery or a control-file failure at startup ends the run with a non-zero code.
 */
export class CaptureLoop {
  private phase: LoopPhase = "starting";
  private readonly state: LoopState = {
    lastSentText: "",
    lastHeartbeatAt: 0,
    savedScreenshotOnce: false,
    lastRecognizedText: "",
    stopRequested: false
  };
  private lastTransient: string | null = null;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly preprocess: typeof preprocessForOcr;
  private readonly persistScreenshots: typeof saveScreenshots;

  constructor(private readonly deps: LoopDependencies) {
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
    this.preprocess = deps.preprocess ?? preprocessForOcr;
    this.persistScreenshots = deps.persistScreenshots ?? saveScreenshots;
  }

  get currentPhase(): LoopPhase {
    return this.phase;
  }

  get snapshot(): Readonly<LoopState> {
    return { ...this.state };
  }

  /** Resolves to the process exit code. */
  async run(): Promise<number> {
    const { control, logger, config } = this.deps;
    let exitCode = 0;
    try {
      await control.begin();
      this.state.lastHeartbeatAt = this.now().getTime();
      this.phase = "running";
      await logger.info("loop.started", {
        windowTitle: config.windowTitle,
        cropMode: config.cropMode,
        cropRect: config.cropRect,
        pollSec: config.pollSec
      });

      while (this.phase === "running") {
        if (await control.shouldStop()) {
          this.state.stopRequested = true;
          this.phase = "stopping";
          await logger.info("loop.stopping", { reason: "stop requested" });
          break;
        }
        await this.iterate();
        if (await control.heartbeat()) {
          this.state.lastHeartbeatAt = this.now().getTime();
        }
        await this.sleep(config.pollSec * 1000);
      }
    } catch (error: unknown) {
      exitCode = 1;
      this.phase = "stopping";
      await logger.error("loop.fatal", {
        stage: error instanceof RelayError ? error.stage : "unknown",
        error: formatError(error),
        action: "exit"
      });
    } finally {
      this.phase = "stopping";
      try {
        await this.deps.recognizer.shutdown();
      } catch (error: unknown) {
        await logger.warn("ocr.shutdown.failed", { error: formatError(error) });
      }
      await control.end();
      this.phase = "stopped";
      await logger.info("loop.stopped", { exitCode });
    }
    return exitCode;
  }

  private async iterate(): Promise<void> {
    const { config, control, recognizer, dispatcher, logger } = this.deps;

    const rect = await this.attempt("region", () => this.resolveRect());
    if (!rect) {
      return;
    }
    const frame = await this.attempt("capture", () => this.deps.capturer.capture(rect));
    if (!frame) {
      return;
    }
    const processed = await this.attempt("preprocess", () => this.preprocess(frame.image, config));
    if (!processed) {
      return;
    }

    const raw = await this.attempt("recognition", () =>
      recognizer.recognize(processed.image, config.ocrLang, config.pageSegMode)
    );
    if (raw !== null) {
      this.lastTransient = null;
    }
    const text = config.normalizeWhitespace
      ? normalizeOcrText(raw ?? "", config.keepNewlines)
      : (raw ?? "");

    await this.saveArtifacts(frame.image, processed.image, processed.meta, text);

    if (text.trim() && text !== this.state.lastRecognizedText) {
      await control.appendLog("latest", text);
      await control.appendLog("recent", text);
    }
    this.state.lastRecognizedText = text;

    if (!shouldSend(text, this.state.lastSentText, config.onlyOnChange)) {
      return;
    }
    const outcome = await dispatcher.dispatch(formatMessage(text, config.addTimestamp, this.now()));
    this.state.lastSentText = text;
    await logger.info("dispatch.sent", {
      preview: buildPreview(text),
      truncated: outcome.delivered ? outcome.truncated : false
    });
  }

  private async resolveRect(): Promise<Rect> {
    const { config, resolver } = this.deps;
    const handle = needsWindow(config) ? await resolver.locateWindow(config.windowTitle) : null;
    return resolver.resolveCaptureRect(config, handle);
  }

  /**
   * Runs a stage whose failures are retried on the next poll. Fatal errors
   * propagate; repeated identical failures are logged once.
   */
  private async attempt<T>(stage: LoopStage, task: () => Promise<T>): Promise<T | null> {
    try {
      return await task();
    } catch (error: unknown) {
      if (error instanceof RelayError && !error.recoverable) {
        throw error;
      }
      const message = formatError(error);
      if (message !== this.lastTransient) {
        this.lastTransient = message;
        await this.deps.logger.warn(`${stage}.failed`, { stage, error: message, action: "retry" });
      }
      return null;
    }
  }

  private async saveArtifacts(capture: Buffer, ocr: Buffer, preprocess: PreprocessMeta, text: string) {
    const { config, recognizer, logger } = this.deps;
    const saveNow =
      config.saveScreenshot || (config.saveScreenshotOnce && !this.state.savedScreenshotOnce);
    if (saveNow) {
      this.state.savedScreenshotOnce = true;
      try {
        const paths = await this.persistScreenshots(config.screenshotDir, { capture, ocr }, this.now());
        await logger.info("screenshot.saved", { paths, preprocess });
      } catch (error: unknown) {
        await logger.warn("screenshot.failed", { error: formatError(error), action: "continue" });
      }
    }

    if (config.saveLayoutDump && text.trim() && text !== this.state.lastRecognizedText) {
      try {
        const file = await recognizer.dumpLayout(ocr, config.ocrLang, config.layoutDir);
        await logger.info("layout.saved", { file, preprocess });
      } catch (error: unknown) {
        await logger.warn("layout.failed", { error: formatError(error), action: "continue" });
      }
    }
  }
}
