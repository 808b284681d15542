import { promises as fs } from "fs";
import { join } from "path";
import { createWorker } from "tesseract.js";
import { RecognitionError, formatError } from "../shared/errors";
import { formatFileStamp } from "../shared/time";

export interface Recognizer {
  recognize(image: Buffer, lang: string, pageSegMode: number): Promise<string>;
  /** Writes a per-word position/confidence table; returns the file path. */
  dumpLayout(image: Buffer, lang: string, outDir: string): Promise<string>;
  shutdown(): Promise<void>;
}

type TesseractWorker = Awaited<ReturnType<typeof createWorker>>;

// OEM.LSTM_ONLY, the engine the *_best_int language data is built for.
const LSTM_ONLY = 1;

export type RecognizerOptions = {
  /** Resolves the packaged `<lang>.traineddata.gz` for a language code. */
  locateLanguage?: (lang: string) => string;
  now?: () => Date;
};

export const splitLanguages = (lang: string) =>
  lang
    .split("+")
    .map((part) => part.trim())
    .filter(Boolean);

export const locatePackagedLanguage = (lang: string) =>
  require.resolve(`@tesseract.js-data/${lang}/4.0.0_best_int/${lang}.traineddata.gz`);

const exists = async (file: string) => {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
};

/**
 * One tesseract.js worker per language string. Language data comes from the
 * installed @tesseract.js-data packages and is staged in `dataDir`, which the
 * workers use as both their language and cache path, so nothing is downloaded.
 */
export class TesseractRecognizer implements Recognizer {
  private readonly workers = new Map<string, Promise<TesseractWorker>>();
  private readonly locateLanguage: (lang: string) => string;
  private readonly now: () => Date;

  constructor(
    private readonly dataDir: string,
    options: RecognizerOptions = {}
  ) {
    this.locateLanguage = options.locateLanguage ?? locatePackagedLanguage;
    this.now = options.now ?? (() => new Date());
  }

  async recognize(image: Buffer, lang: string, pageSegMode: number): Promise<string> {
    try {
      const worker = await this.getWorker(lang);
      const params: Record<string, string> = {
        tessedit_pageseg_mode: String(pageSegMode),
        preserve_interword_spaces: "1"
      };
      await worker.setParameters(params);
      const result = await worker.recognize(image);
      return result.data.text ?? "";
    } catch (error: unknown) {
      if (error instanceof RecognitionError) {
        throw error;
      }
      throw new RecognitionError(`Text recognition failed: ${formatError(error)}`);
    }
  }

  async dumpLayout(image: Buffer, lang: string, outDir: string): Promise<string> {
    const worker = await this.getWorker(lang);
    const result = await worker.recognize(image, {}, { text: false, tsv: true });
    await fs.mkdir(outDir, { recursive: true });
    const file = join(outDir, `layout_${formatFileStamp(this.now())}.tsv`);
    await fs.writeFile(file, result.data.tsv ?? "", "utf-8");
    return file;
  }

  async shutdown(): Promise<void> {
    const pending = [...this.workers.values()];
    this.workers.clear();
    for (const workerPromise of pending) {
      const worker = await workerPromise;
      await worker.terminate();
    }
  }

  private getWorker(lang: string): Promise<TesseractWorker> {
    let workerPromise = this.workers.get(lang);
    if (!workerPromise) {
      workerPromise = this.startWorker(lang);
      workerPromise.catch(() => this.workers.delete(lang));
      this.workers.set(lang, workerPromise);
    }
    return workerPromise;
  }

  private async startWorker(lang: string): Promise<TesseractWorker> {
    const langs = splitLanguages(lang);
    await this.stageLanguageData(langs);
    return createWorker(langs, LSTM_ONLY, {
      langPath: this.dataDir,
      cachePath: this.dataDir,
      gzip: true
    });
  }

  private async stageLanguageData(langs: string[]): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });
    for (const lang of langs) {
      const target = join(this.dataDir, `${lang}.traineddata.gz`);
      if (await exists(target)) {
        continue;
      }
      let source: string;
      try {
        source = this.locateLanguage(lang);
      } catch (error: unknown) {
        throw new RecognitionError(
          `No language data for "${lang}"; install @tesseract.js-data/${lang} (${formatError(error)}).`
        );
      }
      await fs.copyFile(source, target);
    }
  }
}
