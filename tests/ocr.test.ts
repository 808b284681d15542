import { promises as fs } from "fs";
import { join } from "path";
import { createWorker } from "tesseract.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TesseractRecognizer, splitLanguages, type RecognizerOptions } from "../src/main/ocr";
import { RecognitionError } from "../src/shared/errors";
import { makeTempDir, removeDir } from "./helpers";

vi.mock("tesseract.js", () => ({
  createWorker: vi.fn()
}));

type Worker = Awaited<ReturnType<typeof createWorker>>;

const makeWorker = (text: string) => ({
  setParameters: vi.fn(async (_params: Record<string, string>) => ({ jobId: "params", data: {} })),
  recognize: vi.fn(async (_image: Buffer, _options?: object, _output?: object) => ({
    jobId: "recognize",
    data: { text, tsv: "level\tpage_num\tword_num\ttext\n5\t1\t1\thello\n" }
  })),
  terminate: vi.fn(async () => ({ jobId: "terminate", data: true }))
});

const installWorker = (worker: ReturnType<typeof makeWorker>) => {
  const createWorkerMock = vi.mocked(createWorker);
  // Only the members the recognizer touches are implemented.
  createWorkerMock.mockResolvedValue(worker as unknown as Worker);
  return createWorkerMock;
};

const image = Buffer.from("png");

describe("TesseractRecognizer", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await makeTempDir();
    await fs.mkdir(join(dir, "packages"));
    await fs.writeFile(join(dir, "packages", "eng.traineddata.gz"), "eng-data");
    await fs.writeFile(join(dir, "packages", "jpn.traineddata.gz"), "jpn-data");
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  const makeRecognizer = (options: RecognizerOptions = {}) =>
    new TesseractRecognizer(join(dir, "tessdata"), {
      locateLanguage: (lang) => join(dir, "packages", `${lang}.traineddata.gz`),
      ...options
    });

  it("recognizes with the page segmentation mode and spacing preserved", async () => {
    const worker = makeWorker("hello world");
    installWorker(worker);

    await expect(makeRecognizer().recognize(image, "jpn+eng", 6)).resolves.toBe("hello world");
    expect(worker.setParameters).toHaveBeenCalledWith({
      tessedit_pageseg_mode: "6",
      preserve_interword_spaces: "1"
    });
  });

  it("loads language data from the local data directory", async () => {
    const createWorkerMock = installWorker(makeWorker("x"));
    const dataDir = join(dir, "tessdata");

    await makeRecognizer().recognize(image, "jpn+eng", 6);

    expect(createWorkerMock).toHaveBeenCalledWith(["jpn", "eng"], 1, {
      langPath: dataDir,
      cachePath: dataDir,
      gzip: true
    });
    expect(await fs.readFile(join(dataDir, "jpn.traineddata.gz"), "utf-8")).toBe("jpn-data");
    expect(await fs.readFile(join(dataDir, "eng.traineddata.gz"), "utf-8")).toBe("eng-data");
  });

  it("keeps language data already in the data directory", async () => {
    installWorker(makeWorker("x"));
    await fs.mkdir(join(dir, "tessdata"));
    await fs.writeFile(join(dir, "tessdata", "eng.traineddata.gz"), "custom-data");
    const locateLanguage = vi.fn((lang: string) => join(dir, "packages", `${lang}.traineddata.gz`));

    await makeRecognizer({ locateLanguage }).recognize(image, "eng", 6);

    expect(locateLanguage).not.toHaveBeenCalled();
    expect(await fs.readFile(join(dir, "tessdata", "eng.traineddata.gz"), "utf-8")).toBe("custom-data");
  });

  it("names the package to install for a missing language", async () => {
    const createWorkerMock = installWorker(makeWorker("x"));
    const recognizer = makeRecognizer({
      locateLanguage: (lang) => {
        throw new Error(`Cannot find module '@tesseract.js-data/${lang}'`);
      }
    });

    const failure = recognizer.recognize(image, "kor", 6);

    await expect(failure).rejects.toBeInstanceOf(RecognitionError);
    await expect(failure).rejects.toThrow(/^No language data for "kor"; install @tesseract\.js-data\/kor /);
    expect(createWorkerMock).not.toHaveBeenCalled();
  });

  it("reuses one worker per language set", async () => {
    const createWorkerMock = installWorker(makeWorker("x"));
    const recognizer = makeRecognizer();

    await recognizer.recognize(image, "eng", 6);
    await recognizer.recognize(image, "eng", 7);

    expect(createWorkerMock).toHaveBeenCalledTimes(1);
  });

  it("wraps engine failures", async () => {
    const worker = makeWorker("");
    worker.recognize.mockRejectedValueOnce(new Error("engine crashed"));
    installWorker(worker);

    await expect(makeRecognizer().recognize(image, "eng", 6)).rejects.toBeInstanceOf(
      RecognitionError
    );
  });

  it("writes the word layout table", async () => {
    const worker = makeWorker("hello");
    installWorker(worker);
    const recognizer = makeRecognizer({ now: () => new Date(2024, 4, 1, 9, 3, 7) });

    const file = await recognizer.dumpLayout(image, "eng", join(dir, "layout"));

    expect(file).toBe(join(dir, "layout", "layout_20240501_090307.tsv"));
    expect(await fs.readFile(file, "utf-8")).toBe("level\tpage_num\tword_num\ttext\n5\t1\t1\thello\n");
    expect(worker.recognize).toHaveBeenCalledWith(image, {}, { text: false, tsv: true });
  });

  it("terminates workers on shutdown", async () => {
    const worker = makeWorker("x");
    installWorker(worker);
    const recognizer = makeRecognizer();
    await recognizer.recognize(image, "eng", 6);

    await recognizer.shutdown();

    expect(worker.terminate).toHaveBeenCalledTimes(1);
  });
});

describe("splitLanguages", () => {
  it("splits and trims a plus-joined list", () => {
    expect(splitLanguages("jpn + eng+")).toEqual(["jpn", "eng"]);
  });
});
