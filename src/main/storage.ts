import { promises as fs } from "fs";
import { join } from "path";
import { formatFileStamp } from "../shared/time";

export type ScreenshotSet = {
  /** Frame as captured from the screen. */
  capture: Buffer;
  /** Frame after preprocessing, as handed to recognition. */
  ocr: Buffer;
};

export const saveScreenshots = async (
  dir: string,
  images: ScreenshotSet,
  capturedAt: Date
): Promise<string[]> => {
  await fs.mkdir(dir, { recursive: true });
  const stamp = formatFileStamp(capturedAt);
  const capturePath = join(dir, `capture_${stamp}.png`);
  const ocrPath = join(dir, `ocr_${stamp}.png`);
  await fs.writeFile(capturePath, images.capture);
  await fs.writeFile(ocrPath, images.ocr);
  return [capturePath, ocrPath];
};
