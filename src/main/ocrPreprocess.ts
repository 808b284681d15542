import { PNG } from "pngjs";
import sharp from "sharp";
import type { PreprocessOptions } from "../shared/types";

export type Raster = {
  width: number;
  height: number;
  data: Buffer;
};

export type PreprocessMeta = {
  width: number;
  height: number;
  scaled: boolean;
  median: number | null;
  sharpened: boolean;
  binarized: boolean;
  inverted: boolean;
  low?: number;
  high?: number;
};

const clampByte = (value: number) => Math.max(0, Math.min(255, value));

export const decodePng = (image: Buffer): Raster => {
  const png = PNG.sync.read(image);
  return { width: png.width, height: png.height, data: png.data };
};

export const encodePng = (raster: Raster): Buffer => {
  const png = new PNG({ width: raster.width, height: raster.height });
  raster.data.copy(png.data);
  return PNG.sync.write(png);
};

export const toLuma = (r: number, g: number, b: number) =>
  clampByte(Math.round(r * 0.299 + g * 0.587 + b * 0.114));

/**
 * Stretch bounds that ignore the darkest and brightest 2% of pixels. Flat images
 * (range of five levels or less) keep the full scale.
 */
export const computePercentileRange = (histogram: number[], total: number) => {
  const lowTarget = Math.floor(total * 0.02);
  const highTarget = Math.min(total, Math.ceil(total * 0.98));

  let low = 0;
  let high = 255;

  let cumulative = 0;
  for (let i = 0; i < 256; i += 1) {
    cumulative += histogram[i] ?? 0;
    if (cumulative > lowTarget) {
      low = i;
      break;
    }
  }

  cumulative = 0;
  for (let i = 0; i < 256; i += 1) {
    cumulative += histogram[i] ?? 0;
    if (cumulative >= highTarget) {
      high = i;
      break;
    }
  }

  if (high <= low + 5) {
    return { low: 0, high: 255 };
  }
  return { low, high };
};

/** 3x3 cross kernel (centre 5, neighbours -1) per colour channel; borders untouched. */
export const sharpenRaster = (input: Raster): Raster => {
  const { width, height, data } = input;
  if (width < 3 || height < 3) {
    return input;
  }
  const output = Buffer.from(data);
  const stride = width * 4;
  for (let y = 1; y < height - 1; y += 1) {
    for (let x = 1; x < width - 1; x += 1) {
      const i = y * stride + x * 4;
      for (let c = 0; c < 3; c += 1) {
        const p = i + c;
        output[p] = clampByte(
          data[p] * 5 - data[p - 4] - data[p + 4] - data[p - stride] - data[p + stride]
        );
      }
    }
  }
  return { width, height, data: output };
};

/**
 * Grayscale, optional inversion, contrast stretch, then a hard cut: values above
 * `threshold` become white, the rest black.
 */
export const binarizeRaster = (
  input: Raster,
  options: { invert: boolean; threshold: number }
): { raster: Raster; low: number; high: number } => {
  const { width, height, data } = input;
  const totalPixels = width * height;
  const histogram = Array.from({ length: 256 }, () => 0);
  const luma = new Uint8Array(totalPixels);

  for (let i = 0, p = 0; p < totalPixels; p += 1, i += 4) {
    const gray = toLuma(data[i] ?? 0, data[i + 1] ?? 0, data[i + 2] ?? 0);
    const value = options.invert ? 255 - gray : gray;
    luma[p] = value;
    histogram[value] += 1;
  }

  const { low, high } = computePercentileRange(histogram, totalPixels);
  const denom = high - low || 1;
  const output = Buffer.alloc(totalPixels * 4);
  for (let i = 0, p = 0; p < totalPixels; p += 1, i += 4) {
    const stretched = clampByte(Math.round(((luma[p] - low) * 255) / denom));
    const value = stretched > options.threshold ? 255 : 0;
    output[i] = value;
    output[i + 1] = value;
    output[i + 2] = value;
    output[i + 3] = 255;
  }
  return { raster: { width, height, data: output }, low, high };
};

const readSize = async (image: Buffer) => {
  const meta = await sharp(image).metadata();
  return { width: meta.width ?? 0, height: meta.height ?? 0 };
};

/**
 * Applies, in order: Lanczos upscale, median denoise, sharpen, binarization. Each
 * stage runs only when its option asks for it; the output is always a PNG.
 */
export const preprocessForOcr = async (
  image: Buffer,
  options: PreprocessOptions
): Promise<{ image: Buffer; meta: PreprocessMeta }> => {
  let current = image;
  let { width, height } = await readSize(current);
  const meta: PreprocessMeta = {
    width,
    height,
    scaled: false,
    median: null,
    sharpened: false,
    binarized: false,
    inverted: false
  };

  if (options.ocrScale > 1.0 && width > 0 && height > 0) {
    width = Math.max(1, Math.round(width * options.ocrScale));
    height = Math.max(1, Math.round(height * options.ocrScale));
    current = await sharp(current)
      .resize({ width, height, kernel: "lanczos3", fit: "fill" })
      .png()
      .toBuffer();
    meta.scaled = true;
  }

  if (options.medianFilter > 1) {
    current = await sharp(current).median(options.medianFilter).png().toBuffer();
    meta.median = options.medianFilter;
  }

  if (!options.sharpen && !options.preprocess) {
    return { image: current, meta: { ...meta, width, height } };
  }

  let raster = decodePng(current);
  if (options.sharpen) {
    raster = sharpenRaster(raster);
    meta.sharpened = true;
  }
  if (options.preprocess) {
    const binary = binarizeRaster(raster, { invert: options.invert, threshold: options.threshold });
    raster = binary.raster;
    meta.binarized = true;
    meta.inverted = options.invert;
    meta.low = binary.low;
    meta.high = binary.high;
  }
  return { image: encodePng(raster), meta: { ...meta, width: raster.width, height: raster.height } };
};
