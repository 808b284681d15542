import screenshotDesktop from "screenshot-desktop";
import sharp from "sharp";
import { CaptureFailedError, EmptyRegionError, formatError } from "../shared/errors";
import type { Rect } from "../shared/types";
import { clampRect, rectArea, rectHeight, rectWidth } from "./coordinates";

export type ScreenDisplay = {
  id: string;
  bounds: Rect;
};

export interface ScreenGrabber {
  listDisplays(): Promise<ScreenDisplay[]>;
  /** PNG of the whole display. */
  grabDisplay(id: string): Promise<Buffer>;
}

type ScreenshotDisplay = {
  id: string | number;
  left?: number;
  top?: number;
  right?: number;
  bottom?: number;
  width?: number;
  height?: number;
};

const toDisplayBounds = (display: ScreenshotDisplay): Rect => {
  const left = display.left ?? 0;
  const top = display.top ?? 0;
  const width =
    typeof display.width === "number" ? display.width : Math.abs((display.right ?? left) - left);
  const height =
    typeof display.height === "number" ? display.height : Math.abs((display.bottom ?? top) - top);
  return { left, top, right: left + width, bottom: top + height };
};

export class DesktopScreenGrabber implements ScreenGrabber {
  async listDisplays(): Promise<ScreenDisplay[]> {
    const displays: ScreenshotDisplay[] = await screenshotDesktop.listDisplays();
    return displays.map((display) => ({
      id: String(display.id),
      bounds: toDisplayBounds(display)
    }));
  }

  async grabDisplay(id: string): Promise<Buffer> {
    return screenshotDesktop({ screen: id, format: "png" });
  }
}

export const unionRect = (rects: Rect[]): Rect | null => {
  if (rects.length === 0) {
    return null;
  }
  return rects.reduce((acc, rect) => ({
    left: Math.min(acc.left, rect.left),
    top: Math.min(acc.top, rect.top),
    right: Math.max(acc.right, rect.right),
    bottom: Math.max(acc.bottom, rect.bottom)
  }));
};

const overlapArea = (a: Rect, b: Rect) => {
  const clipped = clampRect(a, b);
  return rectWidth(clipped) > 0 && rectHeight(clipped) > 0 ? rectArea(clipped) : 0;
};

export const pickDisplay = (displays: ScreenDisplay[], rect: Rect): ScreenDisplay | null => {
  let best: ScreenDisplay | null = null;
  let bestArea = 0;
  for (const display of displays) {
    const area = overlapArea(rect, display.bounds);
    if (area > bestArea) {
      best = display;
      bestArea = area;
    }
  }
  return best;
};

export type CapturedFrame = {
  image: Buffer;
  rect: Rect;
};

export class FrameCapturer {
  constructor(private readonly grabber: ScreenGrabber) {}

  async capture(rect: Rect): Promise<CapturedFrame> {
    const displays = await this.listDisplays();
    const virtualBounds = unionRect(displays.map((display) => display.bounds));
    if (!virtualBounds) {
      throw new CaptureFailedError("No displays available.");
    }
    const clamped = clampRect(rect, virtualBounds);
    if (rectWidth(clamped) <= 0 || rectHeight(clamped) <= 0) {
      throw new EmptyRegionError(
        `Capture region ${rect.left},${rect.top},${rect.right},${rect.bottom} is outside the virtual display.`
      );
    }
    const display = pickDisplay(displays, clamped);
    if (!display) {
      throw new EmptyRegionError("Capture region does not overlap any display.");
    }
    const target = clampRect(clamped, display.bounds);

    try {
      const full = await this.grabber.grabDisplay(display.id);
      const image = await cropDisplayImage(full, display.bounds, target);
      return { image, rect: target };
    } catch (error: unknown) {
      throw new CaptureFailedError(`Screen capture failed: ${formatError(error)}`);
    }
  }

  private async listDisplays(): Promise<ScreenDisplay[]> {
    try {
      return await this.grabber.listDisplays();
    } catch (error: unknown) {
      throw new CaptureFailedError(`Display enumeration failed: ${formatError(error)}`);
    }
  }
}

/**
 * Crops a screen-absolute rectangle out of one display's screenshot. The image may
 * be larger than the logical display bounds on scaled monitors, so the offsets are
 * rescaled to the image size.
 */
export const cropDisplayImage = async (
  displayImage: Buffer,
  displayBounds: Rect,
  rect: Rect
): Promise<Buffer> => {
  const meta = await sharp(displayImage).metadata();
  const imageWidth = meta.width ?? 0;
  const imageHeight = meta.height ?? 0;
  if (!imageWidth || !imageHeight) {
    throw new Error("Unable to read display image size.");
  }
  const scaleX = imageWidth / Math.max(1, rectWidth(displayBounds));
  const scaleY = imageHeight / Math.max(1, rectHeight(displayBounds));
  const left = Math.min(imageWidth - 1, Math.max(0, Math.round((rect.left - displayBounds.left) * scaleX)));
  const top = Math.min(imageHeight - 1, Math.max(0, Math.round((rect.top - displayBounds.top) * scaleY)));
  const width = Math.max(1, Math.min(Math.round(rectWidth(rect) * scaleX), imageWidth - left));
  const height = Math.max(1, Math.min(Math.round(rectHeight(rect) * scaleY), imageHeight - top));
  return sharp(displayImage).extract({ left, top, width, height }).png().toBuffer();
};
