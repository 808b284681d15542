import { InvalidRegionError, WindowNotFoundError } from "../shared/errors";
import type { CaptureConfig, Rect, WindowInfo } from "../shared/types";
import type { WindowSystem } from "./windows";

export type WindowHandle = {
  id: string;
  title: string;
  /** Listing the window was located from. */
  info: WindowInfo;
};

export const rectWidth = (rect: Rect) => rect.right - rect.left;
export const rectHeight = (rect: Rect) => rect.bottom - rect.top;
export const rectArea = (rect: Rect) => Math.max(0, rectWidth(rect)) * Math.max(0, rectHeight(rect));

// A minimized window reports its iconic rect, so rank it by where it will be restored.
const restoredArea = (win: WindowInfo) => rectArea(win.minimized && win.normal ? win.normal : win.outer);

const clamp = (value: number, min: number, max: number) => Math.max(min, Math.min(value, max));

/**
 * Intersects `rect` with `bounds`. The result may be degenerate (zero or negative
 * size) when they do not overlap; callers decide how to treat that.
 */
export const clampRect = (rect: Rect, bounds: Rect): Rect => ({
  left: clamp(rect.left, bounds.left, bounds.right),
  top: clamp(rect.top, bounds.top, bounds.bottom),
  right: clamp(rect.right, bounds.left, bounds.right),
  bottom: clamp(rect.bottom, bounds.top, bounds.bottom)
});

/**
 * Maps a crop given as offsets inside the client area onto screen coordinates.
 * The origin is kept inside the client area and the extent at least one pixel
 * past it, so the result never leaves `client`.
 */
export const resolveRelativeCrop = (crop: Rect, client: Rect): Rect => {
  const width = rectWidth(client);
  const height = rectHeight(client);
  if (width <= 0 || height <= 0) {
    throw new InvalidRegionError(`Client area is empty (${width}x${height}).`);
  }
  const left = clamp(crop.left, 0, width - 1);
  const top = clamp(crop.top, 0, height - 1);
  const right = clamp(crop.right, left + 1, width);
  const bottom = clamp(crop.bottom, top + 1, height);
  return {
    left: client.left + left,
    top: client.top + top,
    right: client.left + right,
    bottom: client.top + bottom
  };
};

export const needsWindow = (config: Pick<CaptureConfig, "cropMode" | "cropRect">) =>
  !(config.cropMode === "absolute" && config.cropRect !== null);

export class CoordinateResolver {
  constructor(private readonly windows: WindowSystem) {}

  /**
   * Finds a visible window whose title contains `title`. With several matches the
   * largest one wins, so small tool or child windows sharing the name are skipped.
   */
  async locateWindow(title: string): Promise<WindowHandle> {
    const matches = (await this.windows.listWindows()).filter((win) => win.title.includes(title));
    if (matches.length === 0) {
      throw new WindowNotFoundError(title);
    }
    const best = matches.reduce((current, candidate) =>
      restoredArea(candidate) > restoredArea(current) ? candidate : current
    );
    return { id: best.id, title: best.title, info: best };
  }

  async outerRect(handle: WindowHandle): Promise<Rect> {
    return (await this.inspect(handle)).outer;
  }

  async clientRect(handle: WindowHandle): Promise<Rect> {
    return (await this.inspect(handle)).client;
  }

  async resolveCaptureRect(config: CaptureConfig, handle: WindowHandle | null): Promise<Rect> {
    if (config.cropMode === "absolute" && config.cropRect) {
      return { ...config.cropRect };
    }
    if (!handle) {
      throw new InvalidRegionError("A window is required to resolve a relative capture region.");
    }
    const client = await this.clientRect(handle);
    if (!config.cropRect) {
      if (rectWidth(client) <= 0 || rectHeight(client) <= 0) {
        throw new InvalidRegionError("Client area is empty.");
      }
      return client;
    }
    return resolveRelativeCrop(config.cropRect, client);
  }

  private async inspect(handle: WindowHandle): Promise<WindowInfo> {
    if (!handle.info.minimized) {
      return handle.info;
    }
    await this.windows.restore(handle.id);
    handle.info = await this.find(handle);
    return handle.info;
  }

  private async find(handle: WindowHandle): Promise<WindowInfo> {
    const info = (await this.windows.listWindows()).find((win) => win.id === handle.id);
    if (!info) {
      throw new WindowNotFoundError(handle.title);
    }
    return info;
  }
}
