import { describe, expect, it, vi } from "vitest";
import {
  FrameCapturer,
  cropDisplayImage,
  pickDisplay,
  unionRect,
  type ScreenDisplay,
  type ScreenGrabber
} from "../src/main/capture";
import { CaptureFailedError, EmptyRegionError } from "../src/shared/errors";
import type { Rect } from "../src/shared/types";
import { makePng, readPixel, readSize } from "./helpers";

const rect = (left: number, top: number, right: number, bottom: number): Rect => ({
  left,
  top,
  right,
  bottom
});

const displays: ScreenDisplay[] = [
  { id: "1", bounds: rect(0, 0, 40, 30) },
  { id: "2", bounds: rect(40, 0, 80, 30) }
];

const displayImage = (id: string) => makePng(40, 30, (x, y) => [x * 4, y * 4, id === "1" ? 0 : 255]);

const makeGrabber = () => ({
  listDisplays: async () => displays,
  grabDisplay: vi.fn(async (id: string) => displayImage(id))
});

describe("FrameCapturer", () => {
  it("crops the requested region out of the display", async () => {
    const grabber = makeGrabber();
    const frame = await new FrameCapturer(grabber).capture(rect(10, 5, 30, 25));

    expect(frame.rect).toEqual(rect(10, 5, 30, 25));
    expect(grabber.grabDisplay).toHaveBeenCalledWith("1");
    expect(readSize(frame.image)).toEqual({ width: 20, height: 20 });
    expect(readPixel(frame.image, 0, 0)).toEqual([40, 20, 0]);
  });

  it("captures from the display holding most of the region", async () => {
    const grabber = makeGrabber();
    const frame = await new FrameCapturer(grabber).capture(rect(30, 0, 60, 10));

    expect(grabber.grabDisplay).toHaveBeenCalledWith("2");
    expect(frame.rect).toEqual(rect(40, 0, 60, 10));
    expect(readSize(frame.image)).toEqual({ width: 20, height: 10 });
    expect(readPixel(frame.image, 0, 0)).toEqual([0, 0, 255]);
  });

  it("clamps a region hanging off the virtual screen", async () => {
    const frame = await new FrameCapturer(makeGrabber()).capture(rect(-10, -10, 5, 5));
    expect(frame.rect).toEqual(rect(0, 0, 5, 5));
    expect(readSize(frame.image)).toEqual({ width: 5, height: 5 });
  });

  it("rejects a region entirely off screen", async () => {
    await expect(new FrameCapturer(makeGrabber()).capture(rect(100, 100, 200, 200))).rejects.toBeInstanceOf(
      EmptyRegionError
    );
  });

  it("rejects a zero-width region without grabbing", async () => {
    const grabber = makeGrabber();
    await expect(new FrameCapturer(grabber).capture(rect(10, 0, 10, 10))).rejects.toBeInstanceOf(
      EmptyRegionError
    );
    expect(grabber.grabDisplay).not.toHaveBeenCalled();
  });

  it("wraps grab failures", async () => {
    const grabber: ScreenGrabber = {
      listDisplays: async () => displays,
      grabDisplay: async () => {
        throw new Error("access denied");
      }
    };
    await expect(new FrameCapturer(grabber).capture(rect(0, 0, 10, 10))).rejects.toBeInstanceOf(
      CaptureFailedError
    );
  });

  it("wraps display enumeration failures", async () => {
    const grabber: ScreenGrabber = {
      listDisplays: async () => {
        throw new Error("no session");
      },
      grabDisplay: async (id) => displayImage(id)
    };
    await expect(new FrameCapturer(grabber).capture(rect(0, 0, 10, 10))).rejects.toThrow(
      "Display enumeration failed: Error: no session"
    );
  });

  it("fails without any display", async () => {
    const grabber: ScreenGrabber = {
      listDisplays: async () => [],
      grabDisplay: async (id) => displayImage(id)
    };
    await expect(new FrameCapturer(grabber).capture(rect(0, 0, 10, 10))).rejects.toBeInstanceOf(
      CaptureFailedError
    );
  });
});

describe("display geometry", () => {
  it("unions display bounds", () => {
    expect(unionRect(displays.map((display) => display.bounds))).toEqual(rect(0, 0, 80, 30));
    expect(unionRect([])).toBeNull();
  });

  it("picks nothing when no display overlaps", () => {
    expect(pickDisplay(displays, rect(200, 200, 210, 210))).toBeNull();
  });

  it("rescales offsets on a high-density display", async () => {
    const image = makePng(40, 30, (x, y) => [x * 4, y * 4, 0]);
    const cropped = await cropDisplayImage(image, rect(0, 0, 20, 15), rect(5, 5, 10, 10));

    expect(readSize(cropped)).toEqual({ width: 10, height: 10 });
    expect(readPixel(cropped, 0, 0)).toEqual([40, 40, 0]);
  });
});
