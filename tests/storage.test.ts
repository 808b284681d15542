import { promises as fs } from "fs";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { saveScreenshots } from "../src/main/storage";
import { formatFileStamp, formatLocalTimestamp, toUnixSeconds } from "../src/shared/time";
import { makeTempDir, removeDir } from "./helpers";

describe("saveScreenshots", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("writes the captured and the processed frame side by side", async () => {
    const target = join(dir, "screenshots");
    const paths = await saveScreenshots(
      target,
      { capture: Buffer.from("raw"), ocr: Buffer.from("processed") },
      new Date(2024, 4, 1, 9, 3, 7)
    );

    expect(paths).toEqual([
      join(target, "capture_20240501_090307.png"),
      join(target, "ocr_20240501_090307.png")
    ]);
    expect(await fs.readFile(paths[0] ?? "", "utf-8")).toBe("raw");
    expect(await fs.readFile(paths[1] ?? "", "utf-8")).toBe("processed");
  });
});

describe("time helpers", () => {
  const at = new Date(2024, 0, 2, 3, 4, 5);

  it("formats local stamps", () => {
    expect(formatLocalTimestamp(at)).toBe("2024-01-02 03:04:05");
    expect(formatFileStamp(at)).toBe("20240102_030405");
  });

  it("floors to whole seconds", () => {
    expect(toUnixSeconds(1_700_000_000_999)).toBe(1_700_000_000);
  });
});
