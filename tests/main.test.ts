import { promises as fs } from "fs";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { startRelay } from "../src/main/main";
import { fileExists, makeTempDir, removeDir } from "./helpers";

describe("startRelay", () => {
  let dir = "";

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("exits before touching control files when no endpoint is configured", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const configFile = join(dir, ".env");
    await fs.writeFile(configFile, "LINE_WINDOW_TITLE=LINE\nPOLL_SEC=1\n", "utf-8");

    await expect(startRelay({ configFile, env: {} })).resolves.toBe(1);

    expect(error).toHaveBeenCalledWith("[config] MissingEndpointError: WEBHOOK_URL is required. (exiting)");
    expect(await fileExists(join(dir, "ocr.pid"))).toBe(false);
    expect(await fileExists(join(dir, "ocr.status"))).toBe(false);
  });

  it("exits on an invalid setting", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const configFile = join(dir, ".env");
    await fs.writeFile(configFile, "WEBHOOK_URL=https://hooks.example.test/relay\nPOLL_SEC=-1\n", "utf-8");

    await expect(startRelay({ configFile, env: {} })).resolves.toBe(1);
    expect(String(error.mock.calls[0]?.[0])).toMatch(/^\[config\] ConfigError: Invalid configuration: POLL_SEC must be > 0/);
  });
});
