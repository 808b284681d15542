#!/usr/bin/env node
import { Command } from "commander";
import { formatError } from "../shared/errors";
import { formatCropRect, loadControlSettings, parseCropRect, setConfigValue } from "./config";
import { isAlive, readStatus, requestStop } from "./control";
import { startRelay } from "./main";

const program = new Command();

program
  .name("screen-chat-relay")
  .description("Relay text recognized in a chat window region to a webhook")
  .option("-c, --config <file>", "key/value config store", process.env.ENV_FILE ?? ".env");

const configFile = () => program.opts<{ config: string }>().config;

program
  .command("run", { isDefault: true })
  .description("start the capture loop (exit code 0 on clean stop)")
  .action(async () => {
    process.exitCode = await startRelay({ configFile: configFile(), env: process.env });
  });

program
  .command("status")
  .description("report whether a loop process is alive")
  .action(async () => {
    const settings = await loadControlSettings({ file: configFile(), env: process.env });
    const status = await readStatus(settings.control.statusFile);
    const alive = isAlive(status, settings.heartbeatSec);
    console.log(alive ? "running" : "stopped");
    if (status.timestamp !== null) {
      console.log(`last update: ${new Date(status.timestamp * 1000).toISOString()} (${status.state})`);
    }
    process.exitCode = alive ? 0 : 3;
  });

program
  .command("stop")
  .description("ask a running loop to stop at its next iteration")
  .action(async () => {
    const settings = await loadControlSettings({ file: configFile(), env: process.env });
    await requestStop(settings.control.stopFile);
    console.log(`stop requested: ${settings.control.stopFile}`);
  });

program
  .command("set-crop")
  .description("store a capture rectangle as left,top,right,bottom")
  .argument("<rect>", "left,top,right,bottom")
  .option("-m, --mode <mode>", "relative (client area) or absolute (screen)")
  .action(async (rectArg: string, options: { mode?: string }) => {
    const rect = parseCropRect(rectArg);
    if (!rect || rect.right <= rect.left || rect.bottom <= rect.top) {
      throw new Error(`Invalid rectangle "${rectArg}"; expected four integers left,top,right,bottom.`);
    }
    const mode = options.mode?.trim().toLowerCase();
    if (mode !== undefined && mode !== "relative" && mode !== "absolute") {
      throw new Error(`Invalid crop mode "${options.mode}"; expected relative or absolute.`);
    }
    await setConfigValue(configFile(), "CROP_RECT", formatCropRect(rect));
    if (mode) {
      await setConfigValue(configFile(), "CROP_MODE", mode);
    }
    console.log(`CROP_RECT=${formatCropRect(rect)}${mode ? ` CROP_MODE=${mode}` : ""}`);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(formatError(error));
  process.exitCode = 1;
});
