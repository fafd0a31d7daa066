#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Probe, mix and batch-mix video audio streams from the terminal.
 */

import "dotenv/config";
import { Command } from "commander";
import { loadConfig } from "../config";
import { toMixerError } from "../errors";
import { configureFfmpeg, resolveFfmpegBinaries } from "../utils/ffmpeg";
import { configureLogger } from "../utils/logger";
import { batchCommand } from "./commands/batch";
import { mixCommand } from "./commands/mix";
import { probeCommand } from "./commands/probe";
import { printError } from "./output";

const program = new Command();

program
  .name("video-audio-mixer")
  .description("Mix the audio streams of video files into a single track")
  .version("1.0.0")
  .option("--verbose", "Show log output")
  .option("--debug", "Enable debug output")
  .hook("preAction", () => {
    const config = loadConfig();
    const { verbose, debug } = program.opts<{ verbose?: boolean; debug?: boolean }>();
    configureLogger({
      // logs would break the progress bar, so they are opt-in here
      level: debug ? "debug" : verbose ? "info" : "silent",
      timeZone: config.logTimezone,
    });
    configureFfmpeg(resolveFfmpegBinaries(config));
  });

program
  .command("probe")
  .description("List the audio streams of a video file")
  .argument("<file>", "Video file to inspect")
  .action(probeCommand);

program
  .command("mix")
  .description("Mix the audio streams of one video into a single AAC track")
  .argument("<input>", "Source video")
  .argument("<output>", "Output video (overwritten if present)")
  .option(
    "-v, --volume <assignment...>",
    "Stream volume as <stream>=<percent>, 0-200 in steps of 5 (default 100)"
  )
  .action(mixCommand);

program
  .command("batch")
  .description("Mix every video under a folder at default volumes")
  .argument("<folder>", "Folder to scan recursively")
  .option("-o, --output <dir>", "Output folder (default: <folder>_mixed)")
  .option("-e, --ext <list>", "Comma-separated extensions", ".mp4,.mkv")
  .option("-y, --yes", "Skip the confirmation prompt")
  .action(batchCommand);

program.parseAsync(process.argv).catch((error) => {
  printError(toMixerError(error).message);
  process.exit(1);
});
