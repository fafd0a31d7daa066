/**
 * Batch Command
 *
 * Mix every video under a folder at default volumes, mirroring the
 * folder layout into an output folder.
 */

import chalk from "chalk";
import * as path from "path";
import { createInterface } from "readline/promises";
import {
  DEFAULT_VIDEO_EXTENSIONS,
  findVideoFiles,
  isDirectory,
  normalizeExtensions,
} from "../../file-discovery";
import {
  BatchMixService,
  defaultOutputFolder,
  summarizeOutcomes,
} from "../../services/BatchMixService";
import type { BatchOutcome } from "../../types";
import {
  formatProgressBar,
  printError,
  printHeader,
  printInfo,
  printKeyValue,
  printSuccess,
  printWarning,
} from "../output";

interface BatchOptions {
  output?: string;
  ext?: string;
  yes?: boolean;
}

export function parseExtensionList(value: string | undefined): string[] {
  if (!value) return [...DEFAULT_VIDEO_EXTENSIONS];
  const extensions = normalizeExtensions(value.split(","));
  return extensions.length ? extensions : [...DEFAULT_VIDEO_EXTENSIONS];
}

export function isConfirmation(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "" || normalized === "y" || normalized === "yes";
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return isConfirmation(await rl.question(question));
  } finally {
    rl.close();
  }
}

export async function batchCommand(
  folder: string,
  options: BatchOptions
): Promise<void> {
  const source = path.resolve(folder);
  if (!(await isDirectory(source))) {
    printError(`Invalid folder path: ${source}`);
    process.exitCode = 1;
    return;
  }

  const extensions = parseExtensionList(options.ext);
  printInfo("Scanning for video files...");
  const videoFiles = await findVideoFiles(source, extensions);

  if (videoFiles.length === 0) {
    printWarning(
      `No video files (${extensions.join(", ")}) found in this folder.`
    );
    process.exitCode = 1;
    return;
  }

  const output = options.output
    ? path.resolve(options.output)
    : defaultOutputFolder(source);

  printHeader(`Found ${videoFiles.length} video file(s)`);
  for (const file of videoFiles) {
    console.log(`  - ${path.relative(source, file)}`);
  }
  console.log();
  printKeyValue("Source", source);
  printKeyValue("Output", output);
  console.log();

  if (!options.yes && !(await confirm("Proceed with batch processing? [Y/n]: "))) {
    printInfo("Cancelled.");
    return;
  }

  const outcomes: BatchOutcome[] = [];
  const batch = new BatchMixService();
  for await (const outcome of batch.batchMixFolder(source, output, extensions)) {
    outcomes.push(outcome);
    process.stdout.write(`\r${formatProgressBar(outcomes.length, videoFiles.length)}`);
  }
  process.stdout.write("\n");

  const summary = summarizeOutcomes(outcomes);
  printHeader("Complete!");
  printKeyValue("Succeeded", summary.succeeded);
  printKeyValue("Failed", summary.failed.length);
  printKeyValue("Output", output);

  if (summary.failed.length === 0) {
    printSuccess(`All ${summary.succeeded} files processed successfully!`);
    return;
  }

  printHeader("Errors");
  for (const failure of summary.failed) {
    printError(
      `${chalk.bold(path.relative(source, failure.inputPath))}: ${failure.error}`
    );
  }
  process.exitCode = 1;
}
