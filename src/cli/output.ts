/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from "chalk";

export function printSuccess(message: string): void {
  console.log(chalk.green("✓"), message);
}

export function printError(message: string): void {
  console.error(chalk.red("✗"), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow("!"), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue("i"), message);
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ":")} ${value}`);
}

export function formatProgressBar(
  current: number,
  total: number,
  width: number = 40
): string {
  const ratio = total > 0 ? Math.min(current / total, 1) : 1;
  const filled = Math.floor(width * ratio);
  const bar = "=".repeat(filled) + "-".repeat(width - filled);
  return `[${bar}] ${current}/${total} (${Math.round(ratio * 100)}%)`;
}

export function formatDuration(seconds: number | undefined): string {
  if (seconds === undefined) return "unknown";
  const total = Math.round(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  const mmss = `${String(minutes).padStart(2, "0")}:${String(secs).padStart(2, "0")}`;
  return hours > 0 ? `${hours}:${mmss}` : mmss;
}
