import { isLogLevel, type LogLevel } from "./utils/logger";

export interface MixerConfig {
  telegramToken?: string;
  telegramApiRoot?: string;
  telegramFilesDir: string;
  ffmpegPath?: string;
  ffprobePath?: string;
  sessionMaxAgeHours: number;
  logLevel: LogLevel;
  logTimezone: string;
}

const DEFAULT_FILES_DIR = "/var/lib/telegram-bot-api";

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MixerConfig {
  const logLevel = env.LOG_LEVEL?.trim().toLowerCase() ?? "";

  return {
    telegramToken: optional(env.TELEGRAM_TOKEN),
    telegramApiRoot: optional(env.LOCAL_TELEGRAM_API_ROOT),
    telegramFilesDir:
      optional(env.LOCAL_TELEGRAM_FILES_DIR) ??
      (env.NODE_ENV === "development"
        ? "../telegram-bot-api"
        : DEFAULT_FILES_DIR),
    ffmpegPath: optional(env.FFMPEG_PATH),
    ffprobePath: optional(env.FFPROBE_PATH),
    sessionMaxAgeHours: positiveNumber(env.SESSION_MAX_AGE_HOURS, 24),
    logLevel: isLogLevel(logLevel) ? logLevel : "info",
    logTimezone: optional(env.LOG_TIMEZONE) ?? "UTC",
  };
}

function optional(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function positiveNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return value !== undefined && Number.isFinite(parsed) && parsed > 0
    ? parsed
    : fallback;
}
