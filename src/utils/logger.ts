export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const settings: { level: LogLevel; timeZone: string } = {
  level: "info",
  timeZone: "UTC",
};

export function configureLogger(options: {
  level?: LogLevel;
  timeZone?: string;
}): void {
  if (options.level) settings.level = options.level;
  if (options.timeZone) settings.timeZone = options.timeZone;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

// Timestamps using Intl.DateTimeFormat in the configured zone
export const getTimestamp = (date: Date = new Date()): string => {
  let formatter: Intl.DateTimeFormat;
  try {
    formatter = new Intl.DateTimeFormat("en-GB", {
      timeZone: settings.timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
  } catch (error) {
    // unknown zone name
    settings.timeZone = "UTC";
    return getTimestamp(date);
  }

  const parts = formatter.formatToParts(date);
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? "00";
  return `${part("year")}-${part("month")}-${part("day")} ${part("hour")}:${part("minute")}:${part("second")} ${settings.timeZone}`;
};

export class Logger {
  constructor(private readonly context: string) {}

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled("debug")) {
      console.debug(this.prefix(), message, ...args);
    }
  }

  log(message: string, ...args: unknown[]): void {
    if (this.enabled("info")) {
      console.log(this.prefix(), message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled("warn")) {
      console.warn(this.prefix(), message, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled("error")) {
      console.error(this.prefix(), message, ...args);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[settings.level];
  }

  private prefix(): string {
    return `[${getTimestamp()}] [${this.context}]`;
  }
}
