import "dotenv/config";
import tmp from "tmp-promise";
import { loadConfig } from "./config";
import { MixerBotService } from "./services/MixerBotService";
import { configureFfmpeg, resolveFfmpegBinaries } from "./utils/ffmpeg";
import { configureLogger, Logger } from "./utils/logger";

// Temporary directory setup
tmp.setGracefulCleanup();

const logger = new Logger("Main");

async function main() {
  const config = loadConfig();
  configureLogger({ level: config.logLevel, timeZone: config.logTimezone });

  const token = config.telegramToken;
  if (!token) {
    logger.error("TELEGRAM_TOKEN environment variable is required");
    process.exit(1);
  }

  configureFfmpeg(resolveFfmpegBinaries(config));

  const botService = new MixerBotService(token, config);

  // Graceful shutdown; launch() only resolves once polling stops
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      logger.log(`Received ${signal}, shutting down gracefully...`);
      botService.stop(signal).catch((error) => {
        logger.error("Shutdown failed:", error);
        process.exitCode = 1;
      });
    });
  }

  await botService.launch();
}

main().catch((error) => {
  logger.error("Failed to start bot:", error);
  process.exit(1);
});
