import ffmpeg from "fluent-ffmpeg";
import ffprobeStatic from "ffprobe-static";
import { Logger } from "./logger";

const logger = new Logger("FFmpeg");

export interface FfmpegBinaries {
  ffmpegPath: string;
  ffprobePath: string;
}

// Explicit paths win, then the bundled ffprobe, then whatever is on PATH
export function resolveFfmpegBinaries(overrides: {
  ffmpegPath?: string;
  ffprobePath?: string;
}): FfmpegBinaries {
  return {
    ffmpegPath: overrides.ffmpegPath || "ffmpeg",
    ffprobePath: overrides.ffprobePath || ffprobeStatic.path || "ffprobe",
  };
}

export function configureFfmpeg(binaries: FfmpegBinaries): void {
  ffmpeg.setFfmpegPath(binaries.ffmpegPath);
  ffmpeg.setFfprobePath(binaries.ffprobePath);

  logger.log(
    `FFmpeg configured with paths: ${binaries.ffmpegPath}, ${binaries.ffprobePath}`
  );
}
