import ffmpeg, { type FfmpegCommand, type FilterSpecification } from "fluent-ffmpeg";
import { InvalidInputError, ProcessingError } from "../errors";
import type { StreamMixer, VolumeMap } from "../types";
import { Logger } from "../utils/logger";

export const AUDIO_CODEC = "aac";
export const AUDIO_BITRATE = "192k";
const MIXED_LABEL = "mixed";

export type CommandFactory = (inputPath: string) => FfmpegCommand;

export interface AudioFilterGraph {
  filters: FilterSpecification[];
  outputLabel: string;
}

/**
 * One `volume` branch per selected audio stream, in ascending stream order.
 * Several branches are combined with `amix`; normalisation is switched off
 * so the per-stream volumes come out exactly as configured.
 */
export function buildAudioFilterGraph(volumeMap: VolumeMap): AudioFilterGraph {
  if (volumeMap.size === 0) {
    throw new InvalidInputError("No audio streams to mix");
  }

  const entries = [...volumeMap.entries()].sort(([a], [b]) => a - b);
  for (const [streamIndex, volume] of entries) {
    if (!Number.isInteger(streamIndex) || streamIndex < 0) {
      throw new InvalidInputError(`Invalid audio stream index: ${streamIndex}`);
    }
    if (!Number.isFinite(volume)) {
      throw new InvalidInputError(
        `Invalid volume for stream ${streamIndex}: ${volume}`
      );
    }
  }

  const filters: FilterSpecification[] = entries.map(
    ([streamIndex, volume], branch) => ({
      filter: "volume",
      options: { volume },
      inputs: `0:a:${streamIndex}`,
      outputs: `a${branch}`,
    })
  );

  if (filters.length === 1) {
    return { filters, outputLabel: "a0" };
  }

  filters.push({
    filter: "amix",
    options: { inputs: entries.length, duration: "longest", normalize: 0 },
    inputs: entries.map((_, branch) => `a${branch}`),
    outputs: MIXED_LABEL,
  });
  return { filters, outputLabel: MIXED_LABEL };
}

export class AudioMixService implements StreamMixer {
  private logger = new Logger("AudioMixService");

  constructor(
    private readonly createCommand: CommandFactory = (inputPath) =>
      ffmpeg(inputPath)
  ) {}

  async mixAudioStreams(
    inputPath: string,
    outputPath: string,
    volumeMap: VolumeMap
  ): Promise<void> {
    const graph = buildAudioFilterGraph(volumeMap);

    this.logger.log(
      `Mixing ${volumeMap.size} audio stream(s) from ${inputPath} into ${outputPath}`
    );

    return new Promise((resolve, reject) => {
      this.createCommand(inputPath)
        .complexFilter(graph.filters, graph.outputLabel)
        // video is copied as-is; -y overwrites an existing output
        .outputOptions(["-map 0:v", "-y"])
        .videoCodec("copy")
        .audioCodec(AUDIO_CODEC)
        .audioBitrate(AUDIO_BITRATE)
        .on("start", (commandLine: string) => {
          this.logger.log("FFmpeg started with command:", commandLine);
        })
        .on("end", () => {
          this.logger.log(`FFmpeg mix completed: ${outputPath}`);
          resolve();
        })
        .on(
          "error",
          (error: Error, _stdout: string | null, stderr: string | null) => {
            const diagnostics = stderr?.trim() || error.message;
            this.logger.error("FFmpeg error:", error.message);
            reject(new ProcessingError(diagnostics));
          }
        )
        .save(outputPath);
    });
  }
}
