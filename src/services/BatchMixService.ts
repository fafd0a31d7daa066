import * as fsp from "fs/promises";
import * as path from "path";
import { NoAudioStreamsError, toMixerError } from "../errors";
import { DEFAULT_VIDEO_EXTENSIONS, findVideoFiles } from "../file-discovery";
import type {
  BatchOutcome,
  BatchSummary,
  StreamExtractor,
  StreamMixer,
} from "../types";
import { Logger } from "../utils/logger";
import { AudioMixService } from "./AudioMixService";
import { MediaProbeService } from "./MediaProbeService";

// Output is always AAC in MP4, whatever the source container was
export function mirrorOutputPath(
  sourceFolder: string,
  outputFolder: string,
  inputPath: string
): string {
  const relative = path.parse(path.relative(sourceFolder, inputPath));
  return path.join(outputFolder, relative.dir, `${relative.name}.mp4`);
}

export function defaultOutputFolder(sourceFolder: string): string {
  const resolved = path.resolve(sourceFolder);
  return path.join(path.dirname(resolved), `${path.basename(resolved)}_mixed`);
}

export function summarizeOutcomes(outcomes: Iterable<BatchOutcome>): BatchSummary {
  const summary: BatchSummary = { succeeded: 0, failed: [] };
  for (const outcome of outcomes) {
    if (outcome.status === "succeeded") {
      summary.succeeded++;
    } else {
      summary.failed.push({ inputPath: outcome.inputPath, error: outcome.error });
    }
  }
  return summary;
}

export class BatchMixService {
  private logger = new Logger("BatchMixService");

  constructor(
    private readonly extractor: StreamExtractor = new MediaProbeService(),
    private readonly mixer: StreamMixer = new AudioMixService()
  ) {}

  /**
   * Mixes every video under `sourceFolder` at 100% volume per stream.
   * Files are processed one at a time, only as the caller pulls the next
   * outcome; a failed file is reported and the batch moves on.
   */
  async *batchMixFolder(
    sourceFolder: string,
    outputFolder: string,
    extensions: readonly string[] = DEFAULT_VIDEO_EXTENSIONS
  ): AsyncGenerator<BatchOutcome, void, undefined> {
    const videoFiles = await findVideoFiles(sourceFolder, extensions);
    this.logger.log(
      `Batch of ${videoFiles.length} file(s) from ${sourceFolder} to ${outputFolder}`
    );

    for (const inputPath of videoFiles) {
      yield await this.processFile(sourceFolder, outputFolder, inputPath);
    }
  }

  private async processFile(
    sourceFolder: string,
    outputFolder: string,
    inputPath: string
  ): Promise<BatchOutcome> {
    try {
      const outputPath = mirrorOutputPath(sourceFolder, outputFolder, inputPath);
      await fsp.mkdir(path.dirname(outputPath), { recursive: true });

      const streams = await this.extractor.extractAudioStreams(inputPath);
      if (streams.length === 0) {
        throw new NoAudioStreamsError();
      }

      const volumeMap = new Map<number, number>(
        streams.map((stream) => [stream.streamIndex, 1.0])
      );
      await this.mixer.mixAudioStreams(inputPath, outputPath, volumeMap);

      this.logger.log(`Processed ${inputPath} -> ${outputPath}`);
      return { status: "succeeded", inputPath, outputPath };
    } catch (error) {
      const failure = toMixerError(error);
      this.logger.error(`Failed to process ${inputPath}:`, failure.message);
      return {
        status: "failed",
        inputPath,
        error: failure.message,
        kind: failure.kind,
      };
    }
  }
}
