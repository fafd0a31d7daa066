import ffmpeg, { type FfprobeData } from "fluent-ffmpeg";
import { ProbeError } from "../errors";
import type { RawMetadata, StreamExtractor, StreamInfo } from "../types";
import { Logger } from "../utils/logger";
import { createStreamInfo } from "../utils/streamLabel";

export type Prober = (filePath: string) => Promise<RawMetadata>;

export const runFfprobe: Prober = (filePath) =>
  new Promise((resolve, reject) => {
    ffmpeg.ffprobe(filePath, (err: unknown, metadata: FfprobeData) => {
      if (err) {
        reject(err);
        return;
      }
      resolve({ streams: metadata.streams, format: metadata.format });
    });
  });

export class MediaProbeService implements StreamExtractor {
  private logger = new Logger("MediaProbeService");

  constructor(private readonly prober: Prober = runFfprobe) {}

  async probe(filePath: string): Promise<RawMetadata> {
    try {
      return await this.prober(filePath);
    } catch (error) {
      const diagnostics =
        error instanceof Error ? error.message.trim() : String(error);
      this.logger.error(`Failed to probe ${filePath}:`, diagnostics);
      throw new ProbeError(diagnostics || "Unknown error");
    }
  }

  async extractAudioStreams(filePath: string): Promise<StreamInfo[]> {
    const metadata = await this.probe(filePath);
    const audioStreams: StreamInfo[] = [];

    metadata.streams.forEach((stream, position) => {
      if (!isRecord(stream) || stream.codec_type !== "audio") {
        return;
      }
      const tags = isRecord(stream.tags) ? stream.tags : {};

      audioStreams.push(
        createStreamInfo({
          index: readInteger(stream.index) ?? position,
          streamIndex: audioStreams.length,
          codecName: readText(stream.codec_name) ?? "unknown",
          sampleRate: readInteger(stream.sample_rate) ?? 0,
          channels: readInteger(stream.channels) ?? 0,
          channelLayout: readText(stream.channel_layout),
          language: readText(tags.language),
          title: readText(tags.title),
          duration: readNumber(stream.duration),
        })
      );
    });

    this.logger.debug(
      `Found ${audioStreams.length} audio stream(s) in ${filePath}`
    );
    return audioStreams;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ffprobe reports "N/A" for unknown values
function readNumber(value: unknown): number | undefined {
  const parsed =
    typeof value === "number"
      ? value
      : typeof value === "string" && value.trim() !== ""
      ? Number(value)
      : NaN;
  return Number.isFinite(parsed) ? parsed : undefined;
}

function readInteger(value: unknown): number | undefined {
  const parsed = readNumber(value);
  return parsed === undefined ? undefined : Math.trunc(parsed);
}

function readText(value: unknown): string | undefined {
  if (typeof value === "number") {
    return String(value);
  }
  return typeof value === "string" && value !== "" && value !== "N/A"
    ? value
    : undefined;
}
