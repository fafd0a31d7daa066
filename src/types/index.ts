import type { MixerErrorKind } from "../errors";

export interface StreamInfo {
  index: number; // absolute container stream index
  streamIndex: number; // audio-relative index (0, 1, 2...)
  codecName: string;
  sampleRate: number;
  channels: number;
  channelLayout?: string;
  language?: string;
  title?: string;
  duration?: number;
  displayName: string;
}

export type StreamFields = Omit<StreamInfo, "displayName">;

// audio-relative stream index -> volume multiplier (1.0 = unchanged)
export type VolumeMap = ReadonlyMap<number, number>;

export interface RawMetadata {
  streams: unknown[];
  format?: unknown;
}

export type BatchOutcome =
  | {
      status: "succeeded";
      inputPath: string;
      outputPath: string;
    }
  | {
      status: "failed";
      inputPath: string;
      error: string;
      kind: MixerErrorKind;
    };

export interface BatchSummary {
  succeeded: number;
  failed: Array<{ inputPath: string; error: string }>;
}

export interface StreamExtractor {
  extractAudioStreams(filePath: string): Promise<StreamInfo[]>;
}

export interface StreamMixer {
  mixAudioStreams(
    inputPath: string,
    outputPath: string,
    volumeMap: VolumeMap
  ): Promise<void>;
}

export interface FileDownloader {
  downloadFile(fileLink: string, destination: string): Promise<string>;
}

export interface VolumeAssignment {
  streamIndex: number;
  percent: number;
}

export interface VideoUpload {
  fileId: string;
  fileName: string;
}
