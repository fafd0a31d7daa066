import * as fsp from "fs/promises";
import * as path from "path";
import tmp, { type DirectoryResult } from "tmp-promise";
import { InvalidInputError } from "../errors";
import type { StreamInfo, VolumeMap } from "../types";
import {
  DEFAULT_VOLUME_PERCENT,
  toVolumeMap,
  validateVolumePercent,
} from "../utils/volume";

const UPLOADS_DIR = "uploads";

interface SourceVideo {
  path: string;
  name: string;
}

/**
 * State of one user's single-file mix: the uploaded video, its audio
 * streams, the chosen volumes and a private temp directory holding the
 * upload and the mixed output. Uploads live in their own subfolder so no
 * upload name can collide with the output. `dispose()` removes the directory.
 */
export class MixSession {
  public readonly createdAt = Date.now();
  public lastActivity = Date.now();

  private source?: SourceVideo;
  private streams: StreamInfo[] = [];
  private volumes = new Map<number, number>();
  private mixedOutput?: string;
  private disposed = false;

  private constructor(private readonly tempDir: DirectoryResult) {}

  static async create(): Promise<MixSession> {
    const tempDir = await tmp.dir({ prefix: "audio_mixer_", unsafeCleanup: true });
    await fsp.mkdir(path.join(tempDir.path, UPLOADS_DIR));
    return new MixSession(tempDir);
  }

  get directory(): string {
    return this.tempDir.path;
  }

  get sourcePath(): string | undefined {
    return this.source?.path;
  }

  get sourceName(): string | undefined {
    return this.source?.name;
  }

  get audioStreams(): readonly StreamInfo[] {
    return this.streams;
  }

  get mixedOutputPath(): string | undefined {
    return this.mixedOutput;
  }

  // Where an upload named `fileName` is stored inside the session
  filePath(fileName: string): string {
    return path.join(this.directory, UPLOADS_DIR, path.basename(fileName));
  }

  loadSource(filePath: string, fileName: string, streams: StreamInfo[]): void {
    this.source = { path: filePath, name: fileName };
    this.streams = [...streams];
    this.volumes = new Map<number, number>(
      streams.map((stream) => [stream.streamIndex, DEFAULT_VOLUME_PERCENT])
    );
    this.mixedOutput = undefined;
    this.touch();
  }

  setVolume(streamIndex: number, percent: number): void {
    if (!this.volumes.has(streamIndex)) {
      throw new InvalidInputError(`Unknown audio stream: ${streamIndex}`);
    }
    validateVolumePercent(percent);
    this.volumes.set(streamIndex, percent);
    this.touch();
  }

  getVolume(streamIndex: number): number | undefined {
    return this.volumes.get(streamIndex);
  }

  volumeMap(): VolumeMap {
    return toVolumeMap(this.volumes);
  }

  outputPath(): string {
    return path.join(this.directory, "mixed_output.mp4");
  }

  markMixed(outputPath: string): void {
    this.mixedOutput = outputPath;
    this.touch();
  }

  downloadName(): string {
    const stem = this.source ? path.parse(this.source.name).name : "video";
    return `${stem}_mixed.mp4`;
  }

  touch(): void {
    this.lastActivity = Date.now();
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    await this.tempDir.cleanup();
  }
}
