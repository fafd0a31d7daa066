import { describe, expect, it, vi } from "vitest";
import type { FfmpegCommand } from "fluent-ffmpeg";
import { InvalidInputError, ProcessingError } from "../src/errors";
import {
  AudioMixService,
  buildAudioFilterGraph,
} from "../src/services/AudioMixService";

type Listener = (...args: unknown[]) => void;

// Records the calls AudioMixService makes and finishes like ffmpeg would
class FakeCommand {
  calls: Array<[string, ...unknown[]]> = [];
  private listeners = new Map<string, Listener>();

  constructor(private readonly outcome: { stderr?: string } = {}) {}

  complexFilter(...args: unknown[]) {
    this.calls.push(["complexFilter", ...args]);
    return this;
  }
  outputOptions(...args: unknown[]) {
    this.calls.push(["outputOptions", ...args]);
    return this;
  }
  videoCodec(...args: unknown[]) {
    this.calls.push(["videoCodec", ...args]);
    return this;
  }
  audioCodec(...args: unknown[]) {
    this.calls.push(["audioCodec", ...args]);
    return this;
  }
  audioBitrate(...args: unknown[]) {
    this.calls.push(["audioBitrate", ...args]);
    return this;
  }
  on(event: string, listener: Listener) {
    this.listeners.set(event, listener);
    return this;
  }
  save(outputPath: string) {
    this.calls.push(["save", outputPath]);
    setImmediate(() => {
      this.listeners.get("start")?.("ffmpeg -i input.mkv ...");
      if (this.outcome.stderr === undefined) {
        this.listeners.get("end")?.(null, "");
      } else {
        this.listeners.get("error")?.(
          new Error("ffmpeg exited with code 1"),
          "",
          this.outcome.stderr
        );
      }
    });
    return this;
  }
}

function serviceWith(command: FakeCommand) {
  const factory = vi.fn((_input: string) => command as unknown as FfmpegCommand);
  return { factory, service: new AudioMixService(factory) };
}

describe("buildAudioFilterGraph", () => {
  it("rejects an empty volume map", () => {
    expect(() => buildAudioFilterGraph(new Map())).toThrow(InvalidInputError);
    expect(() => buildAudioFilterGraph(new Map())).toThrow(
      "No audio streams to mix"
    );
  });

  it("uses the single volume branch directly as the output", () => {
    expect(buildAudioFilterGraph(new Map([[1, 0.5]]))).toEqual({
      filters: [
        {
          filter: "volume",
          options: { volume: 0.5 },
          inputs: "0:a:1",
          outputs: "a0",
        },
      ],
      outputLabel: "a0",
    });
  });

  it("sorts branches by stream index and mixes them without normalisation", () => {
    const graph = buildAudioFilterGraph(
      new Map([
        [2, 1.5],
        [0, 1],
      ])
    );

    expect(graph.outputLabel).toBe("mixed");
    expect(graph.filters).toEqual([
      { filter: "volume", options: { volume: 1 }, inputs: "0:a:0", outputs: "a0" },
      { filter: "volume", options: { volume: 1.5 }, inputs: "0:a:2", outputs: "a1" },
      {
        filter: "amix",
        options: { inputs: 2, duration: "longest", normalize: 0 },
        inputs: ["a0", "a1"],
        outputs: "mixed",
      },
    ]);
  });

  it("accepts volumes outside the slider range", () => {
    const graph = buildAudioFilterGraph(new Map([[0, 3]]));
    expect(graph.filters[0].options).toEqual({ volume: 3 });
  });

  it("rejects non-finite volumes and negative stream indices", () => {
    expect(() => buildAudioFilterGraph(new Map([[0, NaN]]))).toThrow(
      "Invalid volume for stream 0: NaN"
    );
    expect(() => buildAudioFilterGraph(new Map([[-1, 1]]))).toThrow(
      "Invalid audio stream index: -1"
    );
  });
});

describe("AudioMixService", () => {
  it("copies video, encodes AAC at 192k and overwrites the output", async () => {
    const command = new FakeCommand();
    const { service, factory } = serviceWith(command);

    await service.mixAudioStreams(
      "/in/movie.mkv",
      "/out/movie.mp4",
      new Map([
        [0, 1],
        [1, 0.25],
      ])
    );

    expect(factory).toHaveBeenCalledWith("/in/movie.mkv");
    expect(command.calls).toEqual([
      [
        "complexFilter",
        buildAudioFilterGraph(
          new Map([
            [0, 1],
            [1, 0.25],
          ])
        ).filters,
        "mixed",
      ],
      ["outputOptions", ["-map 0:v", "-y"]],
      ["videoCodec", "copy"],
      ["audioCodec", "aac"],
      ["audioBitrate", "192k"],
      ["save", "/out/movie.mp4"],
    ]);
  });

  it("maps the single branch label when only one stream is selected", async () => {
    const command = new FakeCommand();
    const { service } = serviceWith(command);

    await service.mixAudioStreams("in.mp4", "out.mp4", new Map([[3, 2]]));

    expect(command.calls[0]).toEqual([
      "complexFilter",
      [{ filter: "volume", options: { volume: 2 }, inputs: "0:a:3", outputs: "a0" }],
      "a0",
    ]);
  });

  it("never starts ffmpeg for an empty volume map", async () => {
    const command = new FakeCommand();
    const { service, factory } = serviceWith(command);

    await expect(
      service.mixAudioStreams("in.mp4", "out.mp4", new Map())
    ).rejects.toBeInstanceOf(InvalidInputError);
    expect(factory).not.toHaveBeenCalled();
  });

  it("surfaces ffmpeg failures as ProcessingError with stderr", async () => {
    const stderr =
      "ffmpeg version 6.1\nInput #0, matroska\nStream specifier ':a:5' in filtergraph description [0:a:5]volume=volume=1[a0] matches no streams.\n";
    const { service } = serviceWith(new FakeCommand({ stderr }));

    const error = await service
      .mixAudioStreams("in.mkv", "out.mp4", new Map([[5, 1]]))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProcessingError);
    expect(error).toMatchObject({
      kind: "processing",
      message:
        "FFmpeg processing failed: Stream specifier ':a:5' in filtergraph description [0:a:5]volume=volume=1[a0] matches no streams.",
      diagnostics: stderr.trim(),
    });
  });

  it("falls back to the error message when stderr is empty", async () => {
    const { service } = serviceWith(new FakeCommand({ stderr: "" }));

    await expect(
      service.mixAudioStreams("in.mkv", "out.mp4", new Map([[0, 1]]))
    ).rejects.toThrow("FFmpeg processing failed: ffmpeg exited with code 1");
  });
});
