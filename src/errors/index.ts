/**
 * Error types shared by the probe, mix and batch operations.
 *
 * Every failure carries a `kind` so callers can branch on it without
 * checking subclasses.
 */

export type MixerErrorKind =
  | "probe"
  | "invalid_input"
  | "processing"
  | "no_audio"
  | "unexpected";

export class MixerError extends Error {
  public readonly kind: MixerErrorKind;
  public readonly diagnostics?: string;

  constructor(kind: MixerErrorKind, message: string, diagnostics?: string) {
    super(message);
    this.name = "MixerError";
    this.kind = kind;
    this.diagnostics = diagnostics;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * ffprobe could not open or recognise the file
 */
export class ProbeError extends MixerError {
  constructor(diagnostics: string) {
    super("probe", `Failed to probe video: ${diagnostics}`, diagnostics);
    this.name = "ProbeError";
  }
}

export class InvalidInputError extends MixerError {
  constructor(message: string) {
    super("invalid_input", message);
    this.name = "InvalidInputError";
  }
}

/**
 * ffmpeg exited with an error while mixing or encoding
 */
export class ProcessingError extends MixerError {
  constructor(diagnostics: string) {
    super(
      "processing",
      `FFmpeg processing failed: ${lastLine(diagnostics)}`,
      diagnostics
    );
    this.name = "ProcessingError";
  }
}

export class NoAudioStreamsError extends MixerError {
  constructor() {
    super("no_audio", "No audio streams found");
    this.name = "NoAudioStreamsError";
  }
}

export function toMixerError(error: unknown): MixerError {
  if (error instanceof MixerError) {
    return error;
  }
  if (error instanceof Error) {
    return new MixerError("unexpected", error.message);
  }
  return new MixerError("unexpected", String(error));
}

// ffmpeg prints its banner and stream dump first; the cause is on the last line
function lastLine(text: string): string {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line);
  return lines[lines.length - 1] ?? "Unknown error";
}
