import { InvalidInputError } from "../errors";
import type { StreamInfo, VolumeAssignment, VolumeMap } from "../types";

export const DEFAULT_VOLUME_PERCENT = 100;
export const MAX_VOLUME_PERCENT = 200;
export const VOLUME_STEP_PERCENT = 5;

// "1 50", "1=50" and "1=50%" all mean stream 1 at 50%
const ASSIGNMENT_PATTERN = /^(\d+)\s*(?:=|\s)\s*(\d+)\s*%?$/;

export function parseVolumeAssignment(input: string): VolumeAssignment {
  const match = ASSIGNMENT_PATTERN.exec(input.trim());
  if (!match) {
    throw new InvalidInputError(
      `Expected "<stream> <percent>", got "${input.trim()}"`
    );
  }

  const assignment = {
    streamIndex: Number(match[1]),
    percent: Number(match[2]),
  };
  validateVolumePercent(assignment.percent);
  return assignment;
}

export function validateVolumePercent(percent: number): void {
  if (
    !Number.isInteger(percent) ||
    percent < 0 ||
    percent > MAX_VOLUME_PERCENT ||
    percent % VOLUME_STEP_PERCENT !== 0
  ) {
    throw new InvalidInputError(
      `Volume must be between 0% and ${MAX_VOLUME_PERCENT}% in steps of ${VOLUME_STEP_PERCENT}%, got ${percent}%`
    );
  }
}

/**
 * Every stream starts at 100%; assignments override individual streams.
 */
export function buildVolumeMap(
  streams: readonly StreamInfo[],
  assignments: readonly VolumeAssignment[] = []
): VolumeMap {
  const percents = new Map<number, number>(
    streams.map((stream) => [stream.streamIndex, DEFAULT_VOLUME_PERCENT])
  );

  for (const { streamIndex, percent } of assignments) {
    if (!percents.has(streamIndex)) {
      throw new InvalidInputError(`Unknown audio stream: ${streamIndex}`);
    }
    validateVolumePercent(percent);
    percents.set(streamIndex, percent);
  }

  return toVolumeMap(percents);
}

export function toVolumeMap(percents: ReadonlyMap<number, number>): VolumeMap {
  return new Map<number, number>(
    [...percents].map(([streamIndex, percent]) => [streamIndex, percent / 100])
  );
}
