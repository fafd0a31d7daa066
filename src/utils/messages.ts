import type { StreamInfo } from "../types";

// Telegram rejects messages over 4096 characters
const MAX_MESSAGE_LENGTH = 4000;

export function formatStreamOverview(
  streams: readonly StreamInfo[],
  volumeOf: (streamIndex: number) => number | undefined
): string {
  const lines = streams.map(
    (stream) =>
      `${stream.displayName}: ${volumeOf(stream.streamIndex) ?? 100}%`
  );
  return [`🎚 Audio streams (${streams.length}):`, ...lines].join("\n");
}

export function truncateMessage(
  text: string,
  maxLength: number = MAX_MESSAGE_LENGTH
): string {
  return text.length <= maxLength ? text : `${text.slice(0, maxLength - 1)}…`;
}
