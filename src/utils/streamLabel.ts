import type { StreamFields, StreamInfo } from "../types";

// e.g. "Stream 1 (Commentary) [EN] - AAC 2ch @ 48kHz"
export function formatStreamLabel(stream: StreamFields): string {
  const parts = [`Stream ${stream.streamIndex}`];

  if (stream.title) {
    parts.push(`(${stream.title})`);
  }
  if (stream.language) {
    parts.push(`[${stream.language.toUpperCase()}]`);
  }

  parts.push(`- ${stream.codecName.toUpperCase()}`);
  parts.push(`${stream.channels}ch`);

  if (stream.sampleRate) {
    parts.push(`@ ${Math.trunc(stream.sampleRate / 1000)}kHz`);
  }

  return parts.join(" ");
}

export function createStreamInfo(fields: StreamFields): StreamInfo {
  return Object.freeze({ ...fields, displayName: formatStreamLabel(fields) });
}
