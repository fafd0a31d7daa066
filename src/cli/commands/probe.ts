/**
 * Probe Command
 *
 * List the audio streams of a video file.
 */

import { MediaProbeService } from "../../services/MediaProbeService";
import {
  formatDuration,
  printHeader,
  printKeyValue,
  printWarning,
} from "../output";

export async function probeCommand(file: string): Promise<void> {
  const streams = await new MediaProbeService().extractAudioStreams(file);

  if (streams.length === 0) {
    printWarning("No audio streams found in this video file.");
    process.exitCode = 1;
    return;
  }

  printHeader(`Audio streams in ${file}`);
  for (const stream of streams) {
    console.log(stream.displayName);
    printKeyValue("Container index", stream.index);
    if (stream.channelLayout) {
      printKeyValue("Layout", stream.channelLayout);
    }
    printKeyValue("Duration", formatDuration(stream.duration));
  }
}
