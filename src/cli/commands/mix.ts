/**
 * Mix Command
 *
 * Mix the audio streams of one video at chosen volumes.
 */

import { MediaProbeService } from "../../services/MediaProbeService";
import { AudioMixService } from "../../services/AudioMixService";
import { buildVolumeMap, parseVolumeAssignment } from "../../utils/volume";
import { printError, printInfo, printSuccess } from "../output";

interface MixOptions {
  volume?: string[];
}

export async function mixCommand(
  input: string,
  output: string,
  options: MixOptions
): Promise<void> {
  const streams = await new MediaProbeService().extractAudioStreams(input);
  if (streams.length === 0) {
    printError("No audio streams found in this video file.");
    process.exitCode = 1;
    return;
  }

  const assignments = (options.volume ?? []).map(parseVolumeAssignment);
  const volumeMap = buildVolumeMap(streams, assignments);

  for (const stream of streams) {
    const volume = volumeMap.get(stream.streamIndex) ?? 1;
    printInfo(`${stream.displayName}: ${Math.round(volume * 100)}%`);
  }

  await new AudioMixService().mixAudioStreams(input, output, volumeMap);
  printSuccess(`Mixed video written to ${output}`);
}
