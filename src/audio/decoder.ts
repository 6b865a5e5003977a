import { decodeWithFfmpeg, type FfmpegDecodeOptions } from './ffmpegDecode';
import type { AudioDecoder, DecodedAudio } from './types';
import { decodeWav, looksLikeWav } from './wavDecode';

/**
 * WAV is parsed in-process; every other container goes through ffmpeg.
 */
export function createAudioDecoder(options: FfmpegDecodeOptions): AudioDecoder {
  return {
    async decode(input: Buffer): Promise<DecodedAudio> {
      if (looksLikeWav(input)) {
        return decodeWav(input);
      }
      return decodeWithFfmpeg(input, options);
    },
  };
}
