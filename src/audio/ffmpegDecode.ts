import { spawn } from 'child_process';
import { log } from '../log';
import { AudioDecodeError, type DecodedAudio } from './types';
import { decodeWav } from './wavDecode';

export interface FfmpegDecodeOptions {
  ffmpegPath: string;
  timeoutMs: number;
}

const STDERR_PREVIEW_CHARS = 300;

// Native rate and channel layout are kept; the normalizer owns downmix and resample.
const FFMPEG_ARGS = [
  '-hide_banner',
  '-loglevel',
  'error',
  '-i',
  'pipe:0',
  '-vn',
  '-c:a',
  'pcm_f32le',
  '-f',
  'wav',
  'pipe:1',
];

/**
 * Decodes any container ffmpeg understands by transcoding it to a float WAV
 * on stdout. A non-zero exit means the input was not decodable; failing to
 * start ffmpeg at all is an environment problem and rejects with a plain Error.
 */
export function decodeWithFfmpeg(input: Buffer, options: FfmpegDecodeOptions): Promise<DecodedAudio> {
  return new Promise<DecodedAudio>((resolve, reject) => {
    const ffmpeg = spawn(options.ffmpegPath, FFMPEG_ARGS);
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;
    let settled = false;

    const finish = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      fn();
    };

    const timeout = setTimeout(() => {
      timedOut = true;
      ffmpeg.kill('SIGKILL');
    }, options.timeoutMs);

    ffmpeg.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    ffmpeg.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
    // ffmpeg may exit before consuming all of stdin; the exit code tells the real story.
    ffmpeg.stdin.on('error', (error) => {
      log.debug({ event: 'ffmpeg_stdin_error', err: error }, 'ffmpeg stdin error');
    });

    ffmpeg.on('error', (error) => {
      finish(() => reject(new Error(`ffmpeg could not be started: ${error.message}`, { cause: error })));
    });

    ffmpeg.on('close', (code) => {
      finish(() => {
        if (timedOut) {
          reject(new Error(`ffmpeg decode timed out after ${options.timeoutMs} ms`));
          return;
        }
        if (code !== 0) {
          const detail = Buffer.concat(stderr).toString('utf8').trim().slice(0, STDERR_PREVIEW_CHARS);
          reject(new AudioDecodeError(`ffmpeg exited with code ${code}${detail ? `: ${detail}` : ''}`));
          return;
        }
        try {
          resolve(decodeWav(Buffer.concat(stdout)));
        } catch (error) {
          reject(error);
        }
      });
    });

    ffmpeg.stdin.end(input);
  });
}
