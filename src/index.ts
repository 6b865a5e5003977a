import { ApiServer } from './apiServer';
import { createAudioDecoder } from './audio/decoder';
import { envModelOptionsProvider } from './config/modelOptions';
import { env } from './env';
import { log } from './log';
import { WhisperHttpEngine } from './transcription/engines/whisperHttp';

const engine = env.WHISPER_URL ? new WhisperHttpEngine({ url: env.WHISPER_URL }) : null;
if (!engine) {
  log.warn({ event: 'engine_not_configured' }, 'WHISPER_URL not set; transcription requests will return 503');
}

const apiServer = new ApiServer({
  host: env.API_HOST,
  port: env.API_PORT,
  engine,
  decoder: createAudioDecoder({ ffmpegPath: env.FFMPEG_PATH, timeoutMs: env.FFMPEG_TIMEOUT_MS }),
  modelOptions: envModelOptionsProvider(),
  maxUploadBytes: env.MAX_UPLOAD_BYTES,
  shutdownGraceMs: env.SHUTDOWN_GRACE_MS,
  engineTimeoutMs: env.WHISPER_TIMEOUT_MS,
  metricsEnabled: env.METRICS_ENABLED,
});

async function main(): Promise<void> {
  const started = await apiServer.start();
  if (!started) {
    process.exitCode = 1;
    return;
  }

  const shutdown = (signal: NodeJS.Signals): void => {
    log.info({ event: 'shutdown_signal', signal }, 'shutting down');
    apiServer.stop().catch((error: unknown) => {
      log.error({ event: 'shutdown_failed', err: error }, 'shutdown failed');
      process.exitCode = 1;
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, 'fatal startup error');
  process.exitCode = 1;
});
