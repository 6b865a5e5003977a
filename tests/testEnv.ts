const defaults: Record<string, string> = {
  API_HOST: '127.0.0.1',
  API_PORT: '0',
  LOG_LEVEL: 'silent',
  MODEL_NAME: 'whisper-test',
  CONDITION_ON_PREVIOUS_TEXT: 'true',
  VAD_FILTER: 'false',
  FFMPEG_PATH: '/nonexistent/ffmpeg-for-tests',
  FFMPEG_TIMEOUT_MS: '2000',
};

export function setTestEnv(): void {
  for (const [key, value] of Object.entries(defaults)) {
    if (!process.env[key]) {
      process.env[key] = value;
    }
  }
}
