import { env, type Env } from '../env';

export interface ModelOptions {
  modelName: string;
  conditionOnPreviousText?: boolean;
  vadFilter?: boolean;
}

/** Read-only view onto the host's model configuration, consulted per request. */
export interface ModelOptionsProvider {
  getModelOptions(): ModelOptions;
}

export function envModelOptionsProvider(
  source: Pick<Env, 'MODEL_NAME' | 'CONDITION_ON_PREVIOUS_TEXT' | 'VAD_FILTER'> = env,
): ModelOptionsProvider {
  const snapshot: ModelOptions = Object.freeze({
    modelName: source.MODEL_NAME,
    conditionOnPreviousText: source.CONDITION_ON_PREVIOUS_TEXT,
    vadFilter: source.VAD_FILTER,
  });
  return {
    getModelOptions: () => snapshot,
  };
}

export function staticModelOptionsProvider(options: ModelOptions): ModelOptionsProvider {
  const snapshot: ModelOptions = Object.freeze({ ...options });
  return {
    getModelOptions: () => snapshot,
  };
}
