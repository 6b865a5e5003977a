import express, { Request, Response, NextFunction, Router } from 'express';

import {
  ApiError,
  errorMessage,
  internalError,
  invalidRequest,
  isApiError,
  serviceUnavailable,
} from '../api/errors';
import { modelListBody, sendApiError, sendJson, transcriptionBody } from '../api/responses';
import { normalizeAudio } from '../audio/normalize';
import { durationSeconds, type AudioBuffer, type AudioDecoder } from '../audio/types';
import type { ModelOptionsProvider } from '../config/modelOptions';
import { parseMultipart } from '../http/multipart';
import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import type { EngineGateway } from '../transcription/engineGateway';
import { buildTranscriptionRequest, readTranscriptionForm } from '../transcription/requestBuilder';

export interface OpenAiRouterDeps {
  gateway: EngineGateway;
  decoder: AudioDecoder;
  modelOptions: ModelOptionsProvider;
  maxUploadBytes: number;
}

export function requestIdOf(res: Response): string | undefined {
  const value: unknown = res.locals.requestId;
  return typeof value === 'string' ? value : undefined;
}

export function toApiError(error: unknown): ApiError {
  if (isApiError(error)) return error;
  return internalError(`Transcription failed: ${errorMessage(error)}`, error);
}

async function decodeUpload(file: Buffer, decoder: AudioDecoder): Promise<AudioBuffer> {
  const endDecode = startStageTimer('decode');
  try {
    return await normalizeAudio(file, decoder);
  } catch (error) {
    incStageError('decode');
    throw error;
  } finally {
    endDecode();
  }
}

// Paths match literally: no query string, same case.
const exactPath = (req: Request, _res: Response, next: NextFunction): void => {
  if (req.originalUrl.includes('?')) {
    next('route');
    return;
  }
  next();
};

function canRespond(res: Response): boolean {
  return !res.headersSent && !res.destroyed;
}

export function createOpenAiRouter(deps: OpenAiRouterDeps): Router {
  const router = Router({ caseSensitive: true });

  router.get('/v1/models', exactPath, (_req: Request, res: Response) => {
    const { modelName } = deps.modelOptions.getModelOptions();
    sendJson(res, 200, modelListBody(modelName));
  });

  // Both checks run before the body is read, so early rejections never buffer an upload.
  const requireEngine = (_req: Request, res: Response, next: NextFunction): void => {
    if (!deps.gateway.available) {
      sendApiError(res, serviceUnavailable());
      return;
    }
    next();
  };

  const requireMultipart = (req: Request, res: Response, next: NextFunction): void => {
    const contentType = req.header('content-type') ?? '';
    if (!contentType.includes('multipart/form-data')) {
      sendApiError(res, invalidRequest('Content-Type must be multipart/form-data'));
      return;
    }
    next();
  };

  const readBody = express.raw({ type: () => true, limit: deps.maxUploadBytes });

  router.post(
    '/v1/audio/transcriptions',
    exactPath,
    requireEngine,
    requireMultipart,
    readBody,
    async (req: Request, res: Response) => {
      const requestId = requestIdOf(res);
      const body: unknown = req.body;
      const raw = Buffer.isBuffer(body) ? body : Buffer.alloc(0);

      try {
        const fields = parseMultipart(raw, req.header('content-type') ?? '');
        const form = readTranscriptionForm(fields);

        const audio = await decodeUpload(form.file, deps.decoder);

        log.info(
          {
            event: 'api_audio_received',
            request_id: requestId,
            filename: form.filename,
            upload_bytes: form.file.length,
            duration_s: Number(durationSeconds(audio).toFixed(2)),
          },
          'received audio',
        );

        const request = buildTranscriptionRequest(form, audio, deps.modelOptions.getModelOptions());
        const startedAt = Date.now();
        const result = await deps.gateway.transcribe(request);

        log.info(
          {
            event: 'api_transcription_completed',
            request_id: requestId,
            elapsed_ms: Date.now() - startedAt,
            text_length: result.text.length,
          },
          'transcription completed',
        );

        if (!canRespond(res)) {
          log.warn({ event: 'api_client_gone', request_id: requestId }, 'client left before response');
          return;
        }
        sendJson(res, 200, transcriptionBody(result.text));
      } catch (error) {
        const apiError = toApiError(error);
        const logFields = { event: 'api_transcription_failed', request_id: requestId, status: apiError.status, err: error };
        if (apiError.status >= 500) {
          log.error(logFields, 'transcription failed');
        } else {
          log.warn(logFields, 'transcription request rejected');
        }
        if (canRespond(res)) {
          sendApiError(res, apiError);
        }
      }
    },
  );

  return router;
}
