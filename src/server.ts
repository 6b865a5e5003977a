import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';

import { invalidRequest, internalError, notFound } from './api/errors';
import { sendApiError } from './api/responses';
import type { AudioDecoder } from './audio/types';
import type { ModelOptionsProvider } from './config/modelOptions';
import { log } from './log';
import { collectDefaultMetrics, metricsHandler, metricsMiddleware } from './metrics';
import { createOpenAiRouter, requestIdOf } from './routes/openai';
import type { EngineGateway } from './transcription/engineGateway';

export interface ServerDeps {
  gateway: EngineGateway;
  decoder: AudioDecoder;
  modelOptions: ModelOptionsProvider;
  maxUploadBytes: number;
  metricsEnabled?: boolean;
}

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  res.locals.requestId = requestId;
  log.info(
    { event: 'api_request_received', request_id: requestId, method: req.method, path: req.path },
    'request received',
  );
  next();
}

function notFoundHandler(_req: Request, res: Response): void {
  sendApiError(res, notFound());
}

function isBodyTooLarge(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.too.large';
}

function errorHandlerFor(maxUploadBytes: number) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    const requestId = requestIdOf(res);
    if (res.headersSent || res.destroyed) {
      log.warn({ event: 'api_error_after_response', request_id: requestId, err }, 'error after response started');
      return;
    }
    if (isBodyTooLarge(err)) {
      log.warn({ event: 'api_body_too_large', request_id: requestId }, 'request body too large');
      sendApiError(res, invalidRequest(`Request body exceeds ${maxUploadBytes} bytes`));
      return;
    }
    log.error({ event: 'api_unhandled_error', request_id: requestId, err }, 'unhandled error');
    sendApiError(res, internalError('Internal server error'));
  };
}

export function buildServer(deps: ServerDeps): { app: express.Express; server: http.Server } {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);

  if (deps.metricsEnabled) {
    collectDefaultMetrics();
    app.use(metricsMiddleware);
    app.get('/metrics', (req, res, next) => {
      metricsHandler(req, res).catch(next);
    });
  }

  app.use(
    createOpenAiRouter({
      gateway: deps.gateway,
      decoder: deps.decoder,
      modelOptions: deps.modelOptions,
      maxUploadBytes: deps.maxUploadBytes,
    }),
  );

  app.use(notFoundHandler);
  app.use(errorHandlerFor(deps.maxUploadBytes));

  const server = http.createServer(app);

  return { app, server };
}
