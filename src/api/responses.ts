import type { Response } from 'express';
import type { ApiError } from './errors';

export interface ModelListBody {
  object: 'list';
  data: Array<{ id: string; object: 'model'; owned_by: 'local' }>;
}

export interface TranscriptionBody {
  text: string;
}

export interface ErrorBody {
  error: {
    message: string;
    type: 'invalid_request_error';
    code: null;
  };
}

export function modelListBody(modelName: string): ModelListBody {
  return {
    object: 'list',
    data: [{ id: modelName, object: 'model', owned_by: 'local' }],
  };
}

export function transcriptionBody(text: string): TranscriptionBody {
  return { text };
}

// Every error kind shares the same envelope; only the HTTP status differs.
export function errorBody(message: string): ErrorBody {
  return {
    error: {
      message,
      type: 'invalid_request_error',
      code: null,
    },
  };
}

export function encodeJson(body: unknown): Buffer {
  return Buffer.from(JSON.stringify(body), 'utf8');
}

export function sendJson(res: Response, status: number, body: unknown): void {
  const payload = encodeJson(body);
  res.status(status);
  res.setHeader('Content-Type', 'application/json');
  res.setHeader('Content-Length', String(payload.length));
  res.end(payload);
}

export function sendApiError(res: Response, error: ApiError): void {
  sendJson(res, error.status, errorBody(error.message));
}
