import type { ErrorRequestHandler, Request, Response } from 'express';
import type { ErrorBody } from '../types';

export function errorResponse(res: Response, status: number, code: string, details?: unknown): void {
  const body: ErrorBody = { error: code };
  if (details !== undefined) {
    body.details = details;
  }
  res.status(status).json(body);
}

export function methodNotAllowed(_req: Request, res: Response): void {
  errorResponse(res, 405, 'method_not_allowed');
}

export function notFound(req: Request, res: Response): void {
  errorResponse(res, 404, 'not_found', `Route ${req.method} ${req.path} not found`);
}

// body-parser and http-errors tag client errors with a 4xx status
interface ClientError {
  status: number;
  type?: string;
  message: string;
}

function asClientError(err: unknown): ClientError | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if (!('message' in err) || typeof err.message !== 'string') return undefined;

  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status !== 'number' || status < 400 || status >= 500) return undefined;

  const type = 'type' in err && typeof err.type === 'string' ? err.type : undefined;
  return { status, type, message: err.message };
}

export const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
  const clientError = asClientError(err);
  if (clientError) {
    const { status, type, message } = clientError;

    if (type === 'entity.parse.failed') {
      errorResponse(res, 400, 'invalid_json', message);
    } else if (status === 413) {
      errorResponse(res, 413, 'payload_too_large');
    } else if (status === 415) {
      errorResponse(res, 415, 'unsupported_media_type', message);
    } else {
      errorResponse(res, status, 'bad_request', message);
    }
    return;
  }

  console.error('Unhandled error:', err);
  errorResponse(res, 500, 'internal_error');
};
