import { Request, Response, NextFunction } from 'express';
import { captureException } from '../utils/sentry';

type HttpError = Error & { status?: number; statusCode?: number; type?: string };

// Errors raised by the body parsers carry a 4xx status and a type tag.
const clientErrorFor = (err: HttpError): { status: number; code: string; message: string } | null => {
  const status = err.status ?? err.statusCode;
  if (err.type === 'entity.parse.failed') {
    return { status: 400, code: 'invalid_json', message: 'Request body is not valid JSON' };
  }
  if (err.type === 'entity.too.large') {
    return { status: 413, code: 'payload_too_large', message: 'Request body is too large' };
  }
  if (status && status >= 400 && status < 500) {
    return { status, code: 'bad_request', message: err.message };
  }
  return null;
};

export function errorHandler(err: HttpError, req: Request, res: Response, next: NextFunction) {
  // If headers have already been sent, delegate to the default Express error handler
  if (res.headersSent) {
    next(err);
    return;
  }

  const clientError = clientErrorFor(err);
  if (clientError) {
    res.status(clientError.status).json({
      code: clientError.code,
      message: clientError.message,
    });
    return;
  }

  captureException(err, { path: req.path, method: req.method });

  if (process.env.NODE_ENV === 'production') {
    // In production, don't leak stack traces
    res.status(500).json({
      code: 'server_error',
      message: 'An unexpected error occurred',
    });
  } else {
    res.status(500).json({
      code: 'server_error',
      message: err.message,
      stack: err.stack,
    });
  }
}
