import * as functions from 'firebase-functions';
import { errorHandler } from '../errorHandler';

function createResponse(headersSent = false) {
  const res: any = {
    headersSent,
    statusCode: 200,
    body: undefined,
    status(code: number) {
      this.statusCode = code;
      return this;
    },
    json(payload: unknown) {
      this.body = payload;
      return this;
    },
  };
  return res;
}

const req: any = { path: '/v1/query', method: 'POST' };

describe('errorHandler', () => {
  const originalEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
    jest.clearAllMocks();
  });

  it('maps malformed JSON bodies to 400', () => {
    const res = createResponse();
    const err = Object.assign(new Error('Unexpected token'), { status: 400, type: 'entity.parse.failed' });

    errorHandler(err, req, res, jest.fn());

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ code: 'invalid_json', message: 'Request body is not valid JSON' });
    expect(functions.logger.error).not.toHaveBeenCalled();
  });

  it('maps oversized bodies to 413', () => {
    const res = createResponse();
    const err = Object.assign(new Error('request entity too large'), { status: 413, type: 'entity.too.large' });

    errorHandler(err, req, res, jest.fn());

    expect(res.statusCode).toBe(413);
    expect(res.body.code).toBe('payload_too_large');
  });

  it('passes other client errors through with their status', () => {
    const res = createResponse();
    const err = Object.assign(new Error('Origin not allowed'), { statusCode: 403 });

    errorHandler(err, req, res, jest.fn());

    expect(res.statusCode).toBe(403);
    expect(res.body).toEqual({ code: 'bad_request', message: 'Origin not allowed' });
  });

  it('logs unexpected errors and includes the stack outside production', () => {
    const res = createResponse();
    const err = new Error('boom');

    errorHandler(err, req, res, jest.fn());

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ code: 'server_error', message: 'boom', stack: err.stack });
    expect(functions.logger.error).toHaveBeenCalledWith('[error]', err);
  });

  it('hides details in production', () => {
    process.env.NODE_ENV = 'production';
    const res = createResponse();

    errorHandler(new Error('database password leaked'), req, res, jest.fn());

    expect(res.body).toEqual({ code: 'server_error', message: 'An unexpected error occurred' });
  });

  it('delegates when headers were already sent', () => {
    const res = createResponse(true);
    const next = jest.fn();
    const err = new Error('late failure');

    errorHandler(err, req, res, next);

    expect(next).toHaveBeenCalledWith(err);
    expect(res.body).toBeUndefined();
  });
});
