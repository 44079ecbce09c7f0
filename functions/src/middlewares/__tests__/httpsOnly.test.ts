import { requireHttps } from '../httpsOnly';

function createResponse() {
  const res: any = {
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

describe('requireHttps', () => {
  const originalEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
  });

  it('rejects plain HTTP in production', () => {
    process.env.NODE_ENV = 'production';
    const res = createResponse();
    const next = jest.fn();

    requireHttps({ secure: false } as any, res, next);

    expect(res.statusCode).toBe(403);
    expect(res.body).toEqual({ code: 'https_required', message: 'HTTPS is required' });
    expect(next).not.toHaveBeenCalled();
  });

  it('allows HTTPS in production', () => {
    process.env.NODE_ENV = 'production';
    const next = jest.fn();

    requireHttps({ secure: true } as any, createResponse(), next);

    expect(next).toHaveBeenCalledTimes(1);
  });

  it('allows plain HTTP outside production', () => {
    const next = jest.fn();

    requireHttps({ secure: false } as any, createResponse(), next);

    expect(next).toHaveBeenCalledTimes(1);
  });
});
