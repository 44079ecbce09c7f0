import { createQueryRouter } from '../query';
import { MedicineCatalog } from '../../services/catalog/MedicineCatalog';
import { QueryHandler } from '../../services/queryHandler';
import { ibuprofen, paracetamol } from '../../__tests__/medicineFixtures';
import { createRequest, createResponse, getRouteHandler } from './routeHarness';

describe('query routes', () => {
  const queryHandler = new QueryHandler(new MedicineCatalog([paracetamol, ibuprofen]));
  const router = createQueryRouter({ queryHandler });
  const handler = getRouteHandler(router, 'post', '/');

  it('answers a dosage question', async () => {
    const req = createRequest({ body: { text: 'What is the dosage of paracetamol' } });
    const res = createResponse();

    await handler(req, res, jest.fn());

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ reply: 'Paracetamol - 500-1000mg every 4-6 hours max 4000mg/day' });
  });

  it('collapses whitespace before matching', async () => {
    const req = createRequest({ body: { text: '  ibuprofen \n  dose ' } });
    const res = createResponse();

    await handler(req, res, jest.fn());

    expect(res.body).toEqual({ reply: 'Ibuprofen - 200-400mg every 4-6 hours' });
  });

  it('replies not found as a normal answer', async () => {
    const req = createRequest({ body: { text: 'xyznotreal' } });
    const res = createResponse();

    await handler(req, res, jest.fn());

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ reply: 'Medicine not found.' });
  });

  it('acknowledges the wake phrase', async () => {
    const req = createRequest({ body: { text: 'hey murf medu' } });
    const res = createResponse();

    await handler(req, res, jest.fn());

    expect(res.body).toEqual({ reply: 'yes tell me' });
  });

  it.each([{}, { text: '' }, { text: '   ' }])('rejects empty input %#', async (body) => {
    const req = createRequest({ body });
    const res = createResponse();

    await handler(req, res, jest.fn());

    expect(res.statusCode).toBe(400);
    expect(res.body).toEqual({ code: 'empty_input', message: 'No text provided' });
  });

  it('rejects a non-string text field', async () => {
    const req = createRequest({ body: { text: 42 } });
    const res = createResponse();

    await handler(req, res, jest.fn());

    expect(res.statusCode).toBe(400);
    expect(res.body.code).toBe('validation_failed');
  });

  it('returns 500 when the handler throws unexpectedly', async () => {
    const failing = new QueryHandler(new MedicineCatalog([]));
    jest.spyOn(failing, 'handleQuery').mockImplementation(() => {
      throw new Error('boom');
    });
    const failingHandler = getRouteHandler(createQueryRouter({ queryHandler: failing }), 'post', '/');
    const req = createRequest({ body: { text: 'paracetamol' } });
    const res = createResponse();

    await failingHandler(req, res, jest.fn());

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ code: 'server_error', message: 'Failed to answer query' });
  });
});
