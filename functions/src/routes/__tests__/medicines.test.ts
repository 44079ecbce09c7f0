import { createMedicinesRouter } from '../medicines';
import { MedicineLookupService } from '../../services/medicineLookup';
import { makeDataSet } from '../../__tests__/medicineFixtures';
import { createRequest, createResponse, getRouteHandler } from './routeHarness';

describe('medicines routes', () => {
  const data = makeDataSet();
  const router = createMedicinesRouter({
    catalog: data.catalog,
    lookupService: new MedicineLookupService(data),
  });

  const names = (body: { medicines: Array<{ name: string }> }) =>
    body.medicines.map((medicine) => medicine.name);

  describe('GET /', () => {
    const handler = getRouteHandler(router, 'get', '/');

    it('lists every medicine in load order', async () => {
      const res = createResponse();

      await handler(createRequest(), res, jest.fn());

      expect(names(res.body)).toEqual(['Paracetamol', 'Ibuprofen', 'Amoxicillin']);
    });

    it('filters by search term', async () => {
      const res = createResponse();

      await handler(createRequest({ query: { q: 'advil' } }), res, jest.fn());

      expect(names(res.body)).toEqual(['Ibuprofen']);
    });

    it('filters by class', async () => {
      const res = createResponse();

      await handler(createRequest({ query: { class: 'antibiotic' } }), res, jest.fn());

      expect(names(res.body)).toEqual(['Amoxicillin']);
    });

    it('applies search term and class together', async () => {
      const res = createResponse();

      await handler(createRequest({ query: { q: 'c', class: 'nsaid' } }), res, jest.fn());

      expect(res.body).toEqual({ medicines: [] });
    });

    it('rejects repeated query parameters', async () => {
      const res = createResponse();

      await handler(createRequest({ query: { q: ['a', 'b'] } }), res, jest.fn());

      expect(res.statusCode).toBe(400);
      expect(res.body.code).toBe('validation_failed');
    });
  });

  describe('GET /:query', () => {
    const handler = getRouteHandler(router, 'get', '/:query');

    it('returns the best match for a brand name', async () => {
      const res = createResponse();

      await handler(createRequest({ params: { query: 'Tylenol' } }), res, jest.fn());

      expect(res.statusCode).toBe(200);
      expect(res.body.medicine.name).toBe('Paracetamol');
    });

    it('returns 404 for an unknown medicine', async () => {
      const res = createResponse();

      await handler(createRequest({ params: { query: 'xyznotreal' } }), res, jest.fn());

      expect(res.statusCode).toBe(404);
      expect(res.body).toEqual({ code: 'not_found', message: 'Medicine not found' });
    });
  });

  describe('GET /:query/brands', () => {
    const handler = getRouteHandler(router, 'get', '/:query/brands');

    it('lists brands for the matched generic name', async () => {
      const res = createResponse();

      await handler(createRequest({ params: { query: 'crocin' } }), res, jest.fn());

      expect(res.body.brands.map((brand: { brandName: string }) => brand.brandName)).toEqual([
        'Crocin',
        'Calpol',
      ]);
    });

    it('returns an empty list for an unknown medicine', async () => {
      const res = createResponse();

      await handler(createRequest({ params: { query: 'xyznotreal' } }), res, jest.fn());

      expect(res.body).toEqual({ brands: [] });
    });
  });
});
