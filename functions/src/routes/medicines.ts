import { Router } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import type { MedicineCatalog } from '../services/catalog/MedicineCatalog';
import type { MedicineLookupService } from '../services/medicineLookup';
import {
  findMedicine,
  listMedicinesByClass,
  searchAllMedicines,
} from '../services/queryMatcher';

type CreateMedicinesRouterOptions = {
  catalog: MedicineCatalog;
  lookupService: MedicineLookupService;
};

const listQuerySchema = z.object({
  q: z.string().trim().optional(),
  class: z.string().trim().optional(),
});

export function createMedicinesRouter(options: CreateMedicinesRouterOptions): Router {
  const { catalog, lookupService } = options;
  const router = Router();

  /**
   * GET /v1/medicines
   * List medicines, optionally filtered by a search term or a class
   */
  router.get('/', (req, res) => {
    try {
      const query = listQuerySchema.parse(req.query);

      let medicines = query.q ? searchAllMedicines(query.q, catalog) : catalog.records();
      if (query.class) {
        const inClass = new Set(listMedicinesByClass(query.class, catalog));
        medicines = medicines.filter((medicine) => inClass.has(medicine));
      }

      res.json({ medicines });
    } catch (error) {
      if (error instanceof z.ZodError) {
        res.status(400).json({
          code: 'validation_failed',
          message: 'Invalid query parameters',
          details: error.errors,
        });
        return;
      }

      functions.logger.error('[medicines] Error listing medicines:', error);
      res.status(500).json({
        code: 'server_error',
        message: 'Failed to list medicines',
      });
    }
  });

  /**
   * GET /v1/medicines/:query
   * Best single match for a name, generic name or brand
   */
  router.get('/:query', (req, res) => {
    const medicine = findMedicine(req.params.query, catalog);
    if (!medicine) {
      res.status(404).json({
        code: 'not_found',
        message: 'Medicine not found',
      });
      return;
    }

    res.json({ medicine });
  });

  /**
   * GET /v1/medicines/:query/brands
   * Brand listings for the matched medicine's generic name
   */
  router.get('/:query/brands', (req, res) => {
    res.json({ brands: lookupService.getBrands(req.params.query) });
  });

  return router;
}
