import { Router } from 'express';
import { z } from 'zod';
import type { MedicineLookupService } from '../services/medicineLookup';

type CreateInteractionsRouterOptions = {
  lookupService: MedicineLookupService;
};

const interactionQuerySchema = z.object({
  med1: z.string().trim().min(1),
  med2: z.string().trim().min(1),
});

export function createInteractionsRouter(options: CreateInteractionsRouterOptions): Router {
  const { lookupService } = options;
  const router = Router();

  /**
   * GET /v1/interactions?med1=...&med2=...
   * Known interaction between two medicines, in either order
   */
  router.get('/', (req, res) => {
    const parsed = interactionQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({
        code: 'validation_failed',
        message: 'Both med1 and med2 are required',
        details: parsed.error.errors,
      });
      return;
    }

    const { med1, med2 } = parsed.data;
    res.json({ interaction: lookupService.checkInteraction(med1, med2) });
  });

  return router;
}
