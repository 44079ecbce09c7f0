import { Router } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { EmptyInputError } from '../services/errors';
import { MEDICINE_NOT_FOUND, type QueryHandler } from '../services/queryHandler';
import { sanitizeQueryText } from '../utils/inputSanitization';

type CreateQueryRouterOptions = {
  queryHandler: QueryHandler;
};

const querySchema = z.object({
  text: z.string().optional(),
});

export function createQueryRouter(options: CreateQueryRouterOptions): Router {
  const { queryHandler } = options;
  const router = Router();

  /**
   * POST /v1/query
   * Answer a typed or transcribed question about a medicine
   */
  router.post('/', (req, res) => {
    try {
      const data = querySchema.parse(req.body ?? {});
      const reply = queryHandler.handleQuery(sanitizeQueryText(data.text));

      functions.logger.info('[query] Answered query', {
        matched: reply !== MEDICINE_NOT_FOUND,
      });

      res.json({ reply });
    } catch (error) {
      if (error instanceof EmptyInputError) {
        res.status(400).json({
          code: error.code,
          message: error.message,
        });
        return;
      }

      if (error instanceof z.ZodError) {
        res.status(400).json({
          code: 'validation_failed',
          message: 'Invalid request body',
          details: error.errors,
        });
        return;
      }

      functions.logger.error('[query] Error answering query:', error);
      res.status(500).json({
        code: 'server_error',
        message: 'Failed to answer query',
      });
    }
  });

  return router;
}
