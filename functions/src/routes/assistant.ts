import { Router } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import type { AssistantService } from '../services/assistant';
import { sanitizePlainText } from '../utils/inputSanitization';

type CreateAssistantRouterOptions = {
  assistant: AssistantService;
  promptMaxLength?: number;
};

const chatSchema = z.object({
  prompt: z.string().min(1),
  systemPrompt: z.string().optional(),
  provider: z.enum(['openai', 'groq']).optional(),
});

export function createAssistantRouter(options: CreateAssistantRouterOptions): Router {
  const { assistant, promptMaxLength = 2000 } = options;
  const router = Router();

  /**
   * POST /v1/assistant/chat
   * Free-form question; falls back to a rule-based reply when no LLM answers
   */
  router.post('/chat', async (req, res) => {
    try {
      const data = chatSchema.parse(req.body);
      const prompt = sanitizePlainText(data.prompt, promptMaxLength);
      if (!prompt) {
        res.status(400).json({
          code: 'empty_input',
          message: 'No prompt provided',
        });
        return;
      }

      const result = await assistant.generateResponse(prompt, {
        systemPrompt: sanitizePlainText(data.systemPrompt, promptMaxLength) || undefined,
        provider: data.provider,
      });

      res.json({
        reply: result.text,
        source: result.source,
        provider: result.provider ?? null,
      });
    } catch (error) {
      if (error instanceof z.ZodError) {
        res.status(400).json({
          code: 'validation_failed',
          message: 'Invalid request body',
          details: error.errors,
        });
        return;
      }

      functions.logger.error('[assistant] Error generating reply:', error);
      res.status(500).json({
        code: 'server_error',
        message: 'Failed to generate reply',
      });
    }
  });

  return router;
}
