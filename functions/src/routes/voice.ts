import express, { Router } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import type { QueryHandler } from '../services/queryHandler';
import type { SpeechToTextService } from '../services/speech/speechToText';
import { MAX_SPEECH_TEXT_LENGTH, type TextToSpeechService } from '../services/speech/textToSpeech';
import { sanitizePlainText } from '../utils/inputSanitization';

type CreateVoiceRouterOptions = {
  queryHandler: QueryHandler;
  speechToText: SpeechToTextService;
  textToSpeech: TextToSpeechService;
  audioMaxBytes?: string;
};

const transcribeQuerySchema = z.object({
  model: z.string().trim().min(1).optional(),
  language: z.string().trim().min(1).optional(),
});

const speakSchema = z.object({
  text: z.string().min(1),
  voiceId: z.string().trim().min(1).optional(),
  speed: z.number().positive().max(3).optional(),
  pitch: z.number().int().min(-50).max(50).optional(),
});

export function createVoiceRouter(options: CreateVoiceRouterOptions): Router {
  const { queryHandler, speechToText, textToSpeech, audioMaxBytes = '10mb' } = options;
  const router = Router();

  /**
   * POST /v1/voice/transcribe
   * Raw audio body in, transcript (and the lookup reply for it) out.
   * A failed transcription is a normal outcome: transcript is null.
   */
  router.post(
    '/transcribe',
    express.raw({ type: ['audio/*', 'application/octet-stream'], limit: audioMaxBytes }),
    async (req, res) => {
      try {
        if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
          res.status(400).json({
            code: 'validation_failed',
            message: 'An audio body is required',
          });
          return;
        }

        const query = transcribeQuerySchema.parse(req.query);
        const transcript = await speechToText.transcribe(req.body, {
          model: query.model,
          language: query.language,
          contentType: req.get('content-type'),
        });

        if (!transcript) {
          res.json({
            transcript: null,
            reply: null,
            message: 'No transcript available',
          });
          return;
        }

        res.json({ transcript, reply: queryHandler.handleQuery(transcript) });
      } catch (error) {
        if (error instanceof z.ZodError) {
          res.status(400).json({
            code: 'validation_failed',
            message: 'Invalid query parameters',
            details: error.errors,
          });
          return;
        }

        functions.logger.error('[voice] Error transcribing audio:', error);
        res.status(500).json({
          code: 'server_error',
          message: 'Failed to transcribe audio',
        });
      }
    },
  );

  /**
   * POST /v1/voice/speak
   * Reply text in, MP3 audio out
   */
  router.post('/speak', async (req, res) => {
    try {
      const data = speakSchema.parse(req.body);
      const text = sanitizePlainText(data.text, MAX_SPEECH_TEXT_LENGTH);
      if (!text) {
        res.status(400).json({
          code: 'empty_input',
          message: 'No text provided',
        });
        return;
      }

      const audio = await textToSpeech.synthesize(text, {
        voiceId: data.voiceId,
        speed: data.speed,
        pitch: data.pitch,
      });

      if (!audio) {
        res.status(503).json({
          code: 'speech_unavailable',
          message: 'Speech synthesis is unavailable; use the text reply instead',
        });
        return;
      }

      res.type('audio/mpeg').send(audio);
    } catch (error) {
      if (error instanceof z.ZodError) {
        res.status(400).json({
          code: 'validation_failed',
          message: 'Invalid request body',
          details: error.errors,
        });
        return;
      }

      functions.logger.error('[voice] Error generating speech:', error);
      res.status(500).json({
        code: 'server_error',
        message: 'Failed to generate speech',
      });
    }
  });

  return router;
}
