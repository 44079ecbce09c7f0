/**
 * Speech-to-Text Service
 *
 * Sends recorded audio to Deepgram's pre-recorded endpoint and returns the
 * best transcript. Every failure (no key, HTTP error, timeout, empty result)
 * comes back as null so callers can answer "no transcript available".
 */

import axios from 'axios';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { describeExternalError, isRetryableStatus } from '../../utils/externalApi';
import { withRetry } from '../../utils/retryUtils';

export const DEEPGRAM_LISTEN_URL = 'https://api.deepgram.com/v1/listen';

export interface TranscribeOptions {
  model?: string;
  language?: string;
  contentType?: string;
}

const deepgramResponseSchema = z.object({
  results: z.object({
    channels: z
      .array(
        z.object({
          alternatives: z.array(z.object({ transcript: z.string() })).min(1),
        }),
      )
      .min(1),
  }),
});

export class SpeechToTextService {
  constructor(
    private readonly apiKey: string,
    private readonly timeoutMs: number,
  ) {}

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  async transcribe(audio: Buffer, options: TranscribeOptions = {}): Promise<string | null> {
    if (!this.apiKey) {
      functions.logger.warn('[stt] Deepgram API key not configured');
      return null;
    }
    if (audio.length === 0) {
      functions.logger.warn('[stt] Received empty audio payload');
      return null;
    }

    const { model = 'nova-2', language = 'en-US', contentType = 'audio/wav' } = options;

    try {
      const response = await withRetry(
        () =>
          axios.post<unknown>(DEEPGRAM_LISTEN_URL, audio, {
            headers: {
              Authorization: `Token ${this.apiKey}`,
              'Content-Type': contentType,
            },
            params: {
              model,
              language,
              smart_format: 'true',
              utterances: 'true',
            },
            timeout: this.timeoutMs,
          }),
        { label: '[stt]', shouldRetry: isRetryableStatus },
      );

      const parsed = deepgramResponseSchema.safeParse(response.data);
      if (!parsed.success) {
        functions.logger.warn('[stt] Deepgram response did not include a transcript');
        return null;
      }

      const transcript = parsed.data.results.channels[0].alternatives[0].transcript.trim();
      return transcript || null;
    } catch (error) {
      functions.logger.error('[stt] Deepgram transcription failed', describeExternalError(error));
      return null;
    }
  }
}
