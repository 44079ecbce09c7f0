/**
 * Text-to-Speech Service
 *
 * Generates spoken replies through Murf. Audio is returned as opaque MP3
 * bytes; a failed call yields null and the caller carries on without audio.
 */

import axios from 'axios';
import * as functions from 'firebase-functions';
import { describeExternalError } from '../../utils/externalApi';

export const MURF_GENERATE_URL = 'https://api.murf.ai/v1/speech/generate';
export const MAX_SPEECH_TEXT_LENGTH = 1000;

export interface SynthesizeOptions {
  voiceId?: string;
  speed?: number;
  pitch?: number;
}

export class TextToSpeechService {
  constructor(
    private readonly apiKey: string,
    private readonly timeoutMs: number,
  ) {}

  isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  async synthesize(text: string, options: SynthesizeOptions = {}): Promise<Buffer | null> {
    if (!this.apiKey) {
      functions.logger.warn('[tts] Murf API key not configured');
      return null;
    }

    const trimmed = text.trim();
    if (!trimmed) {
      return null;
    }

    const { voiceId = 'en-US-1', speed = 1.0, pitch = 0 } = options;

    try {
      const response = await axios.post<ArrayBuffer>(
        MURF_GENERATE_URL,
        {
          text: trimmed.slice(0, MAX_SPEECH_TEXT_LENGTH),
          voice: voiceId,
          sampleRate: 24000,
          format: 'mp3',
          speed,
          pitch,
        },
        {
          headers: {
            'api-key': this.apiKey,
            'Content-Type': 'application/json',
          },
          responseType: 'arraybuffer',
          timeout: this.timeoutMs,
        },
      );

      return Buffer.from(response.data);
    } catch (error) {
      functions.logger.error('[tts] Murf speech generation failed', describeExternalError(error));
      return null;
    }
  }
}
