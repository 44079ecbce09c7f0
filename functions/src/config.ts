import * as path from 'path';

/**
 * Configuration for the MedVoice API
 * Reads from environment variables (process.env)
 *
 * Optional environment variables:
 * - DATA_DIR: Directory holding medicines.csv, interactions.csv and brands.csv
 * - PUBLIC_DIR: Directory holding the browser voice page served at /
 * - MURF_API_KEY: For text-to-speech
 * - DEEPGRAM_API_KEY: For speech-to-text
 * - OPENAI_API_KEY / GROQ_API_KEY: For assistant chat (rule-based replies without them)
 * - EXTERNAL_API_TIMEOUT_MS: Timeout applied to every external API call
 * - ALLOWED_ORIGINS: Comma-separated list of allowed CORS origins
 *
 * Without any key the text lookup keeps working from the local catalog.
 */

const parsePositiveInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const dataConfig = {
  dataDir: process.env.DATA_DIR || path.resolve(__dirname, '..', 'data'),
};

export const staticConfig = {
  publicDir: process.env.PUBLIC_DIR || path.resolve(__dirname, '..', 'public'),
};

export const serverConfig = {
  port: parsePositiveInt(process.env.PORT, 8000),
};

export const externalApiConfig = {
  timeoutMs: parsePositiveInt(process.env.EXTERNAL_API_TIMEOUT_MS, 15000),
};

export const murfConfig = {
  apiKey: process.env.MURF_API_KEY || '',
};

export const deepgramConfig = {
  apiKey: process.env.DEEPGRAM_API_KEY || '',
};

export const llmConfig = {
  openAIApiKey: process.env.OPENAI_API_KEY || '',
  groqApiKey: process.env.GROQ_API_KEY || '',
};

export const corsConfig = {
  // Example: "https://medvoice.example.com,https://app.medvoice.example.com"
  allowedOrigins: process.env.ALLOWED_ORIGINS || '',
  // Allow development origins when NODE_ENV is not production
  isDevelopment: process.env.NODE_ENV !== 'production',
};
