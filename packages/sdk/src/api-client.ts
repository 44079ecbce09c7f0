/**
 * MedVoice API Client
 * Typed HTTP client with retry logic, timeout handling, and error mapping
 */

import { ApiError } from './models';
import type {
  Brand,
  ChatReply,
  HealthStatus,
  Interaction,
  LLMProvider,
  Medicine,
  TranscriptionResult,
} from './models';

const DEFAULT_TIMEOUT_MS = 20_000;
const RETRYABLE_STATUS_CODES = new Set([408, 425, 500, 502, 503, 504]); // 429 is not retried
const NETWORK_ERROR_MESSAGE =
  "We couldn't reach MedVoice right now. Please check your connection and try again.";
const SERVER_ERROR_MESSAGE =
  'We ran into an issue on our end. Please try again in a moment.';

export interface ApiClientConfig {
  baseUrl: string;
  timeoutMs?: number;
  /** Defaults to the global fetch. */
  fetchImpl?: typeof fetch;
  enableLogging?: boolean;
}

export interface ChatOptions {
  systemPrompt?: string;
  provider?: LLMProvider;
}

export interface SpeakOptions {
  voiceId?: string;
  speed?: number;
  pitch?: number;
}

export interface TranscribeOptions {
  contentType: string;
  model?: string;
  language?: string;
}

interface RequestOptions {
  method?: 'GET' | 'POST';
  query?: Record<string, string | undefined>;
  json?: unknown;
  body?: Uint8Array;
  headers?: Record<string, string>;
  retry?: number;
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const stringField = (value: unknown, key: string): string | undefined => {
  if (!isRecord(value)) return undefined;
  const field = value[key];
  return typeof field === 'string' ? field : undefined;
};

function mapUserMessage(status: number, fallbackMessage: string): string {
  if (status === 404) return "We couldn't find that medicine.";
  if (status === 429) {
    return "You're doing that a little too quickly. Please wait a moment and try again.";
  }
  if (status >= 500) return SERVER_ERROR_MESSAGE;
  return fallbackMessage;
}

function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS_CODES.has(status) || (status >= 500 && status < 600);
}

async function buildApiError(response: Response): Promise<ApiError> {
  let parsedBody: unknown = null;
  let rawBody: string | null = null;
  try {
    rawBody = await response.text();
    if (rawBody) {
      parsedBody = JSON.parse(rawBody);
    }
  } catch {
    parsedBody = null;
  }

  const message =
    stringField(parsedBody, 'message') || response.statusText || 'Request failed';

  return new ApiError(message, {
    status: response.status,
    code: stringField(parsedBody, 'code'),
    details: isRecord(parsedBody) ? parsedBody.details : undefined,
    body: parsedBody ?? rawBody,
    userMessage: mapUserMessage(response.status, message),
    retriable: isRetryableStatus(response.status),
  });
}

function buildNetworkError(original: unknown): ApiError {
  if (original instanceof Error && original.name === 'AbortError') {
    return new ApiError('Request timed out', {
      code: 'timeout',
      userMessage: NETWORK_ERROR_MESSAGE,
      retriable: true,
    });
  }

  return new ApiError(original instanceof Error ? original.message : 'Network request failed', {
    code: 'network_error',
    userMessage: NETWORK_ERROR_MESSAGE,
    retriable: true,
  });
}

function buildParseError(original: unknown): ApiError {
  return new ApiError('Failed to process the server response. Please try again.', {
    code: 'parse_error',
    userMessage: 'We received an unexpected response from the server. Please try again.',
    details: original,
  });
}

function buildUrl(baseUrl: string, endpoint: string, query?: RequestOptions['query']): string {
  const params = new URLSearchParams();
  Object.entries(query ?? {}).forEach(([key, value]) => {
    if (value !== undefined && value !== '') {
      params.append(key, value);
    }
  });
  const search = params.toString();
  return `${baseUrl.replace(/\/+$/, '')}${endpoint}${search ? `?${search}` : ''}`;
}

export function createApiClient(config: ApiClientConfig) {
  const {
    baseUrl,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    fetchImpl = fetch,
    enableLogging = false,
  } = config;

  async function fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await fetchImpl(url, { ...init, signal: controller.signal });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Send a request and return the successful response. Only GET retries by
   * default; POST bodies are not replayed unless `retry` is set.
   */
  async function send(endpoint: string, options: RequestOptions = {}): Promise<Response> {
    const method = options.method ?? 'GET';
    const headers: Record<string, string> = { ...options.headers };
    let body: string | Uint8Array | undefined = options.body;

    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    const url = buildUrl(baseUrl, endpoint, options.query);
    const maxRetries = options.retry ?? (method === 'GET' ? 2 : 0);

    for (let attempt = 0; ; attempt++) {
      let error: ApiError;
      try {
        if (enableLogging) {
          console.log(`[API] ${method} ${url} (attempt ${attempt + 1})`);
        }
        const response = await fetchWithTimeout(url, { method, headers, body });
        if (response.ok) {
          return response;
        }
        error = await buildApiError(response);
        if (enableLogging) {
          console.error('[API] HTTP Error', {
            status: error.status,
            code: error.code,
            message: error.message,
          });
        }
      } catch (err) {
        error = buildNetworkError(err);
      }

      if (attempt >= maxRetries || !error.retriable) {
        throw error;
      }
      await sleep(250 * (attempt + 1));
    }
  }

  async function requestJson<T>(endpoint: string, options: RequestOptions = {}): Promise<T> {
    const response = await send(endpoint, options);
    const rawBody = await response.text();
    try {
      const parsed: T = JSON.parse(rawBody);
      return parsed;
    } catch (parseError) {
      throw buildParseError(parseError);
    }
  }

  return {
    health: () => requestJson<HealthStatus>('/health'),

    /** Spoken-style answer for one utterance, e.g. "Paracetamol - 500mg". */
    query: async (text: string): Promise<string> => {
      const result = await requestJson<{ reply: string }>('/v1/query', {
        method: 'POST',
        json: { text },
      });
      return result.reply;
    },

    searchMedicines: async (
      filters: { q?: string; className?: string } = {},
    ): Promise<Medicine[]> => {
      const result = await requestJson<{ medicines: Medicine[] }>('/v1/medicines', {
        query: { q: filters.q, class: filters.className },
      });
      return result.medicines;
    },

    getMedicine: async (query: string): Promise<Medicine> => {
      const result = await requestJson<{ medicine: Medicine }>(
        `/v1/medicines/${encodeURIComponent(query)}`,
      );
      return result.medicine;
    },

    getBrands: async (query: string): Promise<Brand[]> => {
      const result = await requestJson<{ brands: Brand[] }>(
        `/v1/medicines/${encodeURIComponent(query)}/brands`,
      );
      return result.brands;
    },

    checkInteraction: async (med1: string, med2: string): Promise<Interaction | null> => {
      const result = await requestJson<{ interaction: Interaction | null }>('/v1/interactions', {
        query: { med1, med2 },
      });
      return result.interaction;
    },

    transcribe: (audio: Uint8Array, options: TranscribeOptions) =>
      requestJson<TranscriptionResult>('/v1/voice/transcribe', {
        method: 'POST',
        body: audio,
        headers: { 'Content-Type': options.contentType },
        query: { model: options.model, language: options.language },
      }),

    chat: (prompt: string, options: ChatOptions = {}) =>
      requestJson<ChatReply>('/v1/assistant/chat', {
        method: 'POST',
        json: { prompt, ...options },
      }),

    /** MP3 bytes for the given text. */
    speak: async (text: string, options: SpeakOptions = {}): Promise<ArrayBuffer> => {
      const response = await send('/v1/voice/speak', {
        method: 'POST',
        json: { text, ...options },
      });
      return response.arrayBuffer();
    },
  };
}

export type ApiClient = ReturnType<typeof createApiClient>;
