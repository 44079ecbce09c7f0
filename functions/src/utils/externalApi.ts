import axios from 'axios';

/**
 * Rate limits and server errors are worth one more try; anything else is not.
 */
export function isRetryableStatus(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }
  const status = error.response?.status;
  return status === 429 || (!!status && status >= 500);
}

/**
 * Flatten an external API failure into loggable fields without the request
 * config, which carries the API key.
 */
export function describeExternalError(error: unknown): Record<string, unknown> {
  if (axios.isAxiosError(error)) {
    return {
      message: error.message,
      code: error.code,
      status: error.response?.status,
    };
  }
  return { message: error instanceof Error ? error.message : String(error) };
}
