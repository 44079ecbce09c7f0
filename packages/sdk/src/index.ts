export { createApiClient } from './api-client';
export type {
  ApiClient,
  ApiClientConfig,
  ChatOptions,
  SpeakOptions,
  TranscribeOptions,
} from './api-client';
export * from './models';
