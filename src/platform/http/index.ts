/**
 * Platform HTTP Layer - Public API
 *
 * Export all public HTTP utilities and types.
 */

// HTTP Client
export { createHttpClient, request, get, post, del } from './httpClient';
export type { HttpClientOptions, HttpMethod } from './httpClient';

// Envelope
export { unwrapEnvelope, resolveEnvelopeError, ERROR_PRIORITY } from './envelope';

// Error Types
export {
  GrustnogramError,
  ApiError,
  EmailExistsError,
  LoginExistsError,
  UserNotFoundError,
  BadCredentialsError,
  UnknownApiError,
  TransportError,
  NetworkError,
  TimeoutError,
  ResponseFormatError,
} from './errors';

// Re-export Axios types for convenience
export type { AxiosAdapter, AxiosInstance } from 'axios';
