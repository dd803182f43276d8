/**
 * Platform HTTP Layer - Axios Interceptors
 *
 * Request and response interceptors for unified behavior:
 * - Auto-inject the session token on authenticated endpoints
 * - Transport error transformation
 * - Debug logging
 */

import axios from 'axios';
import type { AxiosInstance, InternalAxiosRequestConfig, AxiosResponse } from 'axios';
import { ACCESS_TOKEN_HEADER, SessionStore, maskToken } from '../auth';
import { GrustnogramError, NetworkError, TimeoutError, TransportError } from './errors';

/**
 * Endpoints that establish a session and never carry the token
 */
const PUBLIC_PATHS: readonly string[] = ['/sessions', '/users', '/callme', '/phoneactivate'];

/**
 * Check if a request path needs the session credential
 */
export function requiresSession(url?: string): boolean {
  if (!url) return true;
  const path = url.split('?')[0];
  return !PUBLIC_PATHS.includes(path);
}

function describeRequest(config: InternalAxiosRequestConfig): string {
  return `${(config.method ?? 'get').toUpperCase()} ${config.url ?? ''}`;
}

/**
 * Install request interceptor
 * Adds the access-token header and logs the request
 */
export function installRequestInterceptor(
  axiosInstance: AxiosInstance,
  session: SessionStore,
  debug: boolean = false
): void {
  axiosInstance.interceptors.request.use((config: InternalAxiosRequestConfig) => {
    if (requiresSession(config.url)) {
      // Read at dispatch time so a later login is picked up
      const token = session.getToken();
      if (token && !config.headers.has(ACCESS_TOKEN_HEADER)) {
        config.headers.set(ACCESS_TOKEN_HEADER, token);
      } else if (!token) {
        console.warn(`[Grustnogram/HTTP] ${describeRequest(config)} sent without a session token. Log in first.`);
      }
    }

    if (debug) {
      const token = config.headers.get(ACCESS_TOKEN_HEADER);
      console.debug('[Grustnogram/HTTP] Request:', {
        method: config.method?.toUpperCase(),
        url: config.url,
        token: typeof token === 'string' ? maskToken(token) : undefined,
      });
    }

    return config;
  });
}

/**
 * Install response interceptor
 * Every HTTP status resolves (the envelope decides success), so only
 * transport failures reach the error handler.
 */
export function installResponseInterceptor(axiosInstance: AxiosInstance, debug: boolean = false): void {
  axiosInstance.interceptors.response.use(
    (response: AxiosResponse) => {
      if (debug) {
        console.debug('[Grustnogram/HTTP] Response:', {
          status: response.status,
          url: response.config.url,
        });
      }
      return response;
    },

    (error: unknown) => {
      const transformedError = transformError(error);

      console.error('[Grustnogram/HTTP] Request failed:', {
        type: transformedError.name,
        code: transformedError.code,
        message: transformedError.message,
      });

      return Promise.reject(transformedError);
    }
  );
}

/**
 * Transform transport failures to TransportError types
 */
export function transformError(error: unknown): GrustnogramError {
  if (error instanceof GrustnogramError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || error.message.includes('timeout')) {
      return new TimeoutError('Request timeout - server did not respond in time', {
        originalError: error.message,
      });
    }

    return new NetworkError('Network error - unable to reach server', {
      originalError: error.message,
      code: error.code,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`Request failed: ${message}`, 'TRANSPORT_ERROR', undefined, {
    originalError: message,
  });
}
