/**
 * Platform HTTP Layer - HTTP Client
 *
 * Per-session Axios instance with pre-configured:
 * - Base URL and timeout
 * - Fixed accept/content-type/user-agent headers
 * - Request/response interceptors
 * - Session token injection
 *
 * The API declares a form-urlencoded content type but reads JSON text from
 * the body, so bodies are serialized here and passed to axios as strings.
 */

import axios from 'axios';
import type { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import type { z } from 'zod';
import type { PlatformConfig } from '../config';
import { SessionStore } from '../auth';
import { installRequestInterceptor, installResponseInterceptor } from './interceptors';
import { unwrapEnvelope } from './envelope';
import { ResponseFormatError } from './errors';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface HttpClientOptions extends PlatformConfig {
  session: SessionStore;
  /** Transport override; defaults to the axios Node adapter */
  adapter?: AxiosAdapter;
}

/**
 * Create and configure the Axios instance
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  const instance = axios.create({
    baseURL: options.apiBaseUrl,
    timeout: options.apiTimeout,
    headers: {
      accept: 'application/json',
      'content-type': 'application/x-www-form-urlencoded',
      'user-agent': options.userAgent,
    },
    // Error envelopes arrive with any status; unwrapEnvelope decides
    validateStatus: () => true,
    adapter: options.adapter,
  });

  installRequestInterceptor(instance, options.session, options.debug);
  installResponseInterceptor(instance, options.debug);

  return instance;
}

function ensureNonHtmlResponse(response: AxiosResponse<unknown>): void {
  const contentType = String(response.headers?.['content-type'] || '').toLowerCase();
  const looksLikeHtmlString =
    typeof response.data === 'string' && /^\s*<!doctype html|^\s*<html/i.test(response.data);

  if (contentType.includes('text/html') || looksLikeHtmlString) {
    throw new ResponseFormatError('Non-JSON response received from API endpoint', response.status, {
      contentType,
      preview: String(response.data).slice(0, 200),
      url: response.config.url,
    });
  }
}

/**
 * Send one request and return its validated `data` payload
 */
export async function request<S extends z.ZodTypeAny>(
  http: AxiosInstance,
  method: HttpMethod,
  url: string,
  schema: S,
  body?: object
): Promise<z.output<S>> {
  const response = await http.request<unknown>({
    method,
    url,
    data: body === undefined ? undefined : JSON.stringify(body),
  });
  ensureNonHtmlResponse(response);

  const data = unwrapEnvelope(response.data, response.status);
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new ResponseFormatError(`Unexpected payload from ${method} ${url}`, response.status, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/**
 * Type-safe GET request wrapper (the body carries query parameters on this API)
 */
export function get<S extends z.ZodTypeAny>(
  http: AxiosInstance,
  url: string,
  schema: S,
  body?: object
): Promise<z.output<S>> {
  return request(http, 'GET', url, schema, body);
}

/**
 * Type-safe POST request wrapper
 */
export function post<S extends z.ZodTypeAny>(
  http: AxiosInstance,
  url: string,
  schema: S,
  body?: object
): Promise<z.output<S>> {
  return request(http, 'POST', url, schema, body);
}

/**
 * Type-safe DELETE request wrapper
 */
export function del<S extends z.ZodTypeAny>(
  http: AxiosInstance,
  url: string,
  schema: S
): Promise<z.output<S>> {
  return request(http, 'DELETE', url, schema);
}
