/**
 * Test Helper Functions
 * In-process axios adapter that records requests and replays scripted envelopes
 */

import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import type { CommentDTO } from '../modules/grustnogram';

export interface RecordedRequest {
  method: string;
  baseURL?: string;
  url: string;
  timeout?: number;
  /** Header names lower-cased */
  headers: Record<string, string>;
  /** Raw request body as sent */
  rawBody: unknown;
  /** Body parsed back from JSON, undefined when there is none */
  body: unknown;
}

export type ScriptedReply =
  | { status?: number; body: unknown; contentType?: string }
  | { error: Error };

function recordRequest(config: InternalAxiosRequestConfig): RecordedRequest {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(config.headers.toJSON(true))) {
    if (typeof value === 'string') {
      headers[key.toLowerCase()] = value;
    }
  }

  return {
    method: (config.method ?? 'get').toUpperCase(),
    baseURL: config.baseURL,
    url: config.url ?? '',
    timeout: config.timeout,
    headers,
    rawBody: config.data,
    body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
  };
}

/**
 * Create an adapter answering with `replies` in order.
 * Object bodies are sent as JSON text; string bodies are sent verbatim.
 */
export function createFakeAdapter(replies: ScriptedReply[]) {
  const requests: RecordedRequest[] = [];
  const queue = [...replies];

  const adapter: AxiosAdapter = async (config) => {
    requests.push(recordRequest(config));

    const next = queue.shift();
    if (!next) {
      throw new Error(`No scripted reply for ${config.method} ${config.url}`);
    }
    if ('error' in next) {
      throw next.error;
    }

    const response: AxiosResponse = {
      data: typeof next.body === 'string' ? next.body : JSON.stringify(next.body),
      status: next.status ?? 200,
      statusText: 'OK',
      headers: { 'content-type': next.contentType ?? 'application/json' },
      config,
    };
    return response;
  };

  return { adapter, requests };
}

/**
 * Successful envelope
 */
export function ok(data: unknown = null): ScriptedReply {
  return { body: { err: [], data } };
}

/**
 * Error envelope
 */
export function fail(codes: number[], status: number = 200): ScriptedReply {
  return { status, body: { err: codes, data: null } };
}

export function createMockCommentDTO(overrides?: Partial<CommentDTO>): CommentDTO {
  return {
    id: 1,
    nickname: 'test-user',
    comment: 'Test comment',
    created_at: 1700000000,
    ...overrides,
  };
}
