/**
 * Platform HTTP Layer - Envelope Validation
 *
 * Every response body is `{ err: number[], data }`. An `err` list that is
 * empty or holds only blank entries (0, false, null, "") means success;
 * otherwise the first code found in ERROR_PRIORITY picks the error class,
 * and anything else collapses to UnknownApiError carrying the raw envelope.
 */

import { ApiErrorCode, envelopeSchema } from '../../modules/common';
import {
  ApiError,
  BadCredentialsError,
  EmailExistsError,
  LoginExistsError,
  ResponseFormatError,
  UnknownApiError,
  UserNotFoundError,
} from './errors';

type KnownErrorFactory = (errorCodes: readonly number[], status?: number, envelope?: unknown) => ApiError;

const ERROR_TABLE: Record<ApiErrorCode, KnownErrorFactory> = {
  [ApiErrorCode.EMAIL_EXISTS]: (codes, status, envelope) => new EmailExistsError(codes, status, envelope),
  [ApiErrorCode.LOGIN_EXISTS]: (codes, status, envelope) => new LoginExistsError(codes, status, envelope),
  [ApiErrorCode.USER_NOT_FOUND]: (codes, status, envelope) => new UserNotFoundError(codes, status, envelope),
  [ApiErrorCode.BAD_CREDENTIALS]: (codes, status, envelope) => new BadCredentialsError(codes, status, envelope),
};

export const ERROR_PRIORITY: readonly ApiErrorCode[] = [
  ApiErrorCode.EMAIL_EXISTS,
  ApiErrorCode.LOGIN_EXISTS,
  ApiErrorCode.USER_NOT_FOUND,
  ApiErrorCode.BAD_CREDENTIALS,
];

function isBlankEntry(entry: unknown): boolean {
  return entry === 0 || entry === false || entry === null || entry === '';
}

/**
 * Map an `err` list to the error it raises, or null for success.
 * Non-numeric entries count as unknown errors; `errorCodes` keeps the numeric ones.
 */
export function resolveEnvelopeError(
  entries: readonly unknown[],
  envelope: unknown,
  status?: number
): ApiError | null {
  if (entries.every(isBlankEntry)) {
    return null;
  }

  const errorCodes = entries.filter((entry): entry is number => typeof entry === 'number');
  const known = ERROR_PRIORITY.find((code) => errorCodes.includes(code));
  if (known !== undefined) {
    return ERROR_TABLE[known](errorCodes, status, envelope);
  }

  return new UnknownApiError(envelope, errorCodes, status);
}

/**
 * Validate a response body and return its `data` payload
 * @throws ApiError when the envelope reports errors
 * @throws ResponseFormatError when the body is not an envelope
 */
export function unwrapEnvelope(body: unknown, status?: number): unknown {
  const parsed = envelopeSchema.safeParse(body);
  if (!parsed.success) {
    throw new ResponseFormatError('Response body is not a valid API envelope', status, {
      issues: parsed.error.issues,
      body: typeof body === 'string' ? body.slice(0, 200) : body,
    });
  }

  const error = resolveEnvelopeError(parsed.data.err ?? [], body, status);
  if (error) {
    throw error;
  }

  return parsed.data.data;
}
