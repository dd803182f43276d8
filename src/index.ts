/**
 * grustnogram-client
 *
 * @example
 * const client = new GrustnogramClient();
 * await client.login('alice@example.com', 'secret');
 * const comments = await client.getComments(42);
 * await client.likeComment(comments[0]);
 */

export { GrustnogramClient } from './services';
export type { AuthResult, ClientOptions, VerificationCodeProvider } from './services';

export { ComplaintType, ApiErrorCode, toComment, toPost, toUser } from './modules';
export type { Comment, EntityRef, Envelope, Post, User } from './modules';

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
} from './platform/http';

export { appInfo } from './platform/config';
