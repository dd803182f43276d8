/**
 * Grustnogram Service
 *
 * API client for Grustnogram:
 * - Session login and phone-verified registration
 * - Likes on posts and comments
 * - Comments (create, list, delete)
 * - Complaints and post deletion
 *
 * Each instance owns one session. Build a fresh client per logical session.
 */

import type { AxiosAdapter, AxiosInstance } from 'axios';
import { SessionStore, maskToken } from '../platform/auth';
import { resolveConfig } from '../platform/config';
import type { PlatformConfig } from '../platform/config';
import { createHttpClient, del, get, post } from '../platform/http';
import {
  DEFAULT_PAGE_LIMIT,
  DEFAULT_PAGE_OFFSET,
  isComplaintType,
} from '../modules/common';
import type { ComplaintType } from '../modules/common';
import {
  commentListSchema,
  commentSchema,
  ignoredDataSchema,
  registerDataSchema,
  resolveId,
  sessionDataSchema,
  toComment,
} from '../modules/grustnogram';
import type {
  CallMeRequest,
  Comment,
  ComplaintRequest,
  CreateCommentRequest,
  CreateUserRequest,
  EntityRef,
  ListCommentsRequest,
  LoginRequest,
  PhoneActivateRequest,
} from '../modules/grustnogram';

export interface ClientOptions {
  baseUrl?: string;
  /** Milliseconds; 0 leaves it to the transport */
  timeout?: number;
  userAgent?: string;
  debug?: boolean;
  /** Resume an existing session */
  accessToken?: string;
  /** Transport override, mainly for tests */
  adapter?: AxiosAdapter;
}

export interface AuthResult {
  success: true;
  accessToken: string;
}

/**
 * Supplies the code read out by the verification call
 */
export type VerificationCodeProvider = () => string | Promise<string>;

export class GrustnogramClient {
  private readonly session: SessionStore;
  private readonly http: AxiosInstance;
  private readonly config: PlatformConfig;

  constructor(options: ClientOptions = {}) {
    this.config = resolveConfig({
      apiBaseUrl: options.baseUrl,
      apiTimeout: options.timeout,
      userAgent: options.userAgent,
      debug: options.debug,
    });
    this.session = new SessionStore(options.accessToken ?? null, this.config.debug);
    this.http = createHttpClient({
      ...this.config,
      session: this.session,
      adapter: options.adapter,
    });
  }

  // ==========================================================================
  // Session
  // ==========================================================================

  getAccessToken(): string | null {
    return this.session.getToken();
  }

  isAuthenticated(): boolean {
    return this.session.hasToken();
  }

  restoreSession(accessToken: string): void {
    this.session.setToken(accessToken);
  }

  /**
   * Forget the token locally. The server-side session is untouched.
   */
  clearSession(): void {
    this.session.clearToken();
  }

  /**
   * Authenticate with login (email) and password
   * @throws UserNotFoundError, BadCredentialsError
   */
  async login(login: string, password: string): Promise<AuthResult> {
    const body: LoginRequest = { email: login, password };
    const data = await post(this.http, '/sessions', sessionDataSchema, body);
    return this.startSession(data.access_token);
  }

  /**
   * Register a new account: create the user, have the service call the
   * phone, then confirm the code from `codeProvider`. Any failing step
   * aborts the flow; an account left pending server-side is not cleaned up.
   * @throws EmailExistsError, LoginExistsError
   */
  async register(
    nickname: string,
    email: string,
    password: string,
    phone: string,
    codeProvider: VerificationCodeProvider
  ): Promise<AuthResult> {
    const createUser: CreateUserRequest = {
      nickname,
      email,
      password,
      password_confirm: password,
    };
    const { phone_key } = await post(this.http, '/users', registerDataSchema, createUser);

    const callMe: CallMeRequest = { phone_key, phone };
    await post(this.http, '/callme', ignoredDataSchema, callMe);

    const code = await codeProvider();
    const activate: PhoneActivateRequest = { code, phone };
    const data = await post(this.http, '/phoneactivate', sessionDataSchema, activate);

    return this.startSession(data.access_token);
  }

  private startSession(accessToken: string): AuthResult {
    this.session.setToken(accessToken);
    if (this.config.debug) {
      console.log(`[Grustnogram] Session started (${maskToken(accessToken)})`);
    }
    return { success: true, accessToken };
  }

  // ==========================================================================
  // Likes
  // ==========================================================================

  async likePost(postRef: EntityRef): Promise<true> {
    await post(this.http, `/posts/${resolveId(postRef)}/like`, ignoredDataSchema);
    return true;
  }

  async dislikePost(postRef: EntityRef): Promise<true> {
    await del(this.http, `/posts/${resolveId(postRef)}/like`, ignoredDataSchema);
    return true;
  }

  async likeComment(commentRef: EntityRef): Promise<true> {
    await post(this.http, `/comments/${resolveId(commentRef)}/like`, ignoredDataSchema);
    return true;
  }

  async dislikeComment(commentRef: EntityRef): Promise<true> {
    await del(this.http, `/comments/${resolveId(commentRef)}/like`, ignoredDataSchema);
    return true;
  }

  // ==========================================================================
  // Comments
  // ==========================================================================

  async commentPost(postRef: EntityRef, text: string): Promise<Comment> {
    const body: CreateCommentRequest = { comment: text };
    const data = await post(this.http, `/posts/${resolveId(postRef)}/comments`, commentSchema, body);
    return toComment(data);
  }

  /**
   * Comment deletion lives under /posts/comment/{id} on this API
   */
  async deleteComment(commentRef: EntityRef): Promise<true> {
    await del(this.http, `/posts/comment/${resolveId(commentRef)}`, ignoredDataSchema);
    return true;
  }

  /**
   * One page of a post's comments, in server order
   */
  async getComments(
    postRef: EntityRef,
    limit: number = DEFAULT_PAGE_LIMIT,
    offset: number = DEFAULT_PAGE_OFFSET
  ): Promise<Comment[]> {
    const body: ListCommentsRequest = { limit, offset };
    const data = await get(this.http, `/posts/${resolveId(postRef)}/comments`, commentListSchema, body);
    return data.map(toComment);
  }

  // ==========================================================================
  // Posts
  // ==========================================================================

  /**
   * File a complaint against a post
   * @throws RangeError for a type outside ComplaintType, before any request
   */
  async complaint(postRef: EntityRef, complaintType: ComplaintType, text?: string): Promise<true> {
    if (!isComplaintType(complaintType)) {
      throw new RangeError(`Unsupported complaint type: ${String(complaintType)}`);
    }
    const body: ComplaintRequest = { type: complaintType, text: text ?? null };
    await post(this.http, `/posts/${resolveId(postRef)}/complaint`, ignoredDataSchema, body);
    return true;
  }

  async deletePost(postRef: EntityRef): Promise<true> {
    await del(this.http, `/posts/${resolveId(postRef)}`, ignoredDataSchema);
    return true;
  }
}
