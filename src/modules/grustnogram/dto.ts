/**
 * Grustnogram wire DTOs
 *
 * zod schemas for the `data` payloads, in the API's snake_case.
 */

import { z } from 'zod';

// ============================================================================
// Entities
// ============================================================================

export const commentSchema = z.object({
  id: z.number(),
  nickname: z.string(),
  comment: z.string(),
  created_at: z.number(),
});

export type CommentDTO = z.infer<typeof commentSchema>;

// The API returns users with the same field set as comments
export const userSchema = commentSchema;

export type UserDTO = z.infer<typeof userSchema>;

export const postSchema = z.object({
  id: z.number(),
  url: z.string(),
  media: z.string(),
  text: z.string(),
  user: userSchema,
  likes_count: z.number(),
  comments_count: z.number(),
  created_at: z.number(),
});

export type PostDTO = z.infer<typeof postSchema>;

export const commentListSchema = z.array(commentSchema);

// ============================================================================
// Session / registration
// ============================================================================

export const sessionDataSchema = z.object({
  access_token: z.string().min(1),
});

export const registerDataSchema = z.object({
  phone_key: z.union([z.string(), z.number()]),
});

/**
 * Mutations whose payload is not used
 */
export const ignoredDataSchema = z.unknown();

// ============================================================================
// Request bodies
// ============================================================================

export interface LoginRequest {
  email: string;
  password: string;
}

export interface CreateUserRequest {
  nickname: string;
  email: string;
  password: string;
  password_confirm: string;
}

export interface CallMeRequest {
  phone_key: string | number;
  phone: string;
}

export interface PhoneActivateRequest {
  code: string;
  phone: string;
}

export interface CreateCommentRequest {
  comment: string;
}

export interface ListCommentsRequest {
  limit: number;
  offset: number;
}

export interface ComplaintRequest {
  type: number;
  text: string | null;
}
