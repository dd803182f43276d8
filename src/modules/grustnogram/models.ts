/**
 * Grustnogram domain models
 *
 * Immutable snapshots of server entities. They carry no client reference;
 * act on them by passing them (or their id) to GrustnogramClient.
 */

import type { CommentDTO, PostDTO, UserDTO } from './dto';

export interface User {
  readonly id: number;
  readonly nickname: string;
  readonly comment: string;
  readonly createdAt: number;
}

export interface Comment {
  readonly id: number;
  readonly nickname: string;
  /** Comment text */
  readonly comment: string;
  readonly createdAt: number;
}

export interface Post {
  readonly id: number;
  readonly url: string;
  readonly media: string;
  readonly text: string;
  readonly user: User;
  readonly likesCount: number;
  readonly commentsCount: number;
  readonly createdAt: number;
}

/**
 * A numeric id or any entity carrying one
 */
export type EntityRef = number | { readonly id: number };

export function resolveId(ref: EntityRef): number {
  const id = typeof ref === 'number' ? ref : ref.id;
  if (!Number.isInteger(id)) {
    throw new TypeError(`Invalid entity id: ${String(id)}`);
  }
  return id;
}

// ============================================================================
// Mappers
// ============================================================================

export function toUser(dto: UserDTO): User {
  return Object.freeze({
    id: dto.id,
    nickname: dto.nickname,
    comment: dto.comment,
    createdAt: dto.created_at,
  });
}

export function toComment(dto: CommentDTO): Comment {
  return Object.freeze({
    id: dto.id,
    nickname: dto.nickname,
    comment: dto.comment,
    createdAt: dto.created_at,
  });
}

export function toPost(dto: PostDTO): Post {
  return Object.freeze({
    id: dto.id,
    url: dto.url,
    media: dto.media,
    text: dto.text,
    user: toUser(dto.user),
    likesCount: dto.likes_count,
    commentsCount: dto.comments_count,
    createdAt: dto.created_at,
  });
}
