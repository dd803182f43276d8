export * from './dto';
export { resolveId, toComment, toPost, toUser } from './models';
export type { Comment, EntityRef, Post, User } from './models';
