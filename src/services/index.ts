/**
 * Services Layer - Unified Export
 *
 * - grustnogram.service.ts: session, registration, likes, comments, complaints, post deletion
 */

export { GrustnogramClient } from './grustnogram.service';
export type { AuthResult, ClientOptions, VerificationCodeProvider } from './grustnogram.service';
