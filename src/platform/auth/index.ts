/**
 * Platform Auth Layer - Public API
 *
 * Export all public auth utilities.
 */

export { SessionStore, ACCESS_TOKEN_HEADER, maskToken } from './session';
