/**
 * Platform Config Layer - Public API
 *
 * Export all public configuration utilities.
 */

export { config, parseEnv, resolveConfig } from './env';
export type { PlatformConfig } from './env';
export { appInfo, defaultUserAgent } from './appInfo';
export type { AppInfo } from './appInfo';
