/**
 * Platform Configuration - Environment Variables
 *
 * Centralized environment variable access for the platform layer.
 * All config values should be read from here, not directly from process.env.
 */

import { defaultUserAgent } from './appInfo';

export interface PlatformConfig {
  /** API base URL (default: https://api.grustnogram.ru) */
  apiBaseUrl: string;

  /** Request timeout in milliseconds, 0 leaves it to the transport (default: 0) */
  apiTimeout: number;

  /** Value of the user-agent header */
  userAgent: string;

  /** Enable request/response debug logging (default: false) */
  debug: boolean;
}

type Env = Record<string, string | undefined>;

const DEFAULT_BASE_URL = 'https://api.grustnogram.ru';

function isValidTimeout(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

/**
 * Parse and validate environment variables
 */
export function parseEnv(env: Env = process.env): PlatformConfig {
  const apiBaseUrl = env.GRUSTNOGRAM_API_BASE_URL || DEFAULT_BASE_URL;
  const apiTimeout = parseInt(env.GRUSTNOGRAM_API_TIMEOUT || '0', 10);
  const userAgent = env.GRUSTNOGRAM_USER_AGENT || defaultUserAgent();
  const debug = env.GRUSTNOGRAM_DEBUG === 'true';

  // Validate critical values
  const timeoutValid = isValidTimeout(apiTimeout);
  if (!timeoutValid) {
    console.warn('[Grustnogram] Invalid GRUSTNOGRAM_API_TIMEOUT, falling back to transport default');
  }

  return {
    apiBaseUrl: apiBaseUrl.replace(/\/+$/, ''),
    apiTimeout: timeoutValid ? apiTimeout : 0,
    userAgent,
    debug,
  };
}

/**
 * Platform configuration singleton
 */
export const config: PlatformConfig = parseEnv();

/**
 * Overlay per-client options on the environment configuration.
 * A timeout override that is negative or not finite is ignored with a warning.
 */
export function resolveConfig(
  overrides: Partial<PlatformConfig> = {},
  base: PlatformConfig = config
): PlatformConfig {
  let apiTimeout = base.apiTimeout;
  if (overrides.apiTimeout !== undefined) {
    if (isValidTimeout(overrides.apiTimeout)) {
      apiTimeout = overrides.apiTimeout;
    } else {
      console.warn(
        `[Grustnogram] Invalid timeout option ${overrides.apiTimeout}, using ${base.apiTimeout}`
      );
    }
  }

  return {
    apiBaseUrl: (overrides.apiBaseUrl ?? base.apiBaseUrl).replace(/\/+$/, ''),
    apiTimeout,
    userAgent: overrides.userAgent ?? base.userAgent,
    debug: overrides.debug ?? base.debug,
  };
}

if (config.debug) {
  console.log('[Grustnogram] Configuration loaded:', {
    apiBaseUrl: config.apiBaseUrl,
    apiTimeout: config.apiTimeout,
    userAgent: config.userAgent,
  });
}
