/**
 * Common pagination defaults
 */

export const DEFAULT_PAGE_LIMIT = 10
export const DEFAULT_PAGE_OFFSET = 0
