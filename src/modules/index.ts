/**
 * Modules - Unified Export
 *
 * - common: envelope, pagination and enum types shared by every endpoint
 * - grustnogram: wire DTOs, domain models and mappers
 */

export * from './common';
export * from './grustnogram';
