/**
 * @module wirebox/domain
 * @description Domain layer exports
 */

// ============================================================================
// Type Keys & Injection Errors
// ============================================================================

export * from './di';
