/**
 * Configuration System
 *
 * Layered configuration:
 * - Default values (hardcoded)
 * - JSON config file (optional)
 * - Environment variables
 */

export * from './defaults';
export * from './loader';
