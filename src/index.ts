/**
 * bracecheck - per-line bracket balance diagnostics.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Scanning
export * from './core/scanner/index.js';

// Output
export * from './cli/formatters/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
export { runCheck, resolveCheckSettings } from './cli/commands/check.js';
