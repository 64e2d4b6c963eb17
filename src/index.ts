/**
 * @arch testsmith.barrel
 *
 * Testsmith - pytest scaffolding from Python source.
 * Main library exports barrel file.
 */

// Pipeline, configuration and data model
export * from './core/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
