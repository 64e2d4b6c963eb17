/**
 * @arch testsmith.core.barrel
 */
export * from './schema.js';
export * from './loader.js';
