/**
 * Dugout Types - Shared TypeScript interfaces
 */

export * from './entity.js';
export * from './catalog.js';
export * from './article.js';
export * from './stats.js';
export * from './outcome.js';
export * from './config.js';
