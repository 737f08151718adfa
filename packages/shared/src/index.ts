/**
 * @chatscribe/shared
 * Shared types, utilities, and configuration for Chatscribe
 */

export * from './types/index.js';
export * from './config/index.js';
export * from './logger/index.js';
export * from './errors/index.js';
