/**
 * Core type exports for Eventsmith
 */

export * from './records.js';
export * from './transform.js';
export * from './config.js';
