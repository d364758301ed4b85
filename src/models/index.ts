/**
 * Models
 */

export * from './enums.js';
export * from './interfaces.js';
export * from './events.js';
