/**
 * Centralized strings and messages for user-facing text
 */

export * from './errors.js';
