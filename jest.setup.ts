/**
 * Jest setup file.
 * Silence the pino logger before any module reads CONFIG.
 */

process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL || 'silent';

export {};
