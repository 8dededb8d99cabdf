/**
 * Jest setup: keep test output quiet unless a level is requested explicitly.
 */

process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
