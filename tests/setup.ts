/**
 * Vitest test setup file
 * Runs before all tests
 */

// Keep test output free of log lines (NODE_ENV is already set by Vitest)
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
