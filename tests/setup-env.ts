/**
 * Jest Environment Setup
 * Runs BEFORE test framework is installed
 */

// Silence dotenv startup logs in Jest runs.
process.env.DOTENV_CONFIG_QUIET = 'true';

// Set test environment variables
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
