/**
 * Jest Environment Setup
 * Runs BEFORE each test file loads its modules, so the config module sees
 * these values when it parses the environment.
 */

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
process.env.LOG_FORMAT = 'pretty';
delete process.env.LOG_FILE;
