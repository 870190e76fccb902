import { jest } from '@jest/globals';

// Engine calls are faked in unit tests; nothing should take this long
jest.setTimeout(10000);

// Keep pino quiet unless a test opts in
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
