/**
 * Vitest setup file
 * Runs before all tests
 */

import { beforeAll, afterAll } from 'vitest';
import { logger } from '../src/shared/utils/logger.js';

beforeAll(() => {
  // Keep warnings from config and client code out of test output
  logger.setSilent(true);
});

afterAll(() => {
  logger.setSilent(false);
});
