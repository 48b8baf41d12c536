/**
 * Jest setup: keep structured log lines out of the test report.
 * Tests that assert on logging read the spies directly.
 */

import { resetLogger } from '../logger';

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
  resetLogger();
});
