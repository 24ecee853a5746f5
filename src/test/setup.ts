// Global test setup for Vitest
import { afterEach, beforeEach, vi } from 'vitest';
import { setContractChecks } from '../client/swipe-back/errors.js';
import { setDebugMode, setLogTransport } from '../client/utils/logger.js';

beforeEach(() => {
  setContractChecks(true);
  setDebugMode(false);
  setLogTransport(null);
});

afterEach(() => {
  vi.restoreAllMocks();
});
