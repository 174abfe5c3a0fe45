/**
 * Vitest setup file
 * This file runs before each test file
 */

import { afterEach, beforeAll, vi } from 'vitest';

afterEach(() => {
  vi.restoreAllMocks();
});

// Longer timeouts in CI environment
if (process.env.CI) {
  beforeAll(() => {
    vi.setConfig({ testTimeout: 30000, hookTimeout: 30000 });
  });
}
