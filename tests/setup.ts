/**
 * Global test setup for Vitest.
 *
 * This file runs before all tests. It configures the test environment
 * and sets up mock cleanup between tests.
 */

import { beforeEach, vi } from 'vitest';

// Set test environment variables before any imports
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'warn';
process.env.EMAIL_ADDRESS = 'relay@example.com';
process.env.EMAIL_PASSWORD = 'test-password';
process.env.ANTHROPIC_API_KEY = 'test-api-key';
process.env.TARGET_PHONE_NUMBER = '15052897944';

// Import mocks
import { clearMockState } from './mocks/anthropic.js';

// Reset mocks before each test
beforeEach(() => {
  vi.clearAllMocks();
  clearMockState();
});
