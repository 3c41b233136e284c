/**
 * Vitest test setup
 *
 * This file runs before each test file.
 */

import { afterEach, beforeEach, vi } from "vitest";

import { logToStderr, setLogLevel } from "@/lib/logger";

beforeEach(() => {
  // Engine logging is noise in test output; tests that assert on it spy on console
  setLogLevel("silent");
  logToStderr(false);
});

// Clean up after each test
afterEach(() => {
  vi.restoreAllMocks();
});
