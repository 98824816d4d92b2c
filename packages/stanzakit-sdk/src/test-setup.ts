/**
 * Global test setup file for Vitest.
 *
 * This file is loaded before each test file.
 */

import { beforeEach, vi } from 'vitest'

// Silence console output in tests to reduce noise. Re-applied before each
// test since suites call vi.restoreAllMocks() after their own spies.
beforeEach(() => {
  vi.spyOn(console, 'debug').mockImplementation(() => {})
  vi.spyOn(console, 'info').mockImplementation(() => {})
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
})
