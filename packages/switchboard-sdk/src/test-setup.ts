/**
 * Global test setup file for Vitest.
 *
 * This file is loaded before each test file and sets up global mocks.
 */

import { vi } from 'vitest'

// Tests never reach the network; upload tests install their own fetch mock
const mockFetch: typeof fetch = () =>
  Promise.reject(new Error('Test mock: Network request not allowed'))

globalThis.fetch = mockFetch

// Silence SDK logging; calls are cleared before each test so log lines can be asserted
vi.spyOn(console, 'info').mockImplementation(() => {})
vi.spyOn(console, 'warn').mockImplementation(() => {})
vi.spyOn(console, 'error').mockImplementation(() => {})
