/**
 * Vitest configuration
 *
 * All tests run in a plain Node.js environment. Nothing reaches the network:
 * transports are replaced by in-process stubs or a MessageChannel.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    clearMocks: true,
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
