/**
 * @file vitest.config.ts
 * @description Vitest configuration for the unit tests.
 *
 * `environment: 'node'`: nothing here touches a DOM; the terminal front end
 * is tested against in-memory streams.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig(
{
  test:
  {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
