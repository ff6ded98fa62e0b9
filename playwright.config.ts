import { defineConfig } from '@playwright/test';

export default defineConfig({
  testDir: './tests',
  testMatch: '**/*.spec.ts',
  fullyParallel: true,
  timeout: 30_000,
  use: {
    extraHTTPHeaders: {
      Accept: 'application/json, image/png, application/pdf',
    },
  },
});
