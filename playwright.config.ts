import { defineConfig } from '@playwright/test';

export default defineConfig({
  testDir: './tests',
  outputDir: 'out/test-results',
  projects: [
    { name: 'core', testMatch: /\.spec\.ts$/ }
  ]
});
