import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Config is read from process.env; isolate files so stubs don't leak
    restoreMocks: true,
    unstubGlobals: true,
    unstubEnvs: true,
  },
});
