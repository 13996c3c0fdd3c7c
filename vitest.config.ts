import { defineConfig, mergeConfig } from 'vitest/config';

import defaultConfig from './tools/vitest.base.config';

export default mergeConfig(
  defaultConfig,
  defineConfig({
    test: {
      include: ['tools/**/src/**/*.test.ts'],
    },
  }),
);
