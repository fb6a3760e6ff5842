import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.{test,spec,prop.test}.ts'],
    exclude: ['node_modules/', 'dist/'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        'src/demo.ts',
        'src/benchmark/cli.ts',
        '**/*.test.ts',
        '**/*.spec.ts',
        '**/*.prop.test.ts',
        'vitest.config.ts',
      ],
    },
    testTimeout: 60000, // 256-bit scalar multiplications in property runs
  },
});
