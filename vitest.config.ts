import { fileURLToPath } from 'url'

import { defineConfig } from 'vitest/config'

function fromRoot(relative: string): string {
  return fileURLToPath(new URL(relative, import.meta.url))
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Each test file in a separate worker
    isolate: true,
    pool: 'threads',

    // Mock cleanup settings
    // ? No mockReset: it would wipe the implementations given to vi.fn() in fixtures
    clearMocks: true,
    restoreMocks: true,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts', 'tools/**/*.ts'],
      exclude: [
        '**/*.test.ts',
        '**/index.ts',
        '**/types.ts',
        'tools/dashboard/cli.ts',
      ],
      thresholds: {
        branches: 90,
        functions: 95,
        lines: 95,
        statements: 95,
      },
    },

    include: ['src/**/*.test.ts', 'tools/**/*.test.ts'],
  },
  resolve: {
    // Mirrors compilerOptions.paths in tsconfig.json
    alias: [
      { find: /^\$types$/, replacement: fromRoot('./src/types/index.ts') },
      { find: /^\$types\/(.*)$/, replacement: fromRoot('./src/types/') + '$1' },
      { find: /^@core\/(.*)$/, replacement: fromRoot('./src/core/') + '$1' },
      { find: /^@logging$/, replacement: fromRoot('./src/logging/index.ts') },
      { find: /^@utils\/(.*)$/, replacement: fromRoot('./src/utils/') + '$1' },
      { find: /^@validation$/, replacement: fromRoot('./src/validation/index.ts') },
      { find: /^@transport$/, replacement: fromRoot('./src/transport/index.ts') },
      { find: /^@system\/(.*)$/, replacement: fromRoot('./src/system/') + '$1' },
    ],
  },
})
