import { defineConfig } from 'vitest/config'
import { resolve } from 'path'
import { fileURLToPath } from 'url'

const root = fileURLToPath(new URL('.', import.meta.url))

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['packages/**/__tests__/**/*.test.ts'],
    // Run tests serially; the socket suites each bind loopback listeners
    pool: 'forks',
    poolOptions: {
      forks: { singleFork: true },
    },
  },
  resolve: {
    // Source aliases so tests run against TypeScript source without a prior build.
    alias: [
      {
        find: /^@circle-relay\/core$/,
        replacement: resolve(root, 'packages/relay-core/src/index.ts'),
      },
      {
        find: /^@circle-relay\/server$/,
        replacement: resolve(root, 'packages/relay-server/src/index.ts'),
      },
      {
        find: /^@circle-relay\/client$/,
        replacement: resolve(root, 'packages/relay-client/src/index.ts'),
      },
    ],
  },
})
