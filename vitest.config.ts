import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url))

const sharedAliases = {
  '@shared': fromRoot('./src/main/shared'),
  '@infra': fromRoot('./src/main/infrastructure'),
  '@app': fromRoot('./src/main/app'),
  '@main': fromRoot('./src/main'),
  '@config': fromRoot('./src/main/config'),
  '@core': fromRoot('./src/main/core')
}

export default defineConfig({
  resolve: {
    alias: sharedAliases
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/unit/**/*.spec.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    setupFiles: ['tests/setup.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json'],
      include: ['src/main/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'tests/**', 'dist/**', '**/*.config.ts', 'src/main/index.ts'],
      thresholds: {
        statements: 65,
        branches: 60,
        functions: 65,
        lines: 65
      }
    }
  }
})
