import { fileURLToPath } from 'url'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: [
      'tests/**/*.{test,spec}.ts',
      'tests/**/*.{test,spec}.tsx',
      'src/**/__tests__/**/*.{test,spec}.ts',
      'src/**/__tests__/**/*.{test,spec}.tsx',
    ],
    env: {
      MURMUR_LOG_FILE: '',
    },
  },
})
