import { defineConfig } from 'vitest/config'
import os from 'os'
import path from 'path'
import { fileURLToPath } from 'url'

const root = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@domain': path.resolve(root, 'src/domain'),
      '@application': path.resolve(root, 'src/application'),
      '@infrastructure': path.resolve(root, 'src/infrastructure'),
    },
  },
  test: {
    include: ['tests/unit/**/*.test.ts'],
    environment: 'node',
    env: {
      DATABASE_URL: ':memory:',
      MEDIA_ROOT: path.join(os.tmpdir(), 'recipebox-test-media'),
      PUBLIC_URL: 'https://recipes.test',
      LOG_LEVEL: 'silent',
    },
  },
})
