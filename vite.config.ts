import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import dts from 'vite-plugin-dts'
import { defineConfig } from 'vitest/config'

const rootDir = dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  plugins: [dts({ include: ['src'], tsconfigPath: './tsconfig.json' })],
  build: {
    target: 'es2022',
    sourcemap: true,
    lib: {
      entry: resolve(rootDir, 'src/lib.ts'),
      formats: ['es'],
      fileName: 'lib',
    },
    rollupOptions: {
      external: ['pino', 'zod'],
    },
  },
  test: {
    environment: 'node',
    include: ['tests/**/*.spec.ts'],
  },
})
