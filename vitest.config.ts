import { defineConfig } from 'vitest/config';
import { fileURLToPath, URL } from 'node:url';

export default defineConfig({
  // Алиасы для удобного импорта (те же, что в tsconfig.json)
  resolve: {
    alias: {
      '@config': fileURLToPath(new URL('./src/config', import.meta.url)),
      '@types': fileURLToPath(new URL('./src/types', import.meta.url)),
      '@utils': fileURLToPath(new URL('./src/utils', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    // serialport грузит нативный модуль, надёжнее в отдельных процессах
    pool: 'forks',
    include: ['src/**/*.test.ts'],
  },
});
