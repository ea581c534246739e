import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [
    {
      name: 'resolve-js-to-ts',
      resolveId(source, importer) {
        if (source.endsWith('.js') && importer && !source.includes('node_modules')) {
          const tsPath = source.replace(/\.js$/, '.ts');
          return this.resolve(tsPath, importer, { skipSelf: true });
        }
        return null;
      },
    },
  ],
  test: {
    include: ['src/**/*.test.ts'],
    globals: true,
    pool: 'forks',
    // Placeholder credentials so src/config.ts can load in any test that does not mock it
    env: {
      FEISHU_APP_ID: 'test-app-id',
      FEISHU_APP_SECRET: 'test-secret',
      SMTP_HOST: 'smtp.test.local',
      SMTP_USER: 'bridge@test.local',
      SMTP_PASSWORD: 'test-password',
      SMTP_FROM_EMAIL: 'bridge@test.local',
    },
  },
});
