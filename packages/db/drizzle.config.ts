import { defineConfig } from 'drizzle-kit';

export default defineConfig({
  dialect: 'postgresql',
  schema: ['./src/enums.ts', './src/schemas/index.ts'],
  dbCredentials: {
    url: process.env.DATABASE_URL ?? '',
  },
  strict: true,
});
