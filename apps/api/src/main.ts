import 'dotenv/config';
import { createDb } from '@aa-savings/db';
import { validateApiRuntimeEnv } from './lib/env.js';
import { buildServer } from './server.js';

const env = validateApiRuntimeEnv();

async function start() {
  const { db, close } = createDb(env.databaseUrl);
  const app = await buildServer({
    db,
    logger: { level: env.logLevel },
    webOrigin: env.webOrigin,
  });
  app.addHook('onClose', async () => {
    await close();
  });

  await app.listen({ port: env.port, host: env.host });
}

start().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
