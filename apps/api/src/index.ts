import 'dotenv/config';
import { buildServer } from './app.js';
import { loadConfig } from './config.js';
import { logStartupFailure } from './startup.js';

async function start() {
  const config = loadConfig();
  const server = await buildServer(config);

  try {
    await server.listen({ port: config.port, host: config.host });
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

start().catch((err: unknown) => {
  logStartupFailure(err);
  process.exit(1);
});
