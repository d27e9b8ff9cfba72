import { buildApp } from "./app.js";
import { migrateDatabase } from "./db/migrate.js";

async function start() {
  const app = await buildApp();
  if (app.config.DATABASE_URL) {
    await migrateDatabase(app.config.DATABASE_URL, { closePool: false });
  }

  const port = app.config.PORT;
  const host = "0.0.0.0";

  await app.listen({ port, host });
  app.log.info(`Server listening on ${host}:${port}`);
}

start().catch((error) => {
  console.error(error);
  process.exit(1);
});
