import "dotenv/config";

import { buildApp } from "./app.js";
import { openDatabase } from "./lib/db.js";
import { readEnv } from "./lib/env.js";

const config = readEnv();
const database = openDatabase(config.DATABASE_URL);
const app = await buildApp({ config, db: database.db, onClose: database.close });

try {
  await app.listen({
    port: config.PORT,
    host: config.HOST
  });
} catch (error) {
  app.log.error(error);
  process.exit(1);
}
