import { getPool } from "../server/db";
import { describeError, log } from "../server/logger";

async function reset() {
  log("dropping schema public", "reset-db");
  await getPool().query("DROP SCHEMA public CASCADE; CREATE SCHEMA public; GRANT ALL ON SCHEMA public TO public;");
  log("database is empty; run db:push to recreate the tables", "reset-db");
  await getPool().end();
}

reset().catch((err: unknown) => {
  log.error(`reset failed: ${describeError(err)}`, "reset-db");
  process.exit(1);
});
