import "dotenv/config";
import { migrate } from "drizzle-orm/node-postgres/migrator";
import { createDatabase } from "../src";

/**
 * Applies SQL migrations from `packages/db/migrations`.
 *
 * Migrations are produced by `npm run db:generate` (drizzle-kit) from the
 * table definitions in `src/schema`.
 */
async function run() {
  const { db, pool } = createDatabase();
  try {
    await migrate(db, { migrationsFolder: "./packages/db/migrations" });
    console.log("Database migrations applied successfully.");
  } finally {
    await pool.end();
  }
}

run().catch((error) => {
  console.error("Migration failed:", error);
  process.exit(1);
});
