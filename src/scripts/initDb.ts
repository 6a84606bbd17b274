import fs from "fs";
import path from "path";
import { createPool } from "../config/db";
import { loadConfig } from "../config/env";

const SCHEMA_PATH = path.resolve(__dirname, "..", "..", "src", "db", "schema.sql");

const initDb = async () => {
  const pool = createPool(loadConfig());
  try {
    const schemaSql = fs.readFileSync(SCHEMA_PATH, "utf8");

    console.log("Running schema migration...");

    const statements = schemaSql
      .split(";")
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    const client = await pool.connect();
    try {
      await client.query("BEGIN");
      for (const statement of statements) {
        await client.query(statement);
      }
      await client.query("COMMIT");
      console.log("✅ Database initialized successfully.");
    } catch (e) {
      await client.query("ROLLBACK");
      console.error("❌ Migration Failed:", e);
      throw e;
    } finally {
      client.release();
    }
  } finally {
    await pool.end();
  }
};

initDb().catch((err) => {
  console.error("Error initializing database:", err);
  process.exit(1);
});
