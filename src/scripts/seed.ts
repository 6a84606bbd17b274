import { createPool } from "../config/db";
import { loadConfig } from "../config/env";
import { readSeedCatalog, seedDatabase } from "../db/seedCatalog";

const seed = async () => {
  const pool = createPool(loadConfig());
  try {
    console.log("🌱 Seeding demo catalog...");
    await seedDatabase(pool, readSeedCatalog());
    console.log("🚀 Seed Completed Successfully");
  } finally {
    await pool.end();
  }
};

seed().catch((e) => {
  console.error("❌ Seed Failed:", e);
  process.exit(1);
});
