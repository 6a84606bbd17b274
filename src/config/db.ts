import { Pool } from "pg";
import { AppConfig } from "./env";

export const createPool = (config: Pick<AppConfig, "databaseUrl" | "isProduction">) => {
  const env = process.env;
  const pool = new Pool({
    connectionString: config.databaseUrl,
    // Fallback to individual variables ONLY if DATABASE_URL is not provided
    user: !config.databaseUrl ? env.DB_USER || "postgres" : undefined,
    host: !config.databaseUrl ? env.DB_HOST || "localhost" : undefined,
    database: !config.databaseUrl ? env.DB_NAME || "case_economy" : undefined,
    password: !config.databaseUrl ? env.DB_PASSWORD || "password" : undefined,
    port: !config.databaseUrl ? parseInt(env.DB_PORT || "5432") : undefined,
    ssl: config.isProduction ? { rejectUnauthorized: false } : false,
  });

  pool.on("error", (err) => {
    console.error("Unexpected error on idle client", err);
    process.exit(-1);
  });

  return pool;
};
