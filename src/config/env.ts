import dotenv from "dotenv";

dotenv.config();

export type StoreDriver = "postgres" | "memory";

export interface AppConfig {
  botToken: string;
  port: number;
  databaseUrl?: string;
  redisUrl: string;
  storeDriver: StoreDriver;
  sellRatio: number;
  startingBalance: number;
  isProduction: boolean;
}

// Buy-back pays 70% of face value, new users start with 1000 stars
export const DEFAULT_SELL_RATIO = 0.7;
export const DEFAULT_STARTING_BALANCE = 1000;

const parseNumber = (name: string, raw: string | undefined, fallback: number) => {
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  return value;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const botToken = env.BOT_TOKEN;
  if (!botToken) {
    throw new Error("BOT_TOKEN is required to verify identity payloads");
  }

  const driver = env.STORE_DRIVER || "postgres";
  if (driver !== "postgres" && driver !== "memory") {
    throw new Error(`STORE_DRIVER must be "postgres" or "memory", got "${driver}"`);
  }

  const sellRatio = parseNumber("SELL_RATIO", env.SELL_RATIO, DEFAULT_SELL_RATIO);
  if (sellRatio <= 0 || sellRatio > 1) {
    throw new Error(`SELL_RATIO must be in (0, 1], got ${sellRatio}`);
  }
  if (!Number.isInteger(Math.round(sellRatio * 1e6) / 100)) {
    throw new Error(`SELL_RATIO takes at most four decimals, got ${sellRatio}`);
  }

  const startingBalance = parseNumber(
    "STARTING_BALANCE",
    env.STARTING_BALANCE,
    DEFAULT_STARTING_BALANCE,
  );
  if (!Number.isInteger(startingBalance) || startingBalance < 0) {
    throw new Error(
      `STARTING_BALANCE must be a non-negative integer, got ${startingBalance}`,
    );
  }

  return {
    botToken,
    port: parseNumber("PORT", env.PORT, 3001),
    databaseUrl: env.DATABASE_URL || undefined,
    redisUrl: env.REDIS_URL || "redis://localhost:6379",
    storeDriver: driver,
    sellRatio,
    startingBalance,
    isProduction:
      env.NODE_ENV === "production" || env.RAILWAY_ENVIRONMENT !== undefined,
  };
};
