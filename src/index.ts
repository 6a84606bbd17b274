import { createApp } from "./app";
import { createPool } from "./config/db";
import { loadConfig } from "./config/env";
import { connectRedis, disconnectRedis } from "./config/redis";
import { EconomyStore } from "./repositories/EconomyStore";
import { MemoryEconomyStore } from "./repositories/MemoryEconomyStore";
import { PgEconomyStore } from "./repositories/PgEconomyStore";
import { readSeedCatalog, seedMemoryStore } from "./db/seedCatalog";

const config = loadConfig();

const createStore = (): EconomyStore => {
  if (config.storeDriver === "postgres") {
    return new PgEconomyStore(createPool(config));
  }
  // Memory driver starts from the demo catalog, nothing survives a restart
  const memory = new MemoryEconomyStore();
  seedMemoryStore(memory, readSeedCatalog());
  console.log("⚠️  STORE_DRIVER=memory, data is kept in process only");
  return memory;
};

const store = createStore();

const app = createApp({
  store,
  botToken: config.botToken,
  settings: {
    sellRatio: config.sellRatio,
    startingBalance: config.startingBalance,
  },
});

const start = async () => {
  await connectRedis();

  const server = app.listen(config.port, () => {
    console.log(
      `🎰 Case economy running on port ${config.port} (store: ${config.storeDriver}, buy-back ${config.sellRatio * 100}%)`,
    );
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down...`);
    server.close(async () => {
      try {
        await store.close();
        await disconnectRedis();
        process.exit(0);
      } catch (error) {
        console.error("Shutdown Error:", error);
        process.exit(1);
      }
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
};

start().catch((error) => {
  console.error("Startup Error:", error);
  process.exit(1);
});
