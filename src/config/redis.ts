import { createClient } from "redis";
import dotenv from "dotenv";

dotenv.config();

const redisClient = createClient({
  url: process.env.REDIS_URL || "redis://localhost:6379",
  socket: {
    connectTimeout: 5000,
    reconnectStrategy: (retries) => {
      if (retries > 10) {
        console.error("Redis: Max retries reached. Stopping reconnection attempts.");
        return false;
      }
      return Math.min(retries * 100, 3000);
    },
  },
});

redisClient.on("error", (err: Error) => {
  // Connection timeouts repeat on every retry, keep them to one line
  if (err.name === "ConnectionTimeoutError") {
    console.error("Redis Status: Connection Timeout (Local/Down)");
  } else {
    console.error("Redis Status: Error", err.message);
  }
});

redisClient.on("connect", () => console.log("Redis Status: Connected"));
redisClient.on("ready", () => console.log("Redis Status: Ready"));

/**
 * Opens the shared client. Failure leaves cache and rate limiting disabled
 * instead of stopping the server.
 */
export const connectRedis = async () => {
  try {
    if (!redisClient.isOpen) {
      await redisClient.connect();
    }
  } catch (error) {
    console.warn(
      "Redis Status: Could not establish initial connection. Cache will be disabled.",
      error,
    );
  }
};

export const disconnectRedis = async () => {
  if (redisClient.isOpen) {
    await redisClient.quit();
  }
};

export default redisClient;
