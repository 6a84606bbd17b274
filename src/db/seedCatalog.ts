import fs from "fs";
import path from "path";
import { Pool } from "pg";
import { Rarity, isRarity } from "../models/types";
import { MemoryEconomyStore } from "../repositories/MemoryEconomyStore";

export interface SeedItem {
  key: string;
  name: string;
  description: string | null;
  rarity: Rarity;
  price: number;
}

export interface SeedCase {
  name: string;
  description: string | null;
  price: number;
  contents: Array<{ item: string; weight: number }>;
}

export interface SeedCatalog {
  items: SeedItem[];
  cases: SeedCase[];
}

// Resolves to <root>/src/db from both src/ and dist/
export const SEED_PATH = path.resolve(__dirname, "..", "..", "src", "db", "seed.json");

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const fieldError = (where: string, field: string) =>
  new Error(`Seed catalog: ${where} has an invalid "${field}"`);

const readString = (row: Record<string, unknown>, field: string, where: string) => {
  const value = row[field];
  if (typeof value !== "string" || value.length === 0) throw fieldError(where, field);
  return value;
};

const readPrice = (row: Record<string, unknown>, where: string) => {
  const value = row.price;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw fieldError(where, "price");
  }
  return value;
};

const readDescription = (row: Record<string, unknown>) =>
  typeof row.description === "string" ? row.description : null;

/** Validates raw JSON. Every content must reference a declared item key. */
export const parseSeedCatalog = (raw: unknown): SeedCatalog => {
  if (!isRecord(raw) || !Array.isArray(raw.items) || !Array.isArray(raw.cases)) {
    throw new Error("Seed catalog: expected { items: [], cases: [] }");
  }

  const items = raw.items.map((row: unknown, index): SeedItem => {
    const where = `items[${index}]`;
    if (!isRecord(row)) throw new Error(`Seed catalog: ${where} is not an object`);
    const rarity = readString(row, "rarity", where);
    if (!isRarity(rarity)) throw fieldError(where, "rarity");
    return {
      key: readString(row, "key", where),
      name: readString(row, "name", where),
      description: readDescription(row),
      rarity,
      price: readPrice(row, where),
    };
  });

  const keys = new Set(items.map((item) => item.key));

  const cases = raw.cases.map((row: unknown, index): SeedCase => {
    const where = `cases[${index}]`;
    if (!isRecord(row) || !Array.isArray(row.contents)) {
      throw new Error(`Seed catalog: ${where} needs a contents array`);
    }
    const contents = row.contents.map((content: unknown, i) => {
      const at = `${where}.contents[${i}]`;
      if (!isRecord(content)) throw new Error(`Seed catalog: ${at} is not an object`);
      const item = readString(content, "item", at);
      if (!keys.has(item)) throw fieldError(at, "item");
      const weight = content.weight;
      if (typeof weight !== "number" || !Number.isFinite(weight) || weight <= 0) {
        throw fieldError(at, "weight");
      }
      return { item, weight };
    });
    return {
      name: readString(row, "name", where),
      description: readDescription(row),
      price: readPrice(row, where),
      contents,
    };
  });

  return { items, cases };
};

export const readSeedCatalog = (file: string = SEED_PATH): SeedCatalog =>
  parseSeedCatalog(JSON.parse(fs.readFileSync(file, "utf8")));

/** Loads the catalog into a memory store, returns item ids by seed key. */
export const seedMemoryStore = (store: MemoryEconomyStore, catalog: SeedCatalog) => {
  const itemIds = new Map<string, number>();
  for (const { key, ...item } of catalog.items) {
    itemIds.set(key, store.addItem(item).id);
  }

  for (const { contents, ...box } of catalog.cases) {
    const created = store.addCase(box);
    for (const content of contents) {
      const itemId = itemIds.get(content.item);
      if (itemId === undefined) throw new Error(`Seed catalog: unknown item "${content.item}"`);
      store.addCaseContent({ case_id: created.id, item_id: itemId, weight: content.weight });
    }
  }

  return itemIds;
};

/**
 * Replaces the catalog tables in PostgreSQL. Refuses while any inventory
 * entry or opening record exists, since both reference catalog rows and
 * history is never deleted.
 */
export const seedDatabase = async (pool: Pool, catalog: SeedCatalog) => {
  const client = await pool.connect();

  try {
    await client.query("BEGIN");

    const usage = await client.query<{ entries: string; openings: string }>(
      `SELECT (SELECT COUNT(*) FROM user_nfts) AS entries,
              (SELECT COUNT(*) FROM opening_history) AS openings`,
    );
    const { entries, openings } = usage.rows[0];
    if (Number(entries) > 0 || Number(openings) > 0) {
      throw new Error(
        `Refusing to reseed: ${entries} inventory entries and ${openings} openings reference the catalog`,
      );
    }

    // Both ledger tables are empty here; they are listed because they reference the catalog
    await client.query(
      "TRUNCATE TABLE case_nfts, user_nfts, opening_history, cases, nfts RESTART IDENTITY",
    );

    const itemIds = new Map<string, number>();
    for (const item of catalog.items) {
      const res = await client.query<{ id: number }>(
        `INSERT INTO nfts (name, description, rarity, price) VALUES ($1, $2, $3, $4) RETURNING id`,
        [item.name, item.description, item.rarity, item.price],
      );
      itemIds.set(item.key, res.rows[0].id);
    }
    console.log(`✅ ${itemIds.size} items created`);

    for (const box of catalog.cases) {
      const res = await client.query<{ id: number }>(
        `INSERT INTO cases (name, description, price_stars) VALUES ($1, $2, $3) RETURNING id`,
        [box.name, box.description, box.price],
      );
      const caseId = res.rows[0].id;

      for (const content of box.contents) {
        await client.query(
          `INSERT INTO case_nfts (case_id, nft_id, chance) VALUES ($1, $2, $3)`,
          [caseId, itemIds.get(content.item), content.weight],
        );
      }
      console.log(`✅ Case "${box.name}" (${box.price} stars, ${box.contents.length} prizes)`);
    }

    await client.query("COMMIT");
    return itemIds;
  } catch (e) {
    await client.query("ROLLBACK");
    throw e;
  } finally {
    client.release();
  }
};
