import { Pool, PoolClient, QueryResultRow } from "pg";
import {
  Case,
  CaseContentWithItem,
  HistoryView,
  Identity,
  InventoryEntry,
  InventoryView,
  Item,
  OpeningRecord,
  User,
  isRarity,
} from "../models/types";
import { StoreUnavailableError } from "../utils/errors";
import {
  EconomyStore,
  EconomyTransaction,
  NewInventoryEntry,
  NewOpeningRecord,
} from "./EconomyStore";

// BIGINT columns arrive as strings from pg
type UserRow = {
  id: number;
  telegram_id: string;
  username: string | null;
  first_name: string | null;
  last_name: string | null;
  stars_balance: string;
  total_spent_stars: string;
  total_cases_opened: number;
  created_at: Date;
  updated_at: Date;
};

type ItemRow = {
  id: number;
  name: string;
  description: string | null;
  rarity: string;
  price: number;
  image_url: string | null;
  is_active: boolean;
  created_at: Date;
};

type CaseRow = {
  id: number;
  name: string;
  description: string | null;
  price_stars: number;
  image_url: string | null;
  is_active: boolean;
  created_at: Date;
};

type EntryRow = {
  id: number;
  user_id: number;
  nft_id: number;
  is_sold: boolean;
  sold_price: number | null;
  opened_from_case_id: number | null;
  created_at: Date;
};

type HistoryRow = {
  id: number;
  user_id: number;
  case_id: number;
  nft_id: number;
  stars_spent: number;
  created_at: Date;
};

type Prefixed<P extends string, R> = { [K in keyof R & string as `${P}${K}`]: R[K] };

type ContentRow = {
  content_id: number;
  case_id: number;
  chance: number;
  content_active: boolean;
} & Prefixed<"nft_", ItemRow>;

type InventoryRow = EntryRow & Omit<Prefixed<"nft_", ItemRow>, "nft_id"> & { item_id: number };

type HistoryJoinRow = HistoryRow & { case_name: string } & Omit<Prefixed<"nft_", ItemRow>, "nft_id"> & { item_id: number };

const USER_COLUMNS = `id, telegram_id, username, first_name, last_name,
  stars_balance, total_spent_stars, total_cases_opened, created_at, updated_at`;

const ITEM_COLUMNS = (alias: string) => `${alias}.name AS nft_name,
  ${alias}.description AS nft_description, ${alias}.rarity AS nft_rarity,
  ${alias}.price AS nft_price, ${alias}.image_url AS nft_image_url,
  ${alias}.is_active AS nft_is_active, ${alias}.created_at AS nft_created_at`;

const toUser = (row: UserRow): User => ({
  id: row.id,
  telegram_id: Number(row.telegram_id),
  username: row.username,
  first_name: row.first_name,
  last_name: row.last_name,
  balance: Number(row.stars_balance),
  total_spent: Number(row.total_spent_stars),
  cases_opened: row.total_cases_opened,
  created_at: row.created_at,
  updated_at: row.updated_at,
});

const toItem = (row: ItemRow): Item => {
  if (!isRarity(row.rarity)) {
    throw new StoreUnavailableError(`Item ${row.id} has unknown rarity "${row.rarity}"`);
  }
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    rarity: row.rarity,
    price: row.price,
    image_url: row.image_url,
    is_active: row.is_active,
    created_at: row.created_at,
  };
};

const toJoinedItem = (id: number, row: Omit<Prefixed<"nft_", ItemRow>, "nft_id">): Item =>
  toItem({
    id,
    name: row.nft_name,
    description: row.nft_description,
    rarity: row.nft_rarity,
    price: row.nft_price,
    image_url: row.nft_image_url,
    is_active: row.nft_is_active,
    created_at: row.nft_created_at,
  });

const toCase = (row: CaseRow): Case => ({
  id: row.id,
  name: row.name,
  description: row.description,
  price: row.price_stars,
  image_url: row.image_url,
  is_active: row.is_active,
  created_at: row.created_at,
});

const toEntry = (row: EntryRow): InventoryEntry => ({
  id: row.id,
  user_id: row.user_id,
  item_id: row.nft_id,
  is_sold: row.is_sold,
  sold_price: row.sold_price,
  case_id: row.opened_from_case_id,
  created_at: row.created_at,
});

const toOpening = (row: HistoryRow): OpeningRecord => ({
  id: row.id,
  user_id: row.user_id,
  case_id: row.case_id,
  item_id: row.nft_id,
  spent: row.stars_spent,
  created_at: row.created_at,
});

const storeError = (error: unknown) =>
  new StoreUnavailableError(
    `Query failed: ${error instanceof Error ? error.message : String(error)}`,
    error,
  );

class PgTransaction implements EconomyTransaction {
  constructor(private readonly client: PoolClient) {}

  async run<R extends QueryResultRow>(text: string, params: unknown[] = []): Promise<R[]> {
    try {
      const res = await this.client.query<R>(text, params);
      return res.rows;
    } catch (error) {
      throw storeError(error);
    }
  }

  async lockUser(userId: number): Promise<User | null> {
    const rows = await this.run<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1 FOR UPDATE`,
      [userId],
    );
    return rows[0] ? toUser(rows[0]) : null;
  }

  async lockInventoryEntry(entryId: number): Promise<InventoryEntry | null> {
    const rows = await this.run<EntryRow>(
      "SELECT * FROM user_nfts WHERE id = $1 FOR UPDATE",
      [entryId],
    );
    return rows[0] ? toEntry(rows[0]) : null;
  }

  async findItem(itemId: number): Promise<Item | null> {
    const rows = await this.run<ItemRow>("SELECT * FROM nfts WHERE id = $1", [itemId]);
    return rows[0] ? toItem(rows[0]) : null;
  }

  async debitForOpening(userId: number, amount: number): Promise<void> {
    await this.run(
      `UPDATE users
       SET stars_balance = stars_balance - $2,
           total_spent_stars = total_spent_stars + $2,
           total_cases_opened = total_cases_opened + 1,
           updated_at = NOW()
       WHERE id = $1`,
      [userId, amount],
    );
  }

  async insertInventoryEntry(entry: NewInventoryEntry): Promise<InventoryEntry> {
    const rows = await this.run<EntryRow>(
      `INSERT INTO user_nfts (user_id, nft_id, opened_from_case_id)
       VALUES ($1, $2, $3) RETURNING *`,
      [entry.user_id, entry.item_id, entry.case_id],
    );
    return toEntry(rows[0]);
  }

  async insertOpeningRecord(record: NewOpeningRecord): Promise<OpeningRecord> {
    const rows = await this.run<HistoryRow>(
      `INSERT INTO opening_history (user_id, case_id, nft_id, stars_spent)
       VALUES ($1, $2, $3, $4) RETURNING *`,
      [record.user_id, record.case_id, record.item_id, record.spent],
    );
    return toOpening(rows[0]);
  }

  async markEntrySold(entryId: number, soldPrice: number): Promise<void> {
    await this.run(
      "UPDATE user_nfts SET is_sold = TRUE, sold_price = $2 WHERE id = $1",
      [entryId, soldPrice],
    );
  }

  async creditBalance(userId: number, amount: number): Promise<void> {
    await this.run(
      `UPDATE users SET stars_balance = stars_balance + $2, updated_at = NOW()
       WHERE id = $1`,
      [userId, amount],
    );
  }
}

export class PgEconomyStore implements EconomyStore {
  constructor(private readonly pool: Pool) {}

  private async run<R extends QueryResultRow>(text: string, params: unknown[] = []): Promise<R[]> {
    try {
      const res = await this.pool.query<R>(text, params);
      return res.rows;
    } catch (error) {
      throw storeError(error);
    }
  }

  async findUserById(userId: number): Promise<User | null> {
    const rows = await this.run<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [userId],
    );
    return rows[0] ? toUser(rows[0]) : null;
  }

  async getOrCreateUser(identity: Identity, startingBalance: number): Promise<User> {
    // ON CONFLICT keeps concurrent first contacts down to one row
    const inserted = await this.run<UserRow>(
      `INSERT INTO users (telegram_id, username, first_name, last_name, stars_balance)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (telegram_id) DO NOTHING
       RETURNING ${USER_COLUMNS}`,
      [
        identity.telegram_id,
        identity.username,
        identity.first_name,
        identity.last_name,
        startingBalance,
      ],
    );
    if (inserted[0]) return toUser(inserted[0]);

    const existing = await this.run<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE telegram_id = $1`,
      [identity.telegram_id],
    );
    if (!existing[0]) {
      throw new StoreUnavailableError(
        `User ${identity.telegram_id} vanished between insert and select`,
      );
    }
    return toUser(existing[0]);
  }

  async findCase(caseId: number): Promise<Case | null> {
    const rows = await this.run<CaseRow>("SELECT * FROM cases WHERE id = $1", [caseId]);
    return rows[0] ? toCase(rows[0]) : null;
  }

  async listActiveCases(): Promise<Case[]> {
    const rows = await this.run<CaseRow>(
      "SELECT * FROM cases WHERE is_active = TRUE ORDER BY price_stars ASC, id ASC",
    );
    return rows.map(toCase);
  }

  async listCaseContents(caseId: number): Promise<CaseContentWithItem[]> {
    const rows = await this.run<ContentRow>(
      `SELECT cn.id AS content_id, cn.case_id, cn.chance, cn.is_active AS content_active,
              n.id AS nft_id, ${ITEM_COLUMNS("n")}
       FROM case_nfts cn
       JOIN nfts n ON cn.nft_id = n.id
       WHERE cn.case_id = $1
       ORDER BY cn.id ASC`,
      [caseId],
    );
    return rows.map((row) => ({
      content: {
        id: row.content_id,
        case_id: row.case_id,
        item_id: row.nft_id,
        weight: row.chance,
        is_active: row.content_active,
      },
      item: toJoinedItem(row.nft_id, row),
    }));
  }

  async listInventory(userId: number): Promise<InventoryView[]> {
    const rows = await this.run<InventoryRow>(
      `SELECT un.*, n.id AS item_id, ${ITEM_COLUMNS("n")}
       FROM user_nfts un
       JOIN nfts n ON un.nft_id = n.id
       WHERE un.user_id = $1 AND un.is_sold = FALSE
       ORDER BY un.created_at DESC, un.id DESC`,
      [userId],
    );
    return rows.map((row) => ({ ...toEntry(row), item: toJoinedItem(row.item_id, row) }));
  }

  async listHistory(userId: number, limit: number): Promise<HistoryView[]> {
    const rows = await this.run<HistoryJoinRow>(
      `SELECT oh.*, c.name AS case_name, n.id AS item_id, ${ITEM_COLUMNS("n")}
       FROM opening_history oh
       JOIN cases c ON oh.case_id = c.id
       JOIN nfts n ON oh.nft_id = n.id
       WHERE oh.user_id = $1
       ORDER BY oh.created_at DESC, oh.id DESC
       LIMIT $2`,
      [userId, limit],
    );
    return rows.map((row) => ({
      ...toOpening(row),
      case_name: row.case_name,
      item: toJoinedItem(row.item_id, row),
    }));
  }

  async transaction<T>(work: (tx: EconomyTransaction) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new StoreUnavailableError("Could not acquire a database connection", error);
    }

    // Set when the connection must not go back to the pool
    let broken: Error | undefined;
    try {
      const tx = new PgTransaction(client);
      await tx.run("BEGIN");
      const result = await work(tx);
      await tx.run("COMMIT");
      return result;
    } catch (e) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        console.error("Rollback failed:", rollbackError);
        broken =
          rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      }
      throw e;
    } finally {
      client.release(broken);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
