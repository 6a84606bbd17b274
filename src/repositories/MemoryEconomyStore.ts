import {
  Case,
  CaseContent,
  CaseContentWithItem,
  HistoryView,
  Identity,
  InventoryEntry,
  InventoryView,
  Item,
  OpeningRecord,
  User,
} from "../models/types";
import { KeyedMutex } from "../utils/keyedMutex";
import { StoreUnavailableError } from "../utils/errors";
import {
  EconomyStore,
  EconomyTransaction,
  NewInventoryEntry,
  NewOpeningRecord,
} from "./EconomyStore";

export type ItemSeed = Pick<Item, "name" | "rarity" | "price"> &
  Partial<Pick<Item, "description" | "image_url" | "is_active">>;

export type CaseSeed = Pick<Case, "name" | "price"> &
  Partial<Pick<Case, "description" | "image_url" | "is_active">>;

export type CaseContentSeed = Pick<CaseContent, "case_id" | "item_id" | "weight"> &
  Partial<Pick<CaseContent, "is_active">>;

class Tables {
  users = new Map<number, User>();
  userIdsByTelegram = new Map<number, number>();
  items = new Map<number, Item>();
  cases = new Map<number, Case>();
  contents = new Map<number, CaseContent>();
  entries = new Map<number, InventoryEntry>();
  openings = new Map<number, OpeningRecord>();

  private sequences = new Map<string, number>();

  nextId(table: string): number {
    const id = (this.sequences.get(table) ?? 0) + 1;
    this.sequences.set(table, id);
    return id;
  }
}

const byNewest = (a: { created_at: Date; id: number }, b: { created_at: Date; id: number }) =>
  b.created_at.getTime() - a.created_at.getTime() || b.id - a.id;

/**
 * Buffers writes until commit. Claims are held on the store's mutex from
 * the first lock call until the transaction settles.
 */
class MemoryTransaction implements EconomyTransaction {
  private readonly pending: Array<() => void> = [];
  private readonly releases = new Map<string, () => void>();

  constructor(
    private readonly tables: Tables,
    private readonly locks: KeyedMutex,
  ) {}

  private async claim(key: string) {
    if (this.releases.has(key)) return;
    this.releases.set(key, await this.locks.acquire(key));
  }

  async lockUser(userId: number): Promise<User | null> {
    await this.claim(`user:${userId}`);
    const user = this.tables.users.get(userId);
    return user ? { ...user } : null;
  }

  async lockInventoryEntry(entryId: number): Promise<InventoryEntry | null> {
    await this.claim(`entry:${entryId}`);
    const entry = this.tables.entries.get(entryId);
    return entry ? { ...entry } : null;
  }

  async findItem(itemId: number): Promise<Item | null> {
    const item = this.tables.items.get(itemId);
    return item ? { ...item } : null;
  }

  async debitForOpening(userId: number, amount: number): Promise<void> {
    const user = this.tables.users.get(userId);
    if (user && user.balance - amount < 0) {
      // Same outcome as the CHECK (stars_balance >= 0) constraint
      throw new StoreUnavailableError(`Balance of user ${userId} would become negative`);
    }
    this.pending.push(() => {
      const target = this.tables.users.get(userId);
      if (!target) return;
      target.balance -= amount;
      target.total_spent += amount;
      target.cases_opened += 1;
      target.updated_at = new Date();
    });
  }

  async insertInventoryEntry(entry: NewInventoryEntry): Promise<InventoryEntry> {
    const record: InventoryEntry = {
      id: this.tables.nextId("entries"),
      user_id: entry.user_id,
      item_id: entry.item_id,
      is_sold: false,
      sold_price: null,
      case_id: entry.case_id,
      created_at: new Date(),
    };
    this.pending.push(() => this.tables.entries.set(record.id, { ...record }));
    return record;
  }

  async insertOpeningRecord(record: NewOpeningRecord): Promise<OpeningRecord> {
    const row: OpeningRecord = {
      id: this.tables.nextId("openings"),
      ...record,
      created_at: new Date(),
    };
    this.pending.push(() => this.tables.openings.set(row.id, { ...row }));
    return row;
  }

  async markEntrySold(entryId: number, soldPrice: number): Promise<void> {
    this.pending.push(() => {
      const entry = this.tables.entries.get(entryId);
      if (!entry) return;
      entry.is_sold = true;
      entry.sold_price = soldPrice;
    });
  }

  async creditBalance(userId: number, amount: number): Promise<void> {
    this.pending.push(() => {
      const user = this.tables.users.get(userId);
      if (!user) return;
      user.balance += amount;
      user.updated_at = new Date();
    });
  }

  commit() {
    for (const apply of this.pending) apply();
    this.pending.length = 0;
  }

  release() {
    this.pending.length = 0;
    for (const release of this.releases.values()) release();
    this.releases.clear();
  }
}

/**
 * In-process store with the same guarantees as the PostgreSQL one:
 * all-or-nothing transactions and exclusive per-row claims. Used by the
 * `memory` driver and by tests. Catalog rows are added through the seed
 * helpers since no economy operation writes them.
 */
export class MemoryEconomyStore implements EconomyStore {
  private readonly tables = new Tables();
  private readonly locks = new KeyedMutex();
  private closed = false;

  private assertOpen() {
    if (this.closed) {
      throw new StoreUnavailableError("Store is closed");
    }
  }

  // --- Catalog seeding ---

  addItem(seed: ItemSeed): Item {
    const item: Item = {
      id: this.tables.nextId("items"),
      description: null,
      image_url: null,
      is_active: true,
      created_at: new Date(),
      ...seed,
    };
    this.tables.items.set(item.id, item);
    return { ...item };
  }

  addCase(seed: CaseSeed): Case {
    const box: Case = {
      id: this.tables.nextId("cases"),
      description: null,
      image_url: null,
      is_active: true,
      created_at: new Date(),
      ...seed,
    };
    this.tables.cases.set(box.id, box);
    return { ...box };
  }

  addCaseContent(seed: CaseContentSeed): CaseContent {
    if (!this.tables.cases.has(seed.case_id) || !this.tables.items.has(seed.item_id)) {
      throw new Error(`Case ${seed.case_id} or item ${seed.item_id} does not exist`);
    }
    const content: CaseContent = {
      id: this.tables.nextId("contents"),
      is_active: true,
      ...seed,
    };
    this.tables.contents.set(content.id, content);
    return { ...content };
  }

  /** Contents and history of the case go with it; owned items stay, untagged. */
  removeCase(caseId: number): boolean {
    if (!this.tables.cases.delete(caseId)) return false;
    for (const [id, content] of this.tables.contents) {
      if (content.case_id === caseId) this.tables.contents.delete(id);
    }
    for (const [id, opening] of this.tables.openings) {
      if (opening.case_id === caseId) this.tables.openings.delete(id);
    }
    for (const entry of this.tables.entries.values()) {
      if (entry.case_id === caseId) entry.case_id = null;
    }
    return true;
  }

  // --- EconomyStore ---

  async findUserById(userId: number): Promise<User | null> {
    this.assertOpen();
    const user = this.tables.users.get(userId);
    return user ? { ...user } : null;
  }

  async getOrCreateUser(identity: Identity, startingBalance: number): Promise<User> {
    this.assertOpen();
    const release = await this.locks.acquire(`telegram:${identity.telegram_id}`);
    try {
      const existingId = this.tables.userIdsByTelegram.get(identity.telegram_id);
      const existing = existingId === undefined ? undefined : this.tables.users.get(existingId);
      if (existing) return { ...existing };

      const now = new Date();
      const user: User = {
        id: this.tables.nextId("users"),
        ...identity,
        balance: startingBalance,
        total_spent: 0,
        cases_opened: 0,
        created_at: now,
        updated_at: now,
      };
      this.tables.users.set(user.id, user);
      this.tables.userIdsByTelegram.set(user.telegram_id, user.id);
      return { ...user };
    } finally {
      release();
    }
  }

  async findCase(caseId: number): Promise<Case | null> {
    this.assertOpen();
    const box = this.tables.cases.get(caseId);
    return box ? { ...box } : null;
  }

  async listActiveCases(): Promise<Case[]> {
    this.assertOpen();
    return [...this.tables.cases.values()]
      .filter((box) => box.is_active)
      .sort((a, b) => a.price - b.price || a.id - b.id)
      .map((box) => ({ ...box }));
  }

  async listCaseContents(caseId: number): Promise<CaseContentWithItem[]> {
    this.assertOpen();
    const rows: CaseContentWithItem[] = [];
    for (const content of this.tables.contents.values()) {
      if (content.case_id !== caseId) continue;
      const item = this.tables.items.get(content.item_id);
      if (item) rows.push({ content: { ...content }, item: { ...item } });
    }
    return rows.sort((a, b) => a.content.id - b.content.id);
  }

  async listInventory(userId: number): Promise<InventoryView[]> {
    this.assertOpen();
    const rows: InventoryView[] = [];
    for (const entry of this.tables.entries.values()) {
      if (entry.user_id !== userId || entry.is_sold) continue;
      const item = this.tables.items.get(entry.item_id);
      if (item) rows.push({ ...entry, item: { ...item } });
    }
    return rows.sort(byNewest);
  }

  async listHistory(userId: number, limit: number): Promise<HistoryView[]> {
    this.assertOpen();
    const rows: HistoryView[] = [];
    for (const opening of this.tables.openings.values()) {
      if (opening.user_id !== userId) continue;
      const box = this.tables.cases.get(opening.case_id);
      const item = this.tables.items.get(opening.item_id);
      if (box && item) rows.push({ ...opening, case_name: box.name, item: { ...item } });
    }
    return rows.sort(byNewest).slice(0, limit);
  }

  async transaction<T>(work: (tx: EconomyTransaction) => Promise<T>): Promise<T> {
    this.assertOpen();
    const tx = new MemoryTransaction(this.tables, this.locks);
    try {
      const result = await work(tx);
      this.assertOpen();
      tx.commit();
      return result;
    } finally {
      tx.release();
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
