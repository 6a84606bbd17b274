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
} from "../models/types";

export interface NewInventoryEntry {
  user_id: number;
  item_id: number;
  case_id: number;
}

export interface NewOpeningRecord {
  user_id: number;
  case_id: number;
  item_id: number;
  spent: number;
}

/**
 * Writes that must land together. Every method runs inside the transaction
 * opened by `EconomyStore.transaction`; nothing is visible to other
 * readers until the work resolves.
 */
export interface EconomyTransaction {
  /** Exclusive claim on the user row until commit or rollback. */
  lockUser(userId: number): Promise<User | null>;

  /** Exclusive claim on the entry row. Take the owner's lock first. */
  lockInventoryEntry(entryId: number): Promise<InventoryEntry | null>;

  findItem(itemId: number): Promise<Item | null>;

  /** Balance -= amount, total_spent += amount, cases_opened += 1. */
  debitForOpening(userId: number, amount: number): Promise<void>;

  insertInventoryEntry(entry: NewInventoryEntry): Promise<InventoryEntry>;

  insertOpeningRecord(record: NewOpeningRecord): Promise<OpeningRecord>;

  markEntrySold(entryId: number, soldPrice: number): Promise<void>;

  creditBalance(userId: number, amount: number): Promise<void>;
}

/**
 * Persistence boundary of the economy. Catalog rows (cases, items,
 * contents) are only read here; they are maintained elsewhere.
 */
export interface EconomyStore {
  findUserById(userId: number): Promise<User | null>;

  /**
   * Returns the user for this platform identity, creating it with
   * `startingBalance` on first contact. Concurrent calls create one row.
   */
  getOrCreateUser(identity: Identity, startingBalance: number): Promise<User>;

  findCase(caseId: number): Promise<Case | null>;

  listActiveCases(): Promise<Case[]>;

  /** Every content row of the case with its item, active or not. */
  listCaseContents(caseId: number): Promise<CaseContentWithItem[]>;

  /** Unsold entries, newest first. */
  listInventory(userId: number): Promise<InventoryView[]>;

  /** Opening records, newest first. */
  listHistory(userId: number, limit: number): Promise<HistoryView[]>;

  /** Commits when `work` resolves, rolls back when it rejects. */
  transaction<T>(work: (tx: EconomyTransaction) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}
