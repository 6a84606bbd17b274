import {
  HistoryView,
  Identity,
  InventoryView,
  OpenCaseOutcome,
  SellOutcome,
  User,
} from "../models/types";
import { EconomyStore } from "../repositories/EconomyStore";
import { EconomyResult, fail, ok } from "../utils/errors";
import { CatalogReader } from "./CatalogReader";
import { WeightedSelector } from "./WeightedSelector";

export interface LedgerSettings {
  /** Fraction of the item price paid back on sale. */
  sellRatio: number;
  startingBalance: number;
}

export const DEFAULT_HISTORY_LIMIT = 50;

const BASIS_POINTS = 10_000;

/**
 * floor(price * ratio) in integer basis points. A float product such as
 * 90 * 0.7 lands just below 63 and would floor to 62.
 */
export const buyBackPrice = (price: number, sellRatio: number) => {
  const bps = Math.round(sellRatio * BASIS_POINTS);
  return Math.floor((price * bps) / BASIS_POINTS);
};

/**
 * Sole writer of balances, inventory entries and opening history. Each
 * mutation runs in one store transaction holding the user's row claim, so
 * concurrent requests of one user are applied one after another.
 */
export class EconomyLedger {
  constructor(
    private readonly store: EconomyStore,
    private readonly catalog: CatalogReader,
    private readonly selector: WeightedSelector,
    private readonly settings: LedgerSettings,
  ) {}

  ensureUser(identity: Identity): Promise<User> {
    return this.store.getOrCreateUser(identity, this.settings.startingBalance);
  }

  // --- OPEN CASE: debit, draw, credit item, audit ---
  async openCase(userId: number, caseId: number): Promise<EconomyResult<OpenCaseOutcome>> {
    // Catalog rows are never written here, read them before taking the claim
    const box = await this.store.findCase(caseId);
    const pool = box ? await this.catalog.activeContents(caseId) : [];

    const result = await this.store.transaction(
      async (tx): Promise<EconomyResult<OpenCaseOutcome>> => {
        // 1. Lock user row, the balance read below is current until commit
        const user = await tx.lockUser(userId);
        if (!user) return fail("NotFound", `User ${userId} not found`);

        // 2. Case must exist, be active and have something to draw
        if (!box) return fail("NotFound", `Case ${caseId} not found`);
        if (!box.is_active) return fail("NotFound", `Case ${caseId} is not available`);
        if (pool.length === 0) {
          return fail("EmptyPool", `Case ${caseId} has no items to draw`);
        }

        // 3. Funds
        if (user.balance < box.price) {
          return fail(
            "InsufficientFunds",
            `Case costs ${box.price} stars, balance is ${user.balance}`,
          );
        }

        // 4. Draw and write everything in the same transaction
        const { item } = this.selector.select(pool);
        await tx.debitForOpening(user.id, box.price);
        const entry = await tx.insertInventoryEntry({
          user_id: user.id,
          item_id: item.id,
          case_id: box.id,
        });
        await tx.insertOpeningRecord({
          user_id: user.id,
          case_id: box.id,
          item_id: item.id,
          spent: box.price,
        });

        return ok({ item, entry, balance: user.balance - box.price });
      },
    );

    if (result.ok) {
      console.log(
        `🎁 User ${userId} opened case ${caseId} and got "${result.value.item.name}" (${result.value.item.rarity}), balance ${result.value.balance}`,
      );
    }
    return result;
  }

  // --- SELL ITEM: owned -> sold, credit proceeds ---
  async sellItem(userId: number, entryId: number): Promise<EconomyResult<SellOutcome>> {
    const result = await this.store.transaction(
      async (tx): Promise<EconomyResult<SellOutcome>> => {
        const user = await tx.lockUser(userId);
        if (!user) return fail("NotFound", `User ${userId} not found`);

        const entry = await tx.lockInventoryEntry(entryId);
        if (!entry || entry.user_id !== userId) {
          return fail("NotFound", `Inventory entry ${entryId} not found`);
        }
        if (entry.is_sold) {
          return fail("Conflict", `Inventory entry ${entryId} was already sold`);
        }

        const item = await tx.findItem(entry.item_id);
        if (!item) return fail("NotFound", `Item ${entry.item_id} not found`);

        const proceeds = buyBackPrice(item.price, this.settings.sellRatio);
        await tx.markEntrySold(entry.id, proceeds);
        await tx.creditBalance(user.id, proceeds);

        return ok({ proceeds, balance: user.balance + proceeds });
      },
    );

    if (result.ok) {
      console.log(
        `💰 User ${userId} sold entry ${entryId} for ${result.value.proceeds}, balance ${result.value.balance}`,
      );
    }
    return result;
  }

  listInventory(userId: number): Promise<InventoryView[]> {
    return this.store.listInventory(userId);
  }

  listHistory(userId: number, limit = DEFAULT_HISTORY_LIMIT): Promise<HistoryView[]> {
    return this.store.listHistory(userId, limit);
  }
}
