/**
 * MemoryEconomyStore.test.ts
 *
 * Transaction and catalog behaviour of the in-process store.
 */

import { StoreUnavailableError } from "../../utils/errors";
import { MemoryEconomyStore } from "../MemoryEconomyStore";

const identity = { telegram_id: 5, username: null, first_name: "Store", last_name: null };

const seedStore = async () => {
  const store = new MemoryEconomyStore();
  const item = store.addItem({ name: "Medal", rarity: "rare", price: 80 });
  const box = store.addCase({ name: "Medal Case", price: 50 });
  store.addCaseContent({ case_id: box.id, item_id: item.id, weight: 1 });
  const user = await store.getOrCreateUser(identity, 500);
  return { store, item, box, user };
};

describe("MemoryEconomyStore", () => {
  it("discards every write of a transaction that throws", async () => {
    const { store, item, box, user } = await seedStore();

    await expect(
      store.transaction(async (tx) => {
        await tx.lockUser(user.id);
        await tx.debitForOpening(user.id, 50);
        await tx.insertInventoryEntry({ user_id: user.id, item_id: item.id, case_id: box.id });
        throw new Error("abort");
      }),
    ).rejects.toThrow("abort");

    expect((await store.findUserById(user.id))?.balance).toBe(500);
    expect(await store.listInventory(user.id)).toEqual([]);
  });

  it("releases row claims after a failed transaction", async () => {
    const { store, user } = await seedStore();

    await expect(
      store.transaction(async (tx) => {
        await tx.lockUser(user.id);
        throw new Error("abort");
      }),
    ).rejects.toThrow("abort");

    const locked = await store.transaction((tx) => tx.lockUser(user.id));
    expect(locked?.id).toBe(user.id);
  });

  it("does not let a debit take the balance below zero", async () => {
    const { store, user } = await seedStore();

    await expect(
      store.transaction(async (tx) => {
        await tx.lockUser(user.id);
        await tx.debitForOpening(user.id, 501);
      }),
    ).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it("keeps owned items when their case is removed", async () => {
    const { store, item, box, user } = await seedStore();
    await store.transaction(async (tx) => {
      await tx.lockUser(user.id);
      await tx.debitForOpening(user.id, box.price);
      await tx.insertInventoryEntry({ user_id: user.id, item_id: item.id, case_id: box.id });
      await tx.insertOpeningRecord({ user_id: user.id, case_id: box.id, item_id: item.id, spent: box.price });
    });

    expect(store.removeCase(box.id)).toBe(true);

    const inventory = await store.listInventory(user.id);
    expect(inventory).toHaveLength(1);
    expect(inventory[0].case_id).toBeNull();
    expect(await store.listHistory(user.id, 10)).toEqual([]);
    expect(await store.listCaseContents(box.id)).toEqual([]);
    expect(store.removeCase(box.id)).toBe(false);
  });

  it("returns copies that callers cannot use to change stored rows", async () => {
    const { store, user } = await seedStore();
    const copy = await store.findUserById(user.id);
    if (copy) copy.balance = 0;
    expect((await store.findUserById(user.id))?.balance).toBe(500);
  });

  it("rejects content for an unknown case or item", () => {
    const store = new MemoryEconomyStore();
    expect(() => store.addCaseContent({ case_id: 1, item_id: 1, weight: 1 })).toThrow(
      "Case 1 or item 1 does not exist",
    );
  });

  it("reports StoreUnavailable once closed", async () => {
    const { store, box } = await seedStore();
    await store.close();

    await expect(store.findCase(box.id)).rejects.toBeInstanceOf(StoreUnavailableError);
    await expect(store.transaction(async () => undefined)).rejects.toThrow("Store is closed");
  });
});
