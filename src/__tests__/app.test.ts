/**
 * app.test.ts
 *
 * HTTP surface on an ephemeral port backed by the memory store. Redis is
 * never connected here, so caching and rate limiting pass through.
 */

import http from "http";
import { createApp } from "../app";
import { MemoryEconomyStore } from "../repositories/MemoryEconomyStore";
import { TEST_BOT_TOKEN, httpRequest as request, listenLocally, signedPayload } from "./fixtures";

describe("HTTP API", () => {
  let server: http.Server;
  let port = 0;
  const player = signedPayload({ id: 42, first_name: "Test" });

  beforeAll(async () => {
    jest.spyOn(console, "log").mockImplementation(() => undefined);

    const store = new MemoryEconomyStore();
    const gift = store.addItem({ name: "Gift Box", rarity: "common", price: 100 });
    const cheap = store.addCase({ name: "Gift Case", price: 150 });
    store.addCaseContent({ case_id: cheap.id, item_id: gift.id, weight: 1 });
    store.addCase({ name: "Vault", price: 5000 });
    const crown = store.addItem({ name: "Crown", rarity: "legendary", price: 9000 });
    store.addCaseContent({ case_id: 2, item_id: crown.id, weight: 1 });

    const app = createApp({
      store,
      botToken: TEST_BOT_TOKEN,
      settings: { sellRatio: 0.7, startingBalance: 1000 },
      random: () => 0,
      logRequests: false,
    });

    ({ server, port } = await listenLocally(app));
  });

  afterAll((done) => {
    jest.restoreAllMocks();
    server.close(done);
  });

  it("answers the health check", async () => {
    const reply = await request(port, "GET", "/api/health");
    expect(reply).toEqual({ status: 200, body: { status: "ok", service: "case-economy-api" } });
  });

  it("lists cases with prize chances", async () => {
    const reply = await request(port, "GET", "/api/cases");

    expect(reply.status).toBe(200);
    expect(reply.body).toMatchObject([
      { id: 1, name: "Gift Case", price: 150, contents: [{ weight: 1, chance: 100 }] },
      { id: 2, name: "Vault", price: 5000, contents: [{ weight: 1, chance: 100 }] },
    ]);
  });

  it("requires an identity payload", async () => {
    const reply = await request(port, "GET", "/api/me");
    expect(reply).toEqual({ status: 401, body: { error: "Identity payload required" } });
  });

  it("rejects a forged identity payload with 401", async () => {
    const reply = await request(port, "GET", "/api/me", signedPayload({ id: 42 }, "other-secret"));
    expect(reply).toEqual({
      status: 401,
      body: { error: "Identity payload signature is invalid", kind: "AuthenticationFailure" },
    });
  });

  it("rejects a malformed case id", async () => {
    const reply = await request(port, "POST", "/api/cases/abc/open", player);
    expect(reply).toEqual({ status: 400, body: { error: "Valid case ID required" } });
  });

  it("walks through open, inventory, sell and history", async () => {
    const opened = await request(port, "POST", "/api/cases/1/open", player);
    expect(opened.status).toBe(201);
    expect(opened.body).toMatchObject({
      item: { name: "Gift Box", rarity: "common" },
      inventory_entry_id: 1,
      balance: 850,
    });

    const inventory = await request(port, "GET", "/api/inventory", player);
    expect(inventory.status).toBe(200);
    expect(inventory.body).toMatchObject([{ id: 1, case_id: 1, item: { name: "Gift Box" } }]);

    const sold = await request(port, "POST", "/api/inventory/1/sell", player);
    expect(sold).toEqual({ status: 200, body: { proceeds: 70, balance: 920 } });

    const again = await request(port, "POST", "/api/inventory/1/sell", player);
    expect(again).toEqual({
      status: 409,
      body: { error: "Inventory entry 1 was already sold", kind: "Conflict" },
    });

    const me = await request(port, "GET", "/api/me", player);
    expect(me.body).toMatchObject({ telegram_id: 42, balance: 920, total_spent: 150, cases_opened: 1 });

    const history = await request(port, "GET", "/api/me/history?limit=5", player);
    expect(history.body).toMatchObject([{ case_id: 1, case_name: "Gift Case", spent: 150 }]);
  });

  it("answers 402 when the balance does not cover the price", async () => {
    const reply = await request(port, "POST", "/api/cases/2/open", player);
    expect(reply).toEqual({
      status: 402,
      body: { error: "Case costs 5000 stars, balance is 920", kind: "InsufficientFunds" },
    });
  });

  it("answers 404 for an unknown case", async () => {
    const reply = await request(port, "POST", "/api/cases/99/open", player);
    expect(reply).toEqual({ status: 404, body: { error: "Case 99 not found", kind: "NotFound" } });
  });
});
