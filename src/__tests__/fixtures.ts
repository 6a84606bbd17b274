import http from "http";
import { AddressInfo } from "net";
import { MemoryEconomyStore } from "../repositories/MemoryEconomyStore";
import { CatalogReader } from "../services/CatalogReader";
import { EconomyLedger, LedgerSettings } from "../services/EconomyLedger";
import { IdentityVerifier } from "../services/IdentityVerifier";
import { RandomSource, WeightedSelector } from "../services/WeightedSelector";

export const TEST_BOT_TOKEN = "test-secret";

export interface TestUser {
  id: number;
  first_name?: string;
  username?: string;
}

export const signedPayload = (
  user: TestUser,
  token: string = TEST_BOT_TOKEN,
  extra: Record<string, string> = {},
) =>
  new IdentityVerifier(token).sign({
    auth_date: "1700000000",
    query_id: "AAHtest",
    user: encodeURIComponent(JSON.stringify(user)),
    ...extra,
  });

/**
 * Memory store with one case priced 150 holding a common item (price 100,
 * weight 3) and a rare one (price 250, weight 1). The default random
 * source always returns 0, so draws land on the common item.
 */
export const buildEconomy = (
  options: { settings?: Partial<LedgerSettings>; random?: RandomSource; store?: MemoryEconomyStore } = {},
) => {
  const store = options.store ?? new MemoryEconomyStore();
  const common = store.addItem({ name: "Teddy Bear", rarity: "common", price: 100 });
  const rare = store.addItem({ name: "Silver Ring", rarity: "rare", price: 250 });
  const box = store.addCase({ name: "Starter Case", price: 150 });
  store.addCaseContent({ case_id: box.id, item_id: common.id, weight: 3 });
  store.addCaseContent({ case_id: box.id, item_id: rare.id, weight: 1 });

  const catalog = new CatalogReader(store);
  const ledger = new EconomyLedger(
    store,
    catalog,
    new WeightedSelector(options.random ?? (() => 0)),
    { sellRatio: 0.7, startingBalance: 1000, ...options.settings },
  );

  return { store, catalog, ledger, common, rare, box };
};

export const newUser = (ledger: EconomyLedger, telegramId = 42) =>
  ledger.ensureUser({
    telegram_id: telegramId,
    username: "tester",
    first_name: "Test",
    last_name: null,
  });

export interface Reply {
  status: number;
  body: unknown;
}

/** Starts `handler` on an ephemeral local port. */
export const listenLocally = (handler: http.RequestListener): Promise<{ server: http.Server; port: number }> =>
  new Promise((resolve) => {
    const server = http.createServer(handler);
    server.listen(0, "127.0.0.1", () => {
      const address: AddressInfo | string | null = server.address();
      resolve({ server, port: address && typeof address === "object" ? address.port : 0 });
    });
  });

/** JSON request with the identity payload in the `tma` authorization scheme. */
export const httpRequest = (
  port: number,
  method: string,
  path: string,
  payload?: string,
): Promise<Reply> =>
  new Promise((resolve, reject) => {
    const headers: http.OutgoingHttpHeaders = {};
    if (payload) headers.authorization = `tma ${payload}`;

    const req = http.request({ host: "127.0.0.1", port, method, path, headers }, (res) => {
      let raw = "";
      res.setEncoding("utf8");
      res.on("data", (chunk: string) => {
        raw += chunk;
      });
      res.on("end", () => {
        resolve({ status: res.statusCode ?? 0, body: raw ? JSON.parse(raw) : null });
      });
    });
    req.on("error", reject);
    req.end();
  });
