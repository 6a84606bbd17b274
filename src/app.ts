import express from "express";
import cors from "cors";
import { CaseController } from "./controllers/CaseController";
import { InventoryController } from "./controllers/InventoryController";
import { UserController } from "./controllers/UserController";
import { requireInitData } from "./middleware/auth";
import { requestLogger } from "./middleware/logger";
import { identityKey, rateLimit } from "./middleware/rateLimit";
import { EconomyStore } from "./repositories/EconomyStore";
import { CatalogReader } from "./services/CatalogReader";
import { EconomyGateway } from "./services/EconomyGateway";
import { EconomyLedger, LedgerSettings } from "./services/EconomyLedger";
import { IdentityVerifier } from "./services/IdentityVerifier";
import { RandomSource, WeightedSelector } from "./services/WeightedSelector";

export interface AppDependencies {
  store: EconomyStore;
  botToken: string;
  settings: LedgerSettings;
  random?: RandomSource;
  logRequests?: boolean;
}

export const createGateway = ({ store, botToken, settings, random }: AppDependencies) => {
  const catalog = new CatalogReader(store);
  const ledger = new EconomyLedger(store, catalog, new WeightedSelector(random), settings);
  return new EconomyGateway(new IdentityVerifier(botToken), ledger, catalog);
};

export const createApp = (deps: AppDependencies) => {
  const gateway = createGateway(deps);
  const cases = new CaseController(gateway);
  const inventory = new InventoryController(gateway);
  const users = new UserController(gateway);
  const callerKey = identityKey(new IdentityVerifier(deps.botToken));

  const app = express();

  app.use(cors());
  app.use(express.json());
  if (deps.logRequests ?? true) {
    app.use(requestLogger);
  }

  // Catalog
  app.get("/api/cases", cases.listCases);
  app.post(
    "/api/cases/:caseId/open",
    requireInitData,
    rateLimit("open", 10, 5, callerKey), // 5 opens per 10 seconds
    cases.openCase,
  );

  // Inventory
  app.get("/api/inventory", requireInitData, inventory.listInventory);
  app.post(
    "/api/inventory/:entryId/sell",
    requireInitData,
    rateLimit("sell", 10, 10, callerKey),
    inventory.sellItem,
  );

  // Profile
  app.get("/api/me", requireInitData, users.me);
  app.get("/api/me/history", requireInitData, users.history);

  app.get("/api/health", (req, res) => {
    res.json({ status: "ok", service: "case-economy-api" });
  });

  return app;
};
