import {
  CaseListing,
  HistoryView,
  InventoryView,
  Item,
  SellOutcome,
  User,
} from "../models/types";
import { EconomyResult, fail, ok } from "../utils/errors";
import { CatalogReader } from "./CatalogReader";
import { EconomyLedger } from "./EconomyLedger";
import { IdentityVerifier, parseIdentity } from "./IdentityVerifier";

export interface OpenCaseResponse {
  item: Item;
  inventory_entry_id: number;
  balance: number;
}

/**
 * Transport-agnostic request surface. Every call carrying an identity
 * payload is rejected with AuthenticationFailure unless the signature
 * checks out; the first verified contact creates the user.
 */
export class EconomyGateway {
  constructor(
    private readonly verifier: IdentityVerifier,
    private readonly ledger: EconomyLedger,
    private readonly catalog: CatalogReader,
  ) {}

  async authenticate(payload: string): Promise<EconomyResult<User>> {
    if (!this.verifier.verify(payload)) {
      return fail("AuthenticationFailure", "Identity payload signature is invalid");
    }
    const identity = parseIdentity(payload);
    if (!identity) {
      return fail("AuthenticationFailure", "Identity payload carries no user");
    }
    return ok(await this.ledger.ensureUser(identity));
  }

  async openCase(payload: string, caseId: number): Promise<EconomyResult<OpenCaseResponse>> {
    const auth = await this.authenticate(payload);
    if (!auth.ok) return auth;

    const result = await this.ledger.openCase(auth.value.id, caseId);
    if (!result.ok) return result;

    const { item, entry, balance } = result.value;
    return ok({ item, inventory_entry_id: entry.id, balance });
  }

  async sellItem(payload: string, entryId: number): Promise<EconomyResult<SellOutcome>> {
    const auth = await this.authenticate(payload);
    if (!auth.ok) return auth;
    return this.ledger.sellItem(auth.value.id, entryId);
  }

  listCases(): Promise<CaseListing[]> {
    return this.catalog.listCatalog();
  }

  async listInventory(payload: string): Promise<EconomyResult<InventoryView[]>> {
    const auth = await this.authenticate(payload);
    if (!auth.ok) return auth;
    return ok(await this.ledger.listInventory(auth.value.id));
  }

  async profile(payload: string): Promise<EconomyResult<User>> {
    return this.authenticate(payload);
  }

  async history(payload: string, limit?: number): Promise<EconomyResult<HistoryView[]>> {
    const auth = await this.authenticate(payload);
    if (!auth.ok) return auth;
    return ok(await this.ledger.listHistory(auth.value.id, limit));
  }
}
