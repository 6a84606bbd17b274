import { CaseListing, DrawCandidate } from "../models/types";
import { EconomyStore } from "../repositories/EconomyStore";

const isUsableWeight = (weight: number) => Number.isFinite(weight) && weight > 0;

export class CatalogReader {
  constructor(private readonly store: EconomyStore) {}

  /**
   * Draw pool of a case: content rows that are active and point at an
   * active item. Empty means the case cannot be opened right now.
   */
  async activeContents(caseId: number): Promise<DrawCandidate[]> {
    const rows = await this.store.listCaseContents(caseId);
    const pool: DrawCandidate[] = [];

    for (const { content, item } of rows) {
      if (!content.is_active || !item.is_active) continue;
      if (!isUsableWeight(content.weight)) {
        console.warn(
          `Catalog: skipping content ${content.id} of case ${caseId}, weight ${content.weight} is not positive`,
        );
        continue;
      }
      pool.push({ item, weight: content.weight });
    }

    return pool;
  }

  // Public listing: active cases with the chance of each prize, in percent
  async listCatalog(): Promise<CaseListing[]> {
    const cases = await this.store.listActiveCases();

    // Sequential, one pooled connection at a time
    const listings: CaseListing[] = [];
    for (const box of cases) {
      const pool = await this.activeContents(box.id);
      const total = pool.reduce((sum, c) => sum + c.weight, 0);
      listings.push({
        ...box,
        contents: pool.map((candidate) => ({
          ...candidate,
          chance: Math.round((candidate.weight / total) * 10000) / 100,
        })),
      });
    }
    return listings;
  }
}
