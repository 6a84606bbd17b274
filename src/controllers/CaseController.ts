import { Request, Response } from "express";
import { EconomyGateway } from "../services/EconomyGateway";
import { CacheService, CACHE_TTL } from "../utils/cache";
import { parseId, sendError, sendResult } from "../utils/respond";

export const CASES_CACHE_KEY = "cases:active";

export class CaseController {
  constructor(private readonly gateway: EconomyGateway) {}

  // --- Public catalog with prize chances ---
  listCases = async (req: Request, res: Response) => {
    try {
      const cached = await CacheService.get(CASES_CACHE_KEY);
      if (cached) return res.json(cached);

      const cases = await this.gateway.listCases();

      await CacheService.set(CASES_CACHE_KEY, cases, CACHE_TTL.SHORT);
      res.json(cases);
    } catch (error) {
      sendError(res, error, "List Cases Error");
    }
  };

  // --- Open a case for the authenticated user ---
  openCase = async (req: Request, res: Response) => {
    const caseId = parseId(req.params.caseId);
    if (!caseId) return res.status(400).json({ error: "Valid case ID required" });

    try {
      const result = await this.gateway.openCase(req.initData ?? "", caseId);
      sendResult(res, result, 201);
    } catch (error) {
      sendError(res, error, "Open Case Error");
    }
  };
}
