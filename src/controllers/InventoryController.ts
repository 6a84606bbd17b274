import { Request, Response } from "express";
import { EconomyGateway } from "../services/EconomyGateway";
import { parseId, sendError, sendResult } from "../utils/respond";

export class InventoryController {
  constructor(private readonly gateway: EconomyGateway) {}

  listInventory = async (req: Request, res: Response) => {
    try {
      sendResult(res, await this.gateway.listInventory(req.initData ?? ""));
    } catch (error) {
      sendError(res, error, "Inventory Error");
    }
  };

  // --- Sell back at the buy-back ratio ---
  sellItem = async (req: Request, res: Response) => {
    const entryId = parseId(req.params.entryId);
    if (!entryId) return res.status(400).json({ error: "Valid inventory entry ID required" });

    try {
      sendResult(res, await this.gateway.sellItem(req.initData ?? "", entryId));
    } catch (error) {
      sendError(res, error, "Sell Item Error");
    }
  };
}
