import { Request, Response } from "express";
import { EconomyGateway } from "../services/EconomyGateway";
import { sendError, sendResult } from "../utils/respond";

const MAX_HISTORY = 100;

export class UserController {
  constructor(private readonly gateway: EconomyGateway) {}

  me = async (req: Request, res: Response) => {
    try {
      sendResult(res, await this.gateway.profile(req.initData ?? ""));
    } catch (error) {
      sendError(res, error, "Me Error");
    }
  };

  history = async (req: Request, res: Response) => {
    const requested = Number(req.query.limit);
    const limit =
      Number.isInteger(requested) && requested > 0 ? Math.min(requested, MAX_HISTORY) : undefined;

    try {
      sendResult(res, await this.gateway.history(req.initData ?? "", limit));
    } catch (error) {
      sendError(res, error, "History Error");
    }
  };
}
