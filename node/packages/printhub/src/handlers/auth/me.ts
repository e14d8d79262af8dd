import { Request, Response } from "express";

/**
 * GET /api/v1/auth/me - The authenticated user
 */
export function meHandler() {
  return async (req: Request, res: Response): Promise<void> => {
    res.json(req.user);
  };
}
