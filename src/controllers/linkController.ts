/**
 * Link Controller
 * Accepts a chat message, stores the link and returns the quality choices.
 */

import type { Request, Response, NextFunction } from "express";
import type { SubmitLinkBody } from "../middlewares/schemas/jobSchemas.js";
import type { LinkService } from "../services/business/linkService.js";

export function createLinkController(linkService: LinkService) {
  return {
    /**
     * POST /api/links
     */
    async submitLink(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const { text }: SubmitLinkBody = req.body;
        const link = await linkService.submitLink(text);
        res.status(200).json(link);
      } catch (error) {
        next(error);
      }
    },
  };
}
