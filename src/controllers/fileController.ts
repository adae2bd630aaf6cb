/**
 * File Controller
 * Directory listing and artifact downloads for devices on the local network.
 */

import type { Request, Response, NextFunction } from "express";
import path from "path";
import {
  buildContentDisposition,
  listRecentArtifacts,
  renderListingHtml,
  resolveArtifactPath,
} from "../services/business/fileServerService.js";

const DOWNLOAD_PREFIX = "/download/";

export function createFileController(downloadDir: string, fileBrowserUrl: string) {
  return {
    /**
     * GET /
     * HTML listing of the 20 most recent files
     */
    async listFiles(_req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const entries = await listRecentArtifacts(downloadDir);
        res.status(200).type("text/html").send(renderListingHtml(entries));
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /download/{name}
     * The name is read from the raw path so it is percent-decoded exactly once.
     */
    async downloadFile(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const rawName = req.path.slice(DOWNLOAD_PREFIX.length);
        const result = await resolveArtifactPath(downloadDir, rawName);

        if (result.kind === "denied") {
          console.warn(`[files] ✗ denied path outside download dir: ${rawName}`);
          res.status(403).type("text/plain").send("Access denied");
          return;
        }
        if (result.kind === "missing") {
          res.status(404).type("text/plain").send("File not found");
          return;
        }

        res.setHeader("Content-Disposition", buildContentDisposition(result.name));
        res.sendFile(result.path, { dotfiles: "allow" }, (error) => {
          if (!error) return;
          if (res.headersSent) {
            console.warn(`[files] transfer of ${path.basename(result.path)} interrupted: ${error.message}`);
            return;
          }
          next(error);
        });
      } catch (error) {
        next(error);
      }
    },

    /**
     * GET /api/files
     */
    getFileBrowserUrl(_req: Request, res: Response): void {
      res.status(200).json({ url: fileBrowserUrl });
    },
  };
}
