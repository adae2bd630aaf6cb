/**
 * File Server Routes
 * Listing page and artifact downloads.
 */

import { Router } from "express";
import { createFileController } from "../controllers/fileController.js";

export function createFilesRouter(downloadDir: string, fileBrowserUrl: string): Router {
  const filesRouter = Router();
  const files = createFileController(downloadDir, fileBrowserUrl);

  filesRouter.get("/", files.listFiles);
  filesRouter.get("/api/files", files.getFileBrowserUrl);

  /** No capture group: Express would decode it and reject malformed escapes with 400 */
  filesRouter.get(/^\/download\/.+$/, files.downloadFile);

  return filesRouter;
}
