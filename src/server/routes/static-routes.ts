/**
 * Front-end assets: /static/* from the static directory, and its index.html at /.
 */

import { existsSync } from "node:fs";
import path from "node:path";
import express, { Router } from "express";

export const ROOT_MESSAGE = "Shipment lookup API is running.";

export function staticRoutes(staticDir: string): Router {
  const router = Router();
  const root = path.resolve(staticDir);

  if (existsSync(root)) {
    router.use("/static", express.static(root));
  }

  router.get("/", (_req, res) => {
    const index = path.join(root, "index.html");
    if (existsSync(index)) {
      res.sendFile(index);
      return;
    }
    res.status(200).json({ message: ROOT_MESSAGE });
  });

  return router;
}
