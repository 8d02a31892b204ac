import type { Express } from "express";
import type { IStorage } from "./storage";
import { isDbReady } from "./db";
import { registerListingRoutes } from "./routes/listings";

export function registerRoutes(app: Express, store: IStorage): void {
  app.get("/healthz", (_req, res) => {
    res.json({
      status: "ok",
      database: isDbReady(),
    });
  });

  registerListingRoutes(app, store);
}
