import express, { type Express, type Request, type Response, type NextFunction } from "express";
import cors from "cors";
import type { AppConfig } from "./config";
import type { IStorage } from "./storage";
import { registerRoutes } from "./routes";
import { log } from "./log";

function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null) {
    if ("status" in err && typeof err.status === "number") return err.status;
    if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  }
  return 500;
}

export function createApp(store: IStorage, config: AppConfig): Express {
  const app = express();

  app.use(cors({
    origin: config.corsOrigin,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Accept'],
    credentials: false
  }));

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  if (config.nodeEnv !== "test") {
    app.use((req, res, next) => {
      const start = Date.now();
      const path = req.path;
      let capturedJsonResponse: unknown = undefined;

      const originalResJson = res.json;
      res.json = function (bodyJson) {
        capturedJsonResponse = bodyJson;
        return originalResJson.call(res, bodyJson);
      };

      res.on("finish", () => {
        const duration = Date.now() - start;
        if (path.startsWith("/api")) {
          let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
          if (capturedJsonResponse !== undefined && config.nodeEnv !== "production") {
            logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
          }

          log(logLine);
        }
      });

      next();
    });
  }

  registerRoutes(app, store);

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const message = err instanceof Error && err.message ? err.message : "Internal Server Error";

    if (status >= 500) {
      console.error(`[Server] ${message}`, err);
    }
    res.status(status).json({ message });
  });

  return app;
}
