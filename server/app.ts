/**
 * Express app factory - CORS, JSON body parsing, API routes.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { registerApiRoutes, type ApiDeps } from "./routes/index.js";

export interface AppDeps extends ApiDeps {
  frontendUrl: string;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(
    cors({
      origin: [deps.frontendUrl],
      credentials: true,
    })
  );
  app.use(express.json({ limit: "1mb" }));

  registerApiRoutes(app, deps);

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ success: false, error: { code: "NOT_FOUND", message: "Not found" } });
  });

  // Malformed JSON bodies surface here from express.json()
  app.use((e: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = typeof e === "object" && e !== null && "status" in e && typeof e.status === "number" ? e.status : 500;
    if (status >= 500) console.error("[Server] Unhandled error:", e);
    res.status(status).json({
      success: false,
      error: status >= 500
        ? { code: "INTERNAL_ERROR", message: "Error generating response" }
        : { code: "BAD_REQUEST", message: "Malformed request body" },
    });
  });

  return app;
}
