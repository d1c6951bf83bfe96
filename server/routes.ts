import type { Express } from "express";
import { createApiRouter, type ApiRouterOptions } from "./api";
import { serveApiDocs } from "./api/openapi/serve";

export function registerRoutes(app: Express, options: ApiRouterOptions): void {
  app.get("/", (_req, res) => {
    res.json({ message: "Server is up and running.." });
  });

  app.use("/api", createApiRouter(options));

  serveApiDocs(app);
}
