import express, { type Express } from "express";
import { registerRoutes } from "./routes";
import { apiErrorHandler } from "./api/middleware/error-handler";
import type { ApiRouterOptions } from "./api";
import { log } from "./log";

export function createApp(options: ApiRouterOptions): Express {
  const app = express();

  app.disable("x-powered-by");

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown = undefined;

    const originalResJson = res.json.bind(res);
    res.json = (bodyJson) => {
      capturedJsonResponse = bodyJson;
      return originalResJson(bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined) {
          const snippet = JSON.stringify(capturedJsonResponse);
          logLine += ` :: ${snippet.length > 200 ? snippet.slice(0, 200) + '…' : snippet}`;
        }

        log(logLine);
      }
    });

    next();
  });

  registerRoutes(app, options);

  app.use(apiErrorHandler);

  return app;
}
