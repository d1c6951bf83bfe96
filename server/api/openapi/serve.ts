import type { Express } from "express";
import { apiReference } from "@scalar/express-api-reference";
import { getOpenAPISpec } from "./spec";

export function serveApiDocs(app: Express): void {
  // Raw OpenAPI spec
  app.get("/openapi.json", (_req, res) => {
    res.json(getOpenAPISpec());
  });

  // Interactive Scalar docs UI
  app.use(
    "/docs",
    apiReference({
      url: "/openapi.json",
      theme: "default",
    }),
  );
}
