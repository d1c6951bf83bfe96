import { Router } from "express";
import { storage } from "../../storage";
import { handleRouteError } from "../types";

const router = Router();

router.get("/", (_req, res) => {
  res.json({ message: "API Server is up and running.." });
});

router.get("/health", async (_req, res) => {
  try {
    await storage.checkHealth();
    res.json({ status: "ok" });
  } catch (error) {
    handleRouteError(res, error, "Health check failed");
  }
});

export default router;
