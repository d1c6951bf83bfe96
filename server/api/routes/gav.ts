import { Router } from "express";
import { coordinateParamsSchema, gavPageQuerySchema, upgradeQuerySchema, type CoordinateParams } from "@shared/schema";
import { storage } from "../../storage";
import { sendError, validate, handleRouteError } from "../types";

const router = Router();

function coordinateString({ groupId, artifactId, artifactVersion }: CoordinateParams): string {
  return `${groupId}/${artifactId}/${artifactVersion}`;
}

router.get("/gav", async (req, res) => {
  const query = validate(res, gavPageQuerySchema, req.query);
  if (!query) return;

  try {
    const items = await storage.getGavPage(query.skip, query.limit);
    if (items.length === 0) return sendError(res, 404, "NOT_FOUND", "No items found");

    res.json(items);
  } catch (error) {
    handleRouteError(res, error, "Failed to fetch GAV items");
  }
});

router.get("/gav/:groupId/:artifactId/:artifactVersion", async (req, res) => {
  const params = validate(res, coordinateParamsSchema, req.params);
  if (!params) return;

  try {
    const items = await storage.getByCoordinates(params.groupId, params.artifactId, params.artifactVersion);
    if (items.length === 0) {
      return sendError(res, 404, "NOT_FOUND", `GAV ${coordinateString(params)} not found`);
    }

    res.json(items);
  } catch (error) {
    handleRouteError(res, error, "Failed to fetch GAV");
  }
});

router.get("/gavupgrade/:groupId/:artifactId/:artifactVersion", async (req, res) => {
  const params = validate(res, coordinateParamsSchema, req.params);
  if (!params) return;
  const query = validate(res, upgradeQuerySchema, req.query);
  if (!query) return;

  try {
    const [item] = await storage.getByCoordinates(params.groupId, params.artifactId, params.artifactVersion);
    if (!item) {
      return sendError(res, 404, "NOT_FOUND", `GAV ${coordinateString(params)} not found`);
    }

    const upgrades = await storage.getUpgrades(item.group_id, item.artifact_id, item.version_seq, query.limit);
    if (upgrades.length === 0) {
      res.status(204).end();
      return;
    }

    res.json(upgrades);
  } catch (error) {
    handleRouteError(res, error, "Failed to look up newer versions");
  }
});

export default router;
