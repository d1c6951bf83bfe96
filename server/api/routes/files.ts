import { Router } from "express";
import { fileNameParamsSchema, upgradeQuerySchema, type LastModified } from "@shared/schema";
import { storage } from "../../storage";
import { sendError, validate, handleRouteError } from "../types";

const router = Router();

router.get("/file/:fileName", async (req, res) => {
  const params = validate(res, fileNameParamsSchema, req.params);
  if (!params) return;

  try {
    const item = await storage.getByFileName(params.fileName);
    if (!item) return sendError(res, 404, "NOT_FOUND", `File ${params.fileName} not found`);

    res.json(item);
  } catch (error) {
    handleRouteError(res, error, "Failed to fetch file");
  }
});

router.get("/filelastmodified/:fileName", async (req, res) => {
  const params = validate(res, fileNameParamsSchema, req.params);
  if (!params) return;

  try {
    const lastModified = await storage.getFileLastModified(params.fileName);
    if (lastModified === undefined) {
      return sendError(res, 404, "NOT_FOUND", `File ${params.fileName} not found`);
    }

    const body: LastModified = { last_modified: lastModified };
    res.json(body);
  } catch (error) {
    handleRouteError(res, error, "Failed to fetch last modified date");
  }
});

router.get("/fileupgrade/:fileName", async (req, res) => {
  const params = validate(res, fileNameParamsSchema, req.params);
  if (!params) return;
  const query = validate(res, upgradeQuerySchema, req.query);
  if (!query) return;

  try {
    const item = await storage.getByFileName(params.fileName);
    if (!item) return sendError(res, 404, "NOT_FOUND", `File ${params.fileName} not found`);

    const upgrades = await storage.getUpgrades(item.group_id, item.artifact_id, item.version_seq, query.limit);
    // Nothing newer: 204 carries no body.
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
