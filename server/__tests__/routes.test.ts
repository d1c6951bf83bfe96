import { describe, it, expect, vi, beforeAll, beforeEach, afterEach } from "vitest";
import type express from "express";
import request from "supertest";
import Database from "better-sqlite3";
import { gavItemSchema, lastModifiedSchema, upgradeSchema, type GavItem, type Upgrade } from "@shared/schema";

// Mock storage
vi.mock("../storage", () => ({
  storage: {
    getGavPage: vi.fn(),
    getByFileName: vi.fn(),
    getFileLastModified: vi.fn(),
    getByCoordinates: vi.fn(),
    getUpgrades: vi.fn(),
    checkHealth: vi.fn(),
  },
}));

vi.mock("../db", () => ({
  closeDatabase: vi.fn(),
}));

import { createApp } from "../app";
import { storage } from "../storage";
import { closeDatabase } from "../db";
import { BadRequestError, DatabaseUnavailableError, MAINTENANCE_MESSAGE } from "../errors";

const mockedStorage = vi.mocked(storage);

let app: express.Express;

beforeAll(() => {
  app = createApp({ rateLimitPerMinute: 10_000 });
});

beforeEach(() => {
  vi.clearAllMocks();
});

afterEach(() => {
  vi.restoreAllMocks();
});

// -- Fixtures --

const mockItem: GavItem = {
  group_id: "org.example",
  artifact_id: "demo-core",
  artifact_version: "1.0.0",
  file_name: "demo-core-1.0.0.jar",
  major_version: 1,
  version_seq: 3,
  last_modified: "2024-01-15 10:20:30",
  size: 4096,
  sha1: "0000000000000000000000000000000000000000",
  signature_exists: 1,
  sources_exists: 1,
  javadoc_exists: 0,
  classifier: "",
  file_extension: "jar",
  packaging: "jar",
  name: "Demo Core",
};

const mockUpgrades: Upgrade[] = [
  { artifact_version: "1.1.0", last_modified: "2024-03-01 00:00:00" },
  { artifact_version: "2.0.0", last_modified: "2024-09-01 00:00:00" },
];

// -- Status --

describe("GET /", () => {
  it("reports the server is running", async () => {
    const res = await request(app).get("/");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: "Server is up and running.." });
  });
});

describe("GET /api/", () => {
  it("reports the API is running", async () => {
    const res = await request(app).get("/api/");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: "API Server is up and running.." });
  });

  it("allows any origin", async () => {
    const res = await request(app).get("/api/").set("Origin", "https://example.com");
    expect(res.headers["access-control-allow-origin"]).toBe("*");
  });
});

describe("GET /api/health", () => {
  it("returns ok when the database answers", async () => {
    mockedStorage.checkHealth.mockResolvedValue(undefined);

    const res = await request(app).get("/api/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok" });
  });

  it("returns 503 when the database cannot be opened", async () => {
    mockedStorage.checkHealth.mockRejectedValue(new DatabaseUnavailableError());
    vi.spyOn(console, "error").mockImplementation(() => {});

    const res = await request(app).get("/api/health");
    expect(res.status).toBe(503);
    expect(res.body.error).toEqual({ code: "SERVICE_UNAVAILABLE", message: MAINTENANCE_MESSAGE });
  });
});

// -- Files --

describe("GET /api/file/:fileName", () => {
  it("returns the file's metadata", async () => {
    mockedStorage.getByFileName.mockResolvedValue(mockItem);

    const res = await request(app).get("/api/file/demo-core-1.0.0.jar");
    expect(res.status).toBe(200);
    expect(res.body).toEqual(mockItem);
    expect(gavItemSchema.safeParse(res.body).success).toBe(true);
    expect(mockedStorage.getByFileName).toHaveBeenCalledWith("demo-core-1.0.0.jar");
  });

  it("returns 404 for an unknown file", async () => {
    mockedStorage.getByFileName.mockResolvedValue(undefined);

    const res = await request(app).get("/api/file/missing-1.0.jar");
    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({ code: "NOT_FOUND", message: "File missing-1.0.jar not found" });
  });

  it("returns 422 for a name longer than 512 characters", async () => {
    const res = await request(app).get(`/api/file/${"a".repeat(513)}`);
    expect(res.status).toBe(422);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
    expect(mockedStorage.getByFileName).not.toHaveBeenCalled();
  });

  it("returns 503 when SQLite cannot read the file", async () => {
    mockedStorage.getByFileName.mockRejectedValue(new Database.SqliteError("unable to open database file", "SQLITE_CANTOPEN"));
    vi.spyOn(console, "error").mockImplementation(() => {});

    const res = await request(app).get("/api/file/demo-core-1.0.0.jar");
    expect(res.status).toBe(503);
    expect(res.body.error.code).toBe("SERVICE_UNAVAILABLE");
  });

  it("drops the shared handle after an I/O error so the next request reopens the file", async () => {
    mockedStorage.getByFileName.mockRejectedValue(new Database.SqliteError("disk I/O error", "SQLITE_IOERR_READ"));
    vi.spyOn(console, "error").mockImplementation(() => {});

    const res = await request(app).get("/api/file/demo-core-1.0.0.jar");
    expect(res.status).toBe(503);
    expect(closeDatabase).toHaveBeenCalledTimes(1);
  });

  it("returns 422 for a 513-character name made of emoji", async () => {
    const res = await request(app).get(`/api/file/${encodeURIComponent("😀".repeat(513))}`);
    expect(res.status).toBe(422);
    expect(mockedStorage.getByFileName).not.toHaveBeenCalled();
  });

  it("accepts a 300-character name made of emoji", async () => {
    mockedStorage.getByFileName.mockResolvedValue(undefined);

    const res = await request(app).get(`/api/file/${encodeURIComponent("😀".repeat(300))}`);
    expect(res.status).toBe(404);
    expect(mockedStorage.getByFileName).toHaveBeenCalledWith("😀".repeat(300));
  });

  it("returns 500 with a generic message on unexpected errors", async () => {
    mockedStorage.getByFileName.mockRejectedValue(new Error("no such column: sha1"));
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});

    const res = await request(app).get("/api/file/demo-core-1.0.0.jar");
    expect(res.status).toBe(500);
    expect(res.body.error).toEqual({ code: "INTERNAL_ERROR", message: "Failed to fetch file" });
    expect(consoleError).toHaveBeenCalled();
    expect(closeDatabase).not.toHaveBeenCalled();
  });
});

describe("GET /api/filelastmodified/:fileName", () => {
  it("returns the latest modification date", async () => {
    mockedStorage.getFileLastModified.mockResolvedValue("2024-01-15 10:20:30");

    const res = await request(app).get("/api/filelastmodified/demo-core-1.0.0.jar");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ last_modified: "2024-01-15 10:20:30" });
    expect(lastModifiedSchema.safeParse(res.body).success).toBe(true);
    expect(mockedStorage.getFileLastModified).toHaveBeenCalledWith("demo-core-1.0.0.jar");
  });

  it("returns 404 when no file shares the stem", async () => {
    mockedStorage.getFileLastModified.mockResolvedValue(undefined);

    const res = await request(app).get("/api/filelastmodified/missing-1.0.jar");
    expect(res.status).toBe(404);
    expect(res.body.error.message).toBe("File missing-1.0.jar not found");
  });

  it("returns 400 when the storage layer rejects the name", async () => {
    mockedStorage.getFileLastModified.mockRejectedValue(new BadRequestError("File name is too short: x"));

    const res = await request(app).get("/api/filelastmodified/x");
    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({ code: "BAD_REQUEST", message: "File name is too short: x" });
  });
});

describe("GET /api/fileupgrade/:fileName", () => {
  it("lists newer versions of the file's artifact", async () => {
    mockedStorage.getByFileName.mockResolvedValue(mockItem);
    mockedStorage.getUpgrades.mockResolvedValue(mockUpgrades);

    const res = await request(app).get("/api/fileupgrade/demo-core-1.0.0.jar");
    expect(res.status).toBe(200);
    expect(res.body).toEqual(mockUpgrades);
    expect(upgradeSchema.array().safeParse(res.body).success).toBe(true);
    expect(mockedStorage.getUpgrades).toHaveBeenCalledWith("org.example", "demo-core", 3, 1000);
  });

  it("passes the limit through", async () => {
    mockedStorage.getByFileName.mockResolvedValue(mockItem);
    mockedStorage.getUpgrades.mockResolvedValue(mockUpgrades.slice(0, 1));

    const res = await request(app).get("/api/fileupgrade/demo-core-1.0.0.jar?limit=1");
    expect(res.status).toBe(200);
    expect(res.body).toHaveLength(1);
    expect(mockedStorage.getUpgrades).toHaveBeenCalledWith("org.example", "demo-core", 3, 1);
  });

  it("returns 204 without content when nothing newer exists", async () => {
    mockedStorage.getByFileName.mockResolvedValue(mockItem);
    mockedStorage.getUpgrades.mockResolvedValue([]);

    const res = await request(app).get("/api/fileupgrade/demo-core-1.0.0.jar");
    expect(res.status).toBe(204);
    expect(res.headers["content-type"]).toBeUndefined();
  });

  it("returns 404 for an unknown file", async () => {
    mockedStorage.getByFileName.mockResolvedValue(undefined);

    const res = await request(app).get("/api/fileupgrade/missing-1.0.jar");
    expect(res.status).toBe(404);
    expect(res.body.error.message).toBe("File missing-1.0.jar not found");
    expect(mockedStorage.getUpgrades).not.toHaveBeenCalled();
  });

  it("returns 422 for a limit above 1000", async () => {
    const res = await request(app).get("/api/fileupgrade/demo-core-1.0.0.jar?limit=1001");
    expect(res.status).toBe(422);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
    expect(mockedStorage.getByFileName).not.toHaveBeenCalled();
  });
});

// -- GAV --

describe("GET /api/gav", () => {
  it("returns the first page by default", async () => {
    mockedStorage.getGavPage.mockResolvedValue([mockItem]);

    const res = await request(app).get("/api/gav");
    expect(res.status).toBe(200);
    expect(res.body).toEqual([mockItem]);
    expect(mockedStorage.getGavPage).toHaveBeenCalledWith(0, 100);
  });

  it("passes skip and limit through", async () => {
    mockedStorage.getGavPage.mockResolvedValue([mockItem]);

    await request(app).get("/api/gav?skip=200&limit=5");
    expect(mockedStorage.getGavPage).toHaveBeenCalledWith(200, 5);
  });

  it("returns 404 for an empty page", async () => {
    mockedStorage.getGavPage.mockResolvedValue([]);

    const res = await request(app).get("/api/gav?skip=999999");
    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({ code: "NOT_FOUND", message: "No items found" });
  });

  it("returns 422 for a limit above 100", async () => {
    const res = await request(app).get("/api/gav?limit=101");
    expect(res.status).toBe(422);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
    expect(mockedStorage.getGavPage).not.toHaveBeenCalled();
  });

  it("returns 422 for a non-numeric skip", async () => {
    const res = await request(app).get("/api/gav?skip=first");
    expect(res.status).toBe(422);
  });

  it("returns 422 for a skip beyond the largest safe integer", async () => {
    const res = await request(app).get("/api/gav?skip=99999999999999999999");
    expect(res.status).toBe(422);
    expect(res.body.error.code).toBe("VALIDATION_ERROR");
    expect(mockedStorage.getGavPage).not.toHaveBeenCalled();
  });
});

describe("GET /api/gav/:groupId/:artifactId/:artifactVersion", () => {
  it("returns the coordinate's files", async () => {
    mockedStorage.getByCoordinates.mockResolvedValue([mockItem]);

    const res = await request(app).get("/api/gav/org.example/demo-core/1.0.0");
    expect(res.status).toBe(200);
    expect(res.body).toEqual([mockItem]);
    expect(mockedStorage.getByCoordinates).toHaveBeenCalledWith("org.example", "demo-core", "1.0.0");
  });

  it("returns 404 with the coordinate in the message", async () => {
    mockedStorage.getByCoordinates.mockResolvedValue([]);

    const res = await request(app).get("/api/gav/org.example/demo-core/9.9");
    expect(res.status).toBe(404);
    expect(res.body.error.message).toBe("GAV org.example/demo-core/9.9 not found");
  });

  it("returns 422 for a version longer than 128 characters", async () => {
    const res = await request(app).get(`/api/gav/org.example/demo-core/${"1".repeat(129)}`);
    expect(res.status).toBe(422);
    expect(mockedStorage.getByCoordinates).not.toHaveBeenCalled();
  });
});

describe("GET /api/gavupgrade/:groupId/:artifactId/:artifactVersion", () => {
  it("lists newer versions using the coordinate's sequence number", async () => {
    mockedStorage.getByCoordinates.mockResolvedValue([mockItem]);
    mockedStorage.getUpgrades.mockResolvedValue(mockUpgrades);

    const res = await request(app).get("/api/gavupgrade/org.example/demo-core/1.0.0?limit=10");
    expect(res.status).toBe(200);
    expect(res.body).toEqual(mockUpgrades);
    expect(mockedStorage.getUpgrades).toHaveBeenCalledWith("org.example", "demo-core", 3, 10);
  });

  it("returns 204 when nothing newer exists", async () => {
    mockedStorage.getByCoordinates.mockResolvedValue([mockItem]);
    mockedStorage.getUpgrades.mockResolvedValue([]);

    const res = await request(app).get("/api/gavupgrade/org.example/demo-core/1.0.0");
    expect(res.status).toBe(204);
  });

  it("returns 404 for an unknown coordinate", async () => {
    mockedStorage.getByCoordinates.mockResolvedValue([]);

    const res = await request(app).get("/api/gavupgrade/org.example/demo-core/9.9");
    expect(res.status).toBe(404);
    expect(res.body.error.message).toBe("GAV org.example/demo-core/9.9 not found");
    expect(mockedStorage.getUpgrades).not.toHaveBeenCalled();
  });
});

// -- Error format --

describe("Error response format", () => {
  it("answers unknown API routes with the error shape", async () => {
    const res = await request(app).get("/api/nope");
    expect(res.status).toBe(404);
    expect(res.body.error.code).toBe("NOT_FOUND");
    expect(res.body.error.message).toBe("No route for GET /api/nope");
    expect(res.body.meta.timestamp).toBeDefined();
  });
});

// -- OpenAPI spec --

describe("GET /openapi.json", () => {
  it("returns the OpenAPI document", async () => {
    const res = await request(app).get("/openapi.json");
    expect(res.status).toBe(200);
    expect(res.body.openapi).toBe("3.1.0");
    expect(res.body.info.title).toBe("Maven Central Metadata API");
    expect(Object.keys(res.body.paths)).toContain("/api/gavupgrade/{group_id}/{artifact_id}/{artifact_version}");
  });
});

// -- Rate limiting --

describe("rate limiting", () => {
  it("answers 429 once the per-minute budget is spent", async () => {
    const limited = createApp({ rateLimitPerMinute: 2 });

    expect((await request(limited).get("/api/")).status).toBe(200);
    expect((await request(limited).get("/api/")).status).toBe(200);

    const res = await request(limited).get("/api/");
    expect(res.status).toBe(429);
    expect(res.body.error.code).toBe("RATE_LIMITED");
    expect(res.headers["retry-after"]).toBeDefined();
  });
});
