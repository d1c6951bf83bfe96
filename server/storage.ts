import {
  gav, toGavItem, PAGE_SIZE,
  type GavItem, type Upgrade,
} from "@shared/schema";
import { and, eq, gt, max, min, sql } from "drizzle-orm";
import path from "path";
import { getDb, type MavenDb } from "./db";
import { BadRequestError } from "./errors";

export interface IStorage {
  getGavPage(skip: number, limit: number): Promise<GavItem[]>;
  getByFileName(fileName: string): Promise<GavItem | undefined>;
  getFileLastModified(fileName: string): Promise<string | undefined>;
  getByCoordinates(groupId: string, artifactId: string, artifactVersion: string): Promise<GavItem[]>;
  getUpgrades(groupId: string, artifactId: string, versionSeq: number, limit: number): Promise<Upgrade[]>;
  checkHealth(): Promise<void>;
}

export function escapeLikePattern(input: string): string {
  return input.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Split off the final extension. Leading dots never start one, so neither
 * ".project" nor "..." has an extension.
 */
export function splitExtension(fileName: string): { stem: string; extension: string } {
  const base = path.posix.basename(fileName);
  const extension = /^\.+$/.test(base) ? "" : path.posix.extname(fileName);
  return {
    stem: extension ? fileName.slice(0, -extension.length) : fileName,
    extension,
  };
}

// LIKE prefix scans are the most expensive lookups on the full table.
const LAST_MODIFIED_CACHE_TTL = 10 * 60 * 1000;
const MAX_LAST_MODIFIED_CACHE = 1000;

interface CacheEntry<T> { data: T; cachedAt: number }

function getFromMapCache<T>(cache: Map<string, CacheEntry<T>>, key: string, ttl: number): CacheEntry<T> | null {
  const entry = cache.get(key);
  if (entry && Date.now() - entry.cachedAt < ttl) return entry;
  return null;
}

function evictExpired<K, V extends { cachedAt: number }>(cache: Map<K, V>, ttl: number, maxSize: number): void {
  if (cache.size > maxSize) {
    const now = Date.now();
    cache.forEach((v, k) => { if (now - v.cachedAt > ttl) cache.delete(k); });
    // Everything still fresh: drop the oldest insertions.
    for (const key of cache.keys()) {
      if (cache.size <= maxSize) break;
      cache.delete(key);
    }
  }
}

export class SqliteStorage implements IStorage {
  private readonly lastModifiedCache = new Map<string, CacheEntry<string | null>>();

  constructor(private readonly db: () => MavenDb = getDb) {}

  async getGavPage(skip: number, limit: number): Promise<GavItem[]> {
    const rows = this.db().select().from(gav).limit(limit).offset(skip).all();
    return rows.map(toGavItem);
  }

  async getByFileName(fileName: string): Promise<GavItem | undefined> {
    const row = this.db().select().from(gav)
      .where(eq(gav.fileName, fileName))
      .limit(1)
      .get();
    return row ? toGavItem(row) : undefined;
  }

  async getFileLastModified(fileName: string): Promise<string | undefined> {
    const { stem } = splitExtension(fileName);
    if (stem.length < 1) {
      throw new BadRequestError(`File name is too short: ${fileName}`);
    }

    // LIKE folds ASCII case only, so the cache key does the same.
    const key = stem.replace(/[A-Z]/g, (ch) => ch.toLowerCase());
    const cached = getFromMapCache(this.lastModifiedCache, key, LAST_MODIFIED_CACHE_TTL);
    if (cached) return cached.data ?? undefined;

    const row = this.db()
      .select({ lastModified: max(gav.lastModified) })
      .from(gav)
      .where(sql`${gav.fileName} LIKE ${escapeLikePattern(stem) + "%"} ESCAPE '\\'`)
      .get();
    const lastModified = row?.lastModified ?? null;

    this.lastModifiedCache.set(key, { data: lastModified, cachedAt: Date.now() });
    evictExpired(this.lastModifiedCache, LAST_MODIFIED_CACHE_TTL, MAX_LAST_MODIFIED_CACHE);
    return lastModified ?? undefined;
  }

  async getByCoordinates(groupId: string, artifactId: string, artifactVersion: string): Promise<GavItem[]> {
    const rows = this.db().select().from(gav)
      .where(and(
        eq(gav.groupId, groupId),
        eq(gav.artifactId, artifactId),
        eq(gav.artifactVersion, artifactVersion),
      ))
      .limit(PAGE_SIZE)
      .all();
    return rows.map(toGavItem);
  }

  /** Versions of the same artifact released after `versionSeq`, oldest first. */
  async getUpgrades(groupId: string, artifactId: string, versionSeq: number, limit: number): Promise<Upgrade[]> {
    const rows = this.db()
      .select({
        artifactVersion: gav.artifactVersion,
        lastModified: sql<string>`max(${gav.lastModified})`,
      })
      .from(gav)
      .where(and(
        eq(gav.groupId, groupId),
        eq(gav.artifactId, artifactId),
        gt(gav.versionSeq, versionSeq),
      ))
      .groupBy(gav.artifactVersion)
      .orderBy(min(gav.versionSeq))
      .limit(limit)
      .all();

    return rows.map((r) => ({
      artifact_version: r.artifactVersion,
      last_modified: r.lastModified,
    }));
  }

  async checkHealth(): Promise<void> {
    this.db().get(sql`SELECT 1`);
  }
}

export const storage = new SqliteStorage();
