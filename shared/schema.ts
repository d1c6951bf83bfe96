import { sqliteTable, text, integer } from "drizzle-orm/sqlite-core";
import { z } from "zod";

export const MAXLEN_GROUP_ID = 254;
export const MAXLEN_ARTIFACT_ID = 254;
export const MAXLEN_ARTIFACT_VERSION = 128;
export const MAXLEN_FILE_NAME = 512;

/** Rows per page for listings and coordinate lookups */
export const PAGE_SIZE = 100;

/** Rows per page for upgrade lookups */
export const PAGE_SIZE_BIG = 1000;

// The table is built offline and shipped as mavendb.sqlite; nothing here creates or migrates it.
export const gav = sqliteTable("gav", {
  groupId: text("group_id").notNull(),
  artifactId: text("artifact_id").notNull(),
  artifactVersion: text("artifact_version").notNull(),
  fileName: text("file_name").notNull(),
  majorVersion: integer("major_version").notNull(),
  versionSeq: integer("version_seq").notNull(),
  lastModified: text("last_modified").notNull(),
  size: integer("size").notNull(),
  sha1: text("sha1").notNull(),
  signatureExists: integer("signature_exists").notNull(),
  sourcesExists: integer("sources_exists").notNull(),
  javadocExists: integer("javadoc_exists").notNull(),
  classifier: text("classifier").notNull(),
  fileExtension: text("file_extension").notNull(),
  packaging: text("packaging").notNull(),
  name: text("name").notNull(),
});

export type GavRow = typeof gav.$inferSelect;

// -- Response models (JSON keys match the table's column names) --

export const gavItemSchema = z.object({
  group_id: z.string(),
  artifact_id: z.string(),
  artifact_version: z.string(),
  file_name: z.string(),
  major_version: z.number().int(),
  version_seq: z.number().int(),
  last_modified: z.string(),
  size: z.number().int(),
  sha1: z.string(),
  signature_exists: z.number().int(),
  sources_exists: z.number().int(),
  javadoc_exists: z.number().int(),
  classifier: z.string(),
  file_extension: z.string(),
  packaging: z.string(),
  name: z.string(),
});

export const lastModifiedSchema = z.object({
  last_modified: z.string(),
});

export const upgradeSchema = z.object({
  artifact_version: z.string(),
  last_modified: z.string(),
});

export type GavItem = z.infer<typeof gavItemSchema>;
export type LastModified = z.infer<typeof lastModifiedSchema>;
export type Upgrade = z.infer<typeof upgradeSchema>;

export function toGavItem(row: GavRow): GavItem {
  return {
    group_id: row.groupId,
    artifact_id: row.artifactId,
    artifact_version: row.artifactVersion,
    file_name: row.fileName,
    major_version: row.majorVersion,
    version_seq: row.versionSeq,
    last_modified: row.lastModified,
    size: row.size,
    sha1: row.sha1,
    signature_exists: row.signatureExists,
    sources_exists: row.sourcesExists,
    javadoc_exists: row.javadocExists,
    classifier: row.classifier,
    file_extension: row.fileExtension,
    packaging: row.packaging,
    name: row.name,
  };
}

// -- Request parameters --

// Lengths are counted in code points, so one emoji is one character.
function boundedString(max: number) {
  return z
    .string()
    .min(1)
    .refine((value) => [...value].length <= max, {
      message: `String must contain at most ${max} character(s)`,
    });
}

export const fileNameParamsSchema = z.object({
  fileName: boundedString(MAXLEN_FILE_NAME),
});

export const coordinateParamsSchema = z.object({
  groupId: boundedString(MAXLEN_GROUP_ID),
  artifactId: boundedString(MAXLEN_ARTIFACT_ID),
  artifactVersion: boundedString(MAXLEN_ARTIFACT_VERSION),
});

export const gavPageQuerySchema = z.object({
  // SQLite binds larger offsets as REAL and rejects them.
  skip: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0),
  limit: z.coerce.number().int().min(1).max(PAGE_SIZE).default(PAGE_SIZE),
});

export const upgradeQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(PAGE_SIZE_BIG).default(PAGE_SIZE_BIG),
});

export type CoordinateParams = z.infer<typeof coordinateParamsSchema>;
export type GavPageQuery = z.infer<typeof gavPageQuerySchema>;
