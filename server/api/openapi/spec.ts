import {
  MAXLEN_ARTIFACT_ID,
  MAXLEN_ARTIFACT_VERSION,
  MAXLEN_FILE_NAME,
  MAXLEN_GROUP_ID,
  PAGE_SIZE,
  PAGE_SIZE_BIG,
} from "@shared/schema";

const fileNameParam = {
  name: "file_name", in: "path", required: true,
  schema: { type: "string", maxLength: MAXLEN_FILE_NAME },
  example: "commons-lang3-3.12.0.jar",
};

const coordinateParams = [
  { name: "group_id", in: "path", required: true, schema: { type: "string", maxLength: MAXLEN_GROUP_ID }, example: "org.apache.commons" },
  { name: "artifact_id", in: "path", required: true, schema: { type: "string", maxLength: MAXLEN_ARTIFACT_ID }, example: "commons-lang3" },
  { name: "artifact_version", in: "path", required: true, schema: { type: "string", maxLength: MAXLEN_ARTIFACT_VERSION }, example: "3.12.0" },
];

const upgradeLimitParam = {
  name: "limit", in: "query",
  schema: { type: "integer", minimum: 1, maximum: PAGE_SIZE_BIG, default: PAGE_SIZE_BIG },
};

const jsonOf = (schema: Record<string, unknown>) => ({ "application/json": { schema } });
const ref = (name: string) => ({ $ref: `#/components/schemas/${name}` });
const listOf = (name: string) => ({ type: "array", items: ref(name) });

const errorResponse = (description: string) => ({ description, content: jsonOf(ref("Error")) });

export function getOpenAPISpec(): Record<string, unknown> {
  return {
    openapi: "3.1.0",
    info: {
      title: "Maven Central Metadata API",
      version: "1.0.0",
      description: "Read-only lookups of Maven Central artifact metadata: files by name, coordinates (group/artifact/version) and newer releases.",
    },
    paths: {
      "/": {
        get: {
          summary: "Server status",
          tags: ["Status"],
          responses: { "200": { description: "Server is running" } },
        },
      },
      "/api/": {
        get: {
          summary: "API status",
          tags: ["Status"],
          responses: { "200": { description: "API is running" } },
        },
      },
      "/api/health": {
        get: {
          summary: "Database health",
          tags: ["Status"],
          responses: {
            "200": { description: "Database is readable" },
            "503": errorResponse("Database unavailable"),
          },
        },
      },
      "/api/file/{file_name}": {
        get: {
          summary: "File by name",
          tags: ["Files"],
          parameters: [fileNameParam],
          responses: {
            "200": { description: "Metadata of the file", content: jsonOf(ref("GavItem")) },
            "404": errorResponse("File not found"),
            "422": errorResponse("Invalid file name"),
            "503": errorResponse("Database unavailable"),
          },
        },
      },
      "/api/filelastmodified/{file_name}": {
        get: {
          summary: "Latest modification among files sharing the name's stem",
          description: "The extension is dropped and the stem is matched as a case-insensitive prefix of file names.",
          tags: ["Files"],
          parameters: [fileNameParam],
          responses: {
            "200": { description: "Latest last_modified", content: jsonOf(ref("LastModified")) },
            "400": errorResponse("File name is too short"),
            "404": errorResponse("No matching file"),
            "422": errorResponse("Invalid file name"),
            "503": errorResponse("Database unavailable"),
          },
        },
      },
      "/api/fileupgrade/{file_name}": {
        get: {
          summary: "Newer versions of a file's artifact",
          tags: ["Files"],
          parameters: [fileNameParam, upgradeLimitParam],
          responses: {
            "200": { description: "Newer versions, oldest first", content: jsonOf(listOf("Upgrade")) },
            "204": { description: "No newer versions" },
            "404": errorResponse("File not found"),
            "422": errorResponse("Invalid parameters"),
            "503": errorResponse("Database unavailable"),
          },
        },
      },
      "/api/gav": {
        get: {
          summary: "List GAV items",
          tags: ["GAV"],
          parameters: [
            { name: "skip", in: "query", schema: { type: "integer", minimum: 0, default: 0 } },
            { name: "limit", in: "query", schema: { type: "integer", minimum: 1, maximum: PAGE_SIZE, default: PAGE_SIZE } },
          ],
          responses: {
            "200": { description: "Page of GAV items", content: jsonOf(listOf("GavItem")) },
            "404": errorResponse("No items found"),
            "422": errorResponse("Invalid paging parameters"),
            "503": errorResponse("Database unavailable"),
          },
        },
      },
      "/api/gav/{group_id}/{artifact_id}/{artifact_version}": {
        get: {
          summary: "Files of a coordinate",
          tags: ["GAV"],
          parameters: coordinateParams,
          responses: {
            "200": { description: `Up to ${PAGE_SIZE} files`, content: jsonOf(listOf("GavItem")) },
            "404": errorResponse("GAV not found"),
            "422": errorResponse("Invalid coordinate"),
            "503": errorResponse("Database unavailable"),
          },
        },
      },
      "/api/gavupgrade/{group_id}/{artifact_id}/{artifact_version}": {
        get: {
          summary: "Newer versions of a coordinate",
          tags: ["GAV"],
          parameters: [...coordinateParams, upgradeLimitParam],
          responses: {
            "200": { description: "Newer versions, oldest first", content: jsonOf(listOf("Upgrade")) },
            "204": { description: "No newer versions" },
            "404": errorResponse("GAV not found"),
            "422": errorResponse("Invalid parameters"),
            "503": errorResponse("Database unavailable"),
          },
        },
      },
    },
    components: {
      schemas: {
        GavItem: {
          type: "object",
          required: [
            "group_id", "artifact_id", "artifact_version", "file_name", "major_version", "version_seq",
            "last_modified", "size", "sha1", "signature_exists", "sources_exists", "javadoc_exists",
            "classifier", "file_extension", "packaging", "name",
          ],
          properties: {
            group_id: { type: "string" },
            artifact_id: { type: "string" },
            artifact_version: { type: "string" },
            file_name: { type: "string" },
            major_version: { type: "integer" },
            version_seq: { type: "integer" },
            last_modified: { type: "string" },
            size: { type: "integer" },
            sha1: { type: "string" },
            signature_exists: { type: "integer", enum: [0, 1] },
            sources_exists: { type: "integer", enum: [0, 1] },
            javadoc_exists: { type: "integer", enum: [0, 1] },
            classifier: { type: "string" },
            file_extension: { type: "string" },
            packaging: { type: "string" },
            name: { type: "string" },
          },
        },
        LastModified: {
          type: "object",
          required: ["last_modified"],
          properties: { last_modified: { type: "string" } },
        },
        Upgrade: {
          type: "object",
          required: ["artifact_version", "last_modified"],
          properties: {
            artifact_version: { type: "string" },
            last_modified: { type: "string" },
          },
        },
        Error: {
          type: "object",
          properties: {
            error: {
              type: "object",
              properties: { code: { type: "string" }, message: { type: "string" } },
            },
            meta: {
              type: "object",
              properties: { timestamp: { type: "string", format: "date-time" } },
            },
          },
        },
      },
    },
  };
}
