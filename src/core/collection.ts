import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { CollectionFormat, OrganizerConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { SEGMENT_DELIMITER } from "./files.js";
import { logger as rootLogger } from "./logger.js";
import { stripJsonExtension } from "./utils.js";

export const COLLECTION_SCHEMA_URL =
  "https://schema.getpostman.com/json/collection/v2.1.0/collection.json";
export const REQUEST_METHOD = "POST";
export const REQUEST_URL = "{{baseUrl}}/api/validate/{{tc_id}}";
export const DEFAULT_COLLECTION_FILENAME = "postman_collection.json";

export type CollectionSettings = {
  baseUrl: string;
  headers: ReadonlyArray<{ key: string; value: string }>;
};

export function settingsFromConfig(config: OrganizerConfig): CollectionSettings {
  return { baseUrl: config.collections.baseUrl, headers: config.collections.headers };
}

export type ParsedCollectionName = {
  tcPrefix: string;
  tcId: string;
  editCode: string;
  responseCode: string;
  suffix: string;
};

export type RequestEntry = {
  name: string;
  parsed: ParsedCollectionName;
  body: string;
};

// ── Wire shapes ──

const ExtendedHeaderSchema = z.object({ key: z.string(), value: z.string(), type: z.literal("text") });

const ExtendedItemSchema = z.object({
  name: z.string(),
  request: z.object({
    method: z.string(),
    header: z.array(ExtendedHeaderSchema),
    url: z.object({ raw: z.string(), host: z.array(z.string()), path: z.array(z.string()) }),
    body: z.object({
      mode: z.literal("raw"),
      raw: z.string(),
      options: z.object({ raw: z.object({ language: z.string() }) }),
    }),
  }),
});

export const ExtendedCollectionSchema = z.object({
  info: z.object({ name: z.string(), description: z.string(), schema: z.string() }),
  item: z.array(ExtendedItemSchema),
  variable: z.array(z.object({ key: z.string(), value: z.string(), type: z.string() })),
});

const MinimalItemSchema = z.object({
  uid: z.string(),
  name: z.string(),
  type: z.literal("http"),
  method: z.string(),
  url: z.string(),
  headers: z.array(
    z.object({ uid: z.string(), name: z.string(), value: z.string(), enabled: z.boolean() }),
  ),
  body: z.object({ mode: z.literal("raw"), raw: z.string() }),
});

export const MinimalCollectionSchema = z.object({
  version: z.string(),
  name: z.string(),
  type: z.literal("collection"),
  items: z.array(MinimalItemSchema),
});

export type ExtendedCollection = z.infer<typeof ExtendedCollectionSchema>;
export type MinimalCollection = z.infer<typeof MinimalCollectionSchema>;

// ── Reading assets ──

/** Collections only carry canonical 5-segment names. */
export function parseCollectionFilename(filename: string): ParsedCollectionName | null {
  const stem = stripJsonExtension(filename);
  if (stem === null) return null;
  const parts = stem.split(SEGMENT_DELIMITER);
  if (parts.length !== 5) return null;
  const [tcPrefix, tcId, editCode, responseCode, suffix] = parts;
  return { tcPrefix, tcId, editCode, responseCode, suffix };
}

export async function listJsonFiles(dir: string): Promise<string[]> {
  const out: string[] = [];
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) out.push(...(await listJsonFiles(full)));
    else if (entry.isFile() && entry.name.endsWith(".json")) out.push(full);
  }
  return out.sort();
}

async function readBody(file: string, log: Logger): Promise<string> {
  let content: unknown = {};
  try {
    content = JSON.parse(await fs.readFile(file, "utf-8"));
  } catch (err) {
    log.warn({ file, err: errorMessage(err) }, "Could not read request body, using {}");
  }
  return JSON.stringify(content, null, 2);
}

export async function buildRequestEntries(
  files: readonly string[],
  log: Logger = rootLogger,
): Promise<RequestEntry[]> {
  const entries: RequestEntry[] = [];
  for (const file of files) {
    const filename = path.basename(file);
    const parsed = parseCollectionFilename(filename);
    if (!parsed) {
      log.warn({ file: filename }, "Could not parse filename, skipping request");
      continue;
    }
    entries.push({ name: path.basename(filename, ".json"), parsed, body: await readBody(file, log) });
  }
  return entries;
}

// ── Builders ──

export function buildExtendedCollection(
  name: string,
  entries: readonly RequestEntry[],
  settings: CollectionSettings,
): ExtendedCollection {
  const header = [{ key: "Content-Type", value: "application/json" }, ...settings.headers].map(
    (h) => ({ key: h.key, value: h.value, type: "text" as const }),
  );

  return {
    info: {
      name: `${name} API Collection`,
      description: `API collection for ${name} test cases`,
      schema: COLLECTION_SCHEMA_URL,
    },
    item: entries.map((entry) => ({
      name: entry.name,
      request: {
        method: REQUEST_METHOD,
        header: header.map((h) => ({ ...h })),
        url: {
          raw: REQUEST_URL,
          host: ["{{baseUrl}}"],
          path: ["api", "validate", "{{tc_id}}"],
        },
        body: {
          mode: "raw" as const,
          raw: entry.body,
          options: { raw: { language: "json" } },
        },
      },
    })),
    variable: [{ key: "baseUrl", value: settings.baseUrl, type: "string" }],
  };
}

export function buildMinimalCollection(
  name: string,
  entries: readonly RequestEntry[],
  settings: CollectionSettings,
  newUid: () => string = uuidv4,
): MinimalCollection {
  const headers = [{ key: "Content-Type", value: "application/json" }, ...settings.headers];

  return {
    version: "1",
    name: `${name} API Collection`,
    type: "collection",
    items: entries.map((entry) => ({
      uid: newUid(),
      name: entry.name,
      type: "http" as const,
      method: REQUEST_METHOD,
      url: REQUEST_URL,
      headers: headers.map((h) => ({ uid: newUid(), name: h.key, value: h.value, enabled: true })),
      body: { mode: "raw" as const, raw: entry.body },
    })),
  };
}

export function buildCollection(
  format: CollectionFormat,
  name: string,
  entries: readonly RequestEntry[],
  settings: CollectionSettings,
): ExtendedCollection | MinimalCollection {
  return format === "minimal"
    ? buildMinimalCollection(name, entries, settings)
    : buildExtendedCollection(name, entries, settings);
}

// ── Writers ──

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

async function writeJson(file: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(data, null, 2), "utf-8");
}

export type GenerateOptions = {
  sourceDir: string;
  outputDir: string;
  collectionName: string;
  filename?: string;
  format?: CollectionFormat;
  settings: CollectionSettings;
  logger?: Logger;
};

/**
 * Build one collection from every JSON file under sourceDir and write it to
 * `<outputDir>/<collectionName>/<filename>`. Returns null when there is
 * nothing to write.
 */
export async function generateCollection(opts: GenerateOptions): Promise<string | null> {
  const log = opts.logger ?? rootLogger;

  if (!(await isDirectory(opts.sourceDir))) {
    log.warn({ sourceDir: opts.sourceDir }, "Source directory not found");
    return null;
  }

  const files = await listJsonFiles(opts.sourceDir);
  if (!files.length) {
    log.warn({ sourceDir: opts.sourceDir }, "No JSON files found");
    return null;
  }

  const entries = await buildRequestEntries(files, log);
  if (!entries.length) {
    log.warn({ collection: opts.collectionName }, "No valid requests could be created");
    return null;
  }

  const collection = buildCollection(
    opts.format ?? "extended",
    opts.collectionName,
    entries,
    opts.settings,
  );
  const file = path.join(
    opts.outputDir,
    opts.collectionName,
    opts.filename ?? DEFAULT_COLLECTION_FILENAME,
  );
  await writeJson(file, collection);

  log.info(
    { file, requests: entries.length, files: files.length },
    `Generated collection ${opts.collectionName}`,
  );
  return file;
}

export function directoryCollectionName(dirName: string): string {
  const m = dirName.match(/^TS_(\d{1,3})_/);
  return m ? `TS_${m[1]}_collection` : `${dirName.replace(/ /g, "_")}_collection`;
}

/** Minimal-shape collection for one directory below sourceDir. */
export async function generateDirectoryCollection(opts: {
  sourceDir: string;
  outputDir: string;
  dirName: string;
  settings: CollectionSettings;
  logger?: Logger;
}): Promise<string | null> {
  const log = opts.logger ?? rootLogger;
  const dir = path.join(opts.sourceDir, opts.dirName);

  if (!(await isDirectory(dir))) {
    log.warn({ dir }, "Directory not found");
    return null;
  }
  const files = await listJsonFiles(dir);
  const entries = await buildRequestEntries(files, log);
  if (!entries.length) {
    log.warn({ dir }, "No valid requests could be created");
    return null;
  }

  const collection = buildMinimalCollection(opts.dirName, entries, opts.settings);
  const file = path.join(opts.outputDir, directoryCollectionName(opts.dirName), "collection.json");
  await writeJson(file, collection);
  log.info({ file, requests: entries.length }, `Generated collection for ${opts.dirName}`);
  return file;
}

export function collectionNameFromFolder(folderName: string): string | null {
  if (!folderName.startsWith("TS_")) return null;
  if (folderName.endsWith("_payloads_dis")) return folderName.slice(0, -"_payloads_dis".length);
  if (folderName.endsWith("_dis")) return folderName.slice(0, -"_dis".length);
  return null;
}

/**
 * One collection for everything under sourceDir, named after the first
 * `TS_..._dis` directory found there.
 */
export async function generateAllCollections(opts: {
  sourceDir: string;
  outputDir: string;
  fallbackName: string;
  settings: CollectionSettings;
  format?: CollectionFormat;
  logger?: Logger;
}): Promise<Record<string, string>> {
  if (!(await isDirectory(opts.sourceDir))) return {};

  let collectionName = opts.fallbackName;
  for (const dir of await listDirectories(opts.sourceDir)) {
    const name = collectionNameFromFolder(dir);
    if (name) {
      collectionName = name;
      break;
    }
  }

  const file = await generateCollection({ ...opts, collectionName });
  return file ? { [collectionName]: file } : {};
}

// ── Inspection ──

export async function listDirectories(sourceDir: string): Promise<string[]> {
  if (!(await isDirectory(sourceDir))) return [];
  const entries = await fs.readdir(sourceDir, { withFileTypes: true });
  return entries
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort();
}

export type DirectoryStats = {
  directoryName: string;
  totalFiles: number;
  fileTypes: Record<string, number>;
  editCodes: string[];
  responseCodes: string[];
  suffixes: string[];
};

export async function directoryStats(
  sourceDir: string,
  dirName: string,
): Promise<DirectoryStats | null> {
  const dir = path.join(sourceDir, dirName);
  if (!(await isDirectory(dir))) return null;

  const files = await listJsonFiles(dir);
  const fileTypes: Record<string, number> = {};
  const editCodes = new Set<string>();
  const responseCodes = new Set<string>();

  for (const file of files) {
    const parsed = parseCollectionFilename(path.basename(file));
    if (!parsed) continue;
    fileTypes[parsed.suffix] = (fileTypes[parsed.suffix] ?? 0) + 1;
    editCodes.add(parsed.editCode);
    responseCodes.add(parsed.responseCode);
  }

  return {
    directoryName: dirName,
    totalFiles: files.length,
    fileTypes,
    editCodes: [...editCodes].sort(),
    responseCodes: [...responseCodes].sort(),
    suffixes: Object.keys(fileTypes).sort(),
  };
}

export type CollectionShape = "extended" | "minimal";

export type ValidationResult = {
  valid: boolean;
  shape: CollectionShape | null;
  errors: string[];
  warnings: string[];
  totalRequests: number;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function detectShape(doc: Record<string, unknown>): CollectionShape {
  return "info" in doc && "item" in doc ? "extended" : "minimal";
}

const REQUIRED_FIELDS: Record<CollectionShape, readonly string[]> = {
  extended: ["info", "item"],
  minimal: ["version", "name", "type", "items"],
};

export function validateCollectionDocument(doc: unknown): ValidationResult {
  if (!isRecord(doc)) {
    return {
      valid: false,
      shape: null,
      errors: ["Collection must be a JSON object"],
      warnings: [],
      totalRequests: 0,
    };
  }

  const shape = detectShape(doc);
  const errors = REQUIRED_FIELDS[shape]
    .filter((field) => !(field in doc))
    .map((field) => `Missing required field: ${field}`);
  const warnings: string[] = [];

  const list = shape === "extended" ? doc.item : doc.items;
  const totalRequests = Array.isArray(list) ? list.length : 0;
  if (totalRequests === 0) warnings.push("Collection contains no requests");

  if (!errors.length) {
    const schema = shape === "extended" ? ExtendedCollectionSchema : MinimalCollectionSchema;
    const parsed = schema.safeParse(doc);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        warnings.push(`${issue.path.join(".")}: ${issue.message}`);
      }
    }
  }

  return { valid: errors.length === 0, shape, errors, warnings, totalRequests };
}

export async function validateCollection(file: string): Promise<ValidationResult> {
  let doc: unknown;
  try {
    doc = JSON.parse(await fs.readFile(file, "utf-8"));
  } catch (err) {
    const message =
      err instanceof SyntaxError ? `Invalid JSON format: ${err.message}` : `Validation error: ${errorMessage(err)}`;
    return { valid: false, shape: null, errors: [message], warnings: [], totalRequests: 0 };
  }
  return validateCollectionDocument(doc);
}
