import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  buildExtendedCollection,
  buildMinimalCollection,
  collectionNameFromFolder,
  COLLECTION_SCHEMA_URL,
  directoryCollectionName,
  directoryStats,
  generateAllCollections,
  generateCollection,
  generateDirectoryCollection,
  listDirectories,
  parseCollectionFilename,
  validateCollection,
  validateCollectionDocument,
  type CollectionSettings,
  type RequestEntry,
} from "../src/core/collection.js";
import { exists, makeTempDir, readJson, removeDir, writeFiles } from "./helpers.js";

const settings: CollectionSettings = {
  baseUrl: "http://localhost:3000",
  headers: [{ key: "meta-transid", value: "test-transid" }],
};

const entry: RequestEntry = {
  name: "TC#01_1#e1#r1#LR",
  parsed: { tcPrefix: "TC", tcId: "01_1", editCode: "e1", responseCode: "r1", suffix: "LR" },
  body: '{\n  "a": 1\n}',
};

describe("parseCollectionFilename", () => {
  it("only accepts 5-segment json names", () => {
    expect(parseCollectionFilename("TC#01_1#e1#r1#LR.json")).toEqual({
      tcPrefix: "TC",
      tcId: "01_1",
      editCode: "e1",
      responseCode: "r1",
      suffix: "LR",
    });
    expect(parseCollectionFilename("TC#01_1#deny.json")).toBeNull();
    expect(parseCollectionFilename("TC#01_1#e1#r1#LR.txt")).toBeNull();
  });
});

describe("buildExtendedCollection", () => {
  it("lays out requests in the extended shape", () => {
    expect(buildExtendedCollection("TS_07", [entry], settings)).toEqual({
      info: {
        name: "TS_07 API Collection",
        description: "API collection for TS_07 test cases",
        schema: COLLECTION_SCHEMA_URL,
      },
      item: [
        {
          name: "TC#01_1#e1#r1#LR",
          request: {
            method: "POST",
            header: [
              { key: "Content-Type", value: "application/json", type: "text" },
              { key: "meta-transid", value: "test-transid", type: "text" },
            ],
            url: {
              raw: "{{baseUrl}}/api/validate/{{tc_id}}",
              host: ["{{baseUrl}}"],
              path: ["api", "validate", "{{tc_id}}"],
            },
            body: { mode: "raw", raw: '{\n  "a": 1\n}', options: { raw: { language: "json" } } },
          },
        },
      ],
      variable: [{ key: "baseUrl", value: "http://localhost:3000", type: "string" }],
    });
  });
});

describe("buildMinimalCollection", () => {
  it("lays out requests in the minimal shape", () => {
    let n = 0;
    const uid = () => `uid-${++n}`;
    expect(buildMinimalCollection("TS_07", [entry], settings, uid)).toEqual({
      version: "1",
      name: "TS_07 API Collection",
      type: "collection",
      items: [
        {
          uid: "uid-1",
          name: "TC#01_1#e1#r1#LR",
          type: "http",
          method: "POST",
          url: "{{baseUrl}}/api/validate/{{tc_id}}",
          headers: [
            { uid: "uid-2", name: "Content-Type", value: "application/json", enabled: true },
            { uid: "uid-3", name: "meta-transid", value: "test-transid", enabled: true },
          ],
          body: { mode: "raw", raw: '{\n  "a": 1\n}' },
        },
      ],
    });
  });

  it("draws fresh uuids by default", () => {
    const [item] = buildMinimalCollection("TS_07", [entry], settings).items;
    expect(item.uid).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(item.headers[0].uid).not.toBe(item.uid);
  });
});

describe("on disk", () => {
  let root: string;
  let sourceDir: string;
  let outputDir: string;

  beforeEach(async () => {
    root = await makeTempDir();
    sourceDir = path.join(root, "renaming_jsons");
    outputDir = path.join(root, "postman_collections");
  });

  afterEach(async () => {
    await removeDir(root);
  });

  describe("generateCollection", () => {
    it("builds one request per 5-segment file, recursively", async () => {
      await writeFiles(sourceDir, {
        "TC#01_1#e1#r1#LR.json": '{"a":1}',
        "TC#03_3#e1#r1#EX.json": "{oops",
        "notes.json": "{}",
        "sub/TC#02_2#e1#r1#NR.json": "[]",
      });

      const file = await generateCollection({ sourceDir, outputDir, collectionName: "Suite", settings });
      expect(file).toBe(path.join(outputDir, "Suite", "postman_collection.json"));
      if (!file) return;

      const doc = buildExtendedCollection("Suite", [], settings);
      const written = await readJson(file);
      expect(written).toMatchObject({ info: doc.info, variable: doc.variable });
      expect(written).toMatchObject({
        item: [
          { name: "TC#01_1#e1#r1#LR", request: { body: { raw: '{\n  "a": 1\n}' } } },
          { name: "TC#03_3#e1#r1#EX", request: { body: { raw: "{}" } } },
          { name: "TC#02_2#e1#r1#NR", request: { body: { raw: "[]" } } },
        ],
      });
    });

    it("honours the filename and minimal format", async () => {
      await writeFiles(sourceDir, { "TC#01_1#e1#r1#LR.json": "{}" });
      const file = await generateCollection({
        sourceDir,
        outputDir,
        collectionName: "Suite",
        filename: "suite.json",
        format: "minimal",
        settings,
      });
      expect(file).toBe(path.join(outputDir, "Suite", "suite.json"));
      expect(await readJson(path.join(outputDir, "Suite", "suite.json"))).toMatchObject({
        version: "1",
        type: "collection",
      });
    });

    it("returns null when there is nothing to build", async () => {
      expect(await generateCollection({ sourceDir, outputDir, collectionName: "S", settings })).toBeNull();

      await fs.mkdir(sourceDir, { recursive: true });
      expect(await generateCollection({ sourceDir, outputDir, collectionName: "S", settings })).toBeNull();

      await writeFiles(sourceDir, { "TC#01#deny.json": "{}" });
      expect(await generateCollection({ sourceDir, outputDir, collectionName: "S", settings })).toBeNull();
      expect(await exists(outputDir)).toBe(false);
    });
  });

  describe("generateDirectoryCollection", () => {
    it("writes the minimal shape under the suite's collection name", async () => {
      await writeFiles(sourceDir, {
        "TS_07_REVENUE_WGS_CSBD_rvn011_00W11_dis/regression/TC#01_1#rvn011#00W11#LR.json": "{}",
      });
      const file = await generateDirectoryCollection({
        sourceDir,
        outputDir,
        dirName: "TS_07_REVENUE_WGS_CSBD_rvn011_00W11_dis",
        settings,
      });
      expect(file).toBe(path.join(outputDir, "TS_07_collection", "collection.json"));
      expect(await readJson(path.join(outputDir, "TS_07_collection", "collection.json"))).toMatchObject({
        name: "TS_07_REVENUE_WGS_CSBD_rvn011_00W11_dis API Collection",
        items: [{ name: "TC#01_1#rvn011#00W11#LR" }],
      });
    });

    it("returns null for a missing directory", async () => {
      expect(await generateDirectoryCollection({ sourceDir, outputDir, dirName: "nope", settings })).toBeNull();
    });
  });

  describe("generateAllCollections", () => {
    it("names the collection after the first TS_ directory", async () => {
      await writeFiles(sourceDir, {
        "TS_07_REVENUE_WGS_CSBD_rvn011_00W11_payloads_dis/regression/TC#01_1#rvn011#00W11#LR.json": "{}",
      });
      expect(await generateAllCollections({ sourceDir, outputDir, fallbackName: "Fallback", settings })).toEqual({
        TS_07_REVENUE_WGS_CSBD_rvn011_00W11: path.join(
          outputDir,
          "TS_07_REVENUE_WGS_CSBD_rvn011_00W11",
          "postman_collection.json",
        ),
      });
    });

    it("falls back to the given name", async () => {
      await writeFiles(sourceDir, { "misc/TC#01_1#e#r#LR.json": "{}" });
      const result = await generateAllCollections({ sourceDir, outputDir, fallbackName: "Fallback", settings });
      expect(Object.keys(result)).toEqual(["Fallback"]);
    });

    it("is empty for a missing source", async () => {
      expect(await generateAllCollections({ sourceDir, outputDir, fallbackName: "F", settings })).toEqual({});
    });
  });

  describe("inspection", () => {
    it("lists directories in order", async () => {
      await writeFiles(sourceDir, { "b/x.json": "{}", "a/y.json": "{}", "file.json": "{}" });
      expect(await listDirectories(sourceDir)).toEqual(["a", "b"]);
      expect(await listDirectories(path.join(root, "missing"))).toEqual([]);
    });

    it("summarizes a directory", async () => {
      await writeFiles(sourceDir, {
        "suite/TC#01_1#e1#r1#LR.json": "{}",
        "suite/TC#01_2#e1#r2#LR.json": "{}",
        "suite/nested/TC#01_3#e2#r1#NR.json": "{}",
        "suite/legacy.json": "{}",
      });
      expect(await directoryStats(sourceDir, "suite")).toEqual({
        directoryName: "suite",
        totalFiles: 4,
        fileTypes: { LR: 2, NR: 1 },
        editCodes: ["e1", "e2"],
        responseCodes: ["r1", "r2"],
        suffixes: ["LR", "NR"],
      });
      expect(await directoryStats(sourceDir, "missing")).toBeNull();
    });
  });

  describe("validateCollection", () => {
    it("reports invalid JSON", async () => {
      await writeFiles(root, { "broken.json": "{not json" });
      const result = await validateCollection(path.join(root, "broken.json"));
      expect(result.valid).toBe(false);
      expect(result.shape).toBeNull();
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatch(/^Invalid JSON format: /);
    });

    it("accepts a collection it generated", async () => {
      await writeFiles(sourceDir, { "TC#01_1#e1#r1#LR.json": "{}" });
      const file = await generateCollection({ sourceDir, outputDir, collectionName: "S", settings });
      if (!file) throw new Error("collection was not written");
      expect(await validateCollection(file)).toEqual({
        valid: true,
        shape: "extended",
        errors: [],
        warnings: [],
        totalRequests: 1,
      });
    });
  });
});

describe("validateCollectionDocument", () => {
  it("detects the minimal shape and its missing fields", () => {
    expect(validateCollectionDocument({ name: "x", type: "collection", items: [] })).toEqual({
      valid: false,
      shape: "minimal",
      errors: ["Missing required field: version"],
      warnings: ["Collection contains no requests"],
      totalRequests: 0,
    });
  });

  it("accepts a minimal collection", () => {
    const doc = buildMinimalCollection("S", [entry], settings, () => "u");
    expect(validateCollectionDocument(doc)).toEqual({
      valid: true,
      shape: "minimal",
      errors: [],
      warnings: [],
      totalRequests: 1,
    });
  });

  it("warns on an empty extended collection", () => {
    const result = validateCollectionDocument(buildExtendedCollection("S", [], settings));
    expect(result.valid).toBe(true);
    expect(result.shape).toBe("extended");
    expect(result.warnings).toEqual(["Collection contains no requests"]);
  });

  it("rejects non-objects", () => {
    expect(validateCollectionDocument([]).errors).toEqual(["Collection must be a JSON object"]);
  });
});

describe("naming", () => {
  it("derives directory collection names", () => {
    expect(directoryCollectionName("TS_07_REVENUE_dis")).toBe("TS_07_collection");
    expect(directoryCollectionName("my tests")).toBe("my_tests_collection");
  });

  it("strips the destination suffix from TS folders", () => {
    expect(collectionNameFromFolder("TS_07_A_payloads_dis")).toBe("TS_07_A");
    expect(collectionNameFromFolder("TS_07_A_dis")).toBe("TS_07_A");
    expect(collectionNameFromFolder("TS_07_A_sur")).toBeNull();
    expect(collectionNameFromFolder("misc_dis")).toBeNull();
  });
});
