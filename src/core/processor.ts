import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import {
  collectionNameFromFolder,
  DEFAULT_COLLECTION_FILENAME,
  generateCollection,
  settingsFromConfig,
} from "./collection.js";
import type { OrganizerConfig } from "./config.js";
import { errorMessage, OrganizerError } from "./errors.js";
import { resolveAssetFile, type AssetPlan } from "./files.js";
import { collectionOutputDir, rewriteFolderSuffix, type ModelDescriptor } from "./folders.js";
import { createChildLogger } from "./logger.js";
import { JSON_EXTENSION } from "./utils.js";

export type FileFailure = {
  filename: string;
  code: OrganizerError["code"];
  message: string;
};

export type ModelResult = {
  model: ModelDescriptor;
  renamed: string[];
  skipped: FileFailure[];
  failed: FileFailure[];
  collectionPath: string | null;
};

export type ProcessOptions = {
  config: OrganizerConfig;
  generateCollection: boolean;
  logger?: Logger;
};

function modelLogger(model: ModelDescriptor, opts: ProcessOptions): Logger {
  const context = { model: `TS_${model.identifier}`, edit: model.editCode, code: model.responseCode };
  return opts.logger ? opts.logger.child(context) : createChildLogger(context);
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

async function listAssets(sourcePath: string): Promise<string[]> {
  const entries = await fs.readdir(sourcePath, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && e.name.endsWith(JSON_EXTENSION))
    .map((e) => e.name)
    .sort();
}

/**
 * Copy to the target, then delete the source. Not atomic: if the delete
 * fails the file exists in both places and a re-run overwrites the copy.
 */
export async function moveFile(from: string, to: string): Promise<void> {
  if (path.resolve(from) === path.resolve(to)) return;

  try {
    await fs.copyFile(from, to);
  } catch (err) {
    throw OrganizerError.io(`Copy failed: ${from} -> ${to}: ${errorMessage(err)}`, err);
  }
  try {
    await fs.unlink(from);
  } catch (err) {
    throw OrganizerError.io(`Copied but could not remove original ${from}: ${errorMessage(err)}`, err);
  }
}

/** Dry run: what each asset in the model's source directory would become. */
export async function planModel(model: ModelDescriptor): Promise<AssetPlan[]> {
  if (!(await exists(model.sourcePath))) throw OrganizerError.sourceNotFound(model.sourcePath);
  const files = await listAssets(model.sourcePath);
  return files.map((f) => resolveAssetFile(f, model));
}

export async function processModel(
  model: ModelDescriptor,
  opts: ProcessOptions,
): Promise<ModelResult> {
  const log = modelLogger(model, opts);
  const plans = await planModel(model);

  await fs.mkdir(model.destPath, { recursive: true });

  const result: ModelResult = { model, renamed: [], skipped: [], failed: [], collectionPath: null };

  for (const plan of plans) {
    if (plan.kind !== "rename") {
      log.warn({ file: plan.filename, code: plan.error.code }, plan.error.message);
      result.skipped.push({ filename: plan.filename, code: plan.error.code, message: plan.error.message });
      continue;
    }

    try {
      await moveFile(path.join(model.sourcePath, plan.filename), path.join(model.destPath, plan.targetName));
      log.info({ from: plan.filename, to: plan.targetName }, "Moved");
      result.renamed.push(plan.targetName);
    } catch (err) {
      const code = err instanceof OrganizerError ? err.code : "IO_ERROR";
      log.error({ file: plan.filename, err: errorMessage(err) }, "Error processing file");
      result.failed.push({ filename: plan.filename, code, message: errorMessage(err) });
    }
  }

  if (!result.renamed.length) {
    log.warn({ source: model.sourcePath }, "No files were processed");
    return result;
  }

  if (opts.generateCollection) {
    try {
      result.collectionPath = await generateCollection({
        sourceDir: model.destPath,
        outputDir: collectionOutputDir(model.destPath, opts.config),
        collectionName: model.collectionName,
        filename: model.collectionFilename,
        format: opts.config.collections.format,
        settings: settingsFromConfig(opts.config),
        logger: log,
      });
    } catch (err) {
      log.error({ err: errorMessage(err) }, "Error generating collection");
    }
  }

  return result;
}

export type BatchSummary = {
  results: ModelResult[];
  failed: Array<{ model: ModelDescriptor; reason: string }>;
  totalFiles: number;
};

/** Models run one after another; a failing model never stops the rest. */
export async function processModels(
  models: readonly ModelDescriptor[],
  opts: ProcessOptions,
): Promise<BatchSummary> {
  const summary: BatchSummary = { results: [], failed: [], totalFiles: 0 };

  for (const model of models) {
    try {
      const result = await processModel(model, opts);
      summary.results.push(result);
      summary.totalFiles += result.renamed.length;
    } catch (err) {
      const log = modelLogger(model, opts);
      log.error({ err: errorMessage(err) }, "Model failed");
      summary.failed.push({ model, reason: errorMessage(err) });
    }
  }
  return summary;
}

// ── Custom models ──

export type CustomModelInput = {
  editCode: string;
  responseCode: string;
  sourceDir?: string;
  destDir?: string;
  collectionName?: string;
};

export function collectionNameFromPath(destPath: string): string | null {
  for (const part of path.normalize(destPath).split(path.sep)) {
    const name = collectionNameFromFolder(part);
    if (name) return name;
  }
  return null;
}

/**
 * Descriptor for a one-off run from explicit codes. Paths default to the
 * revenue payload layout under the configured roots.
 */
export function createCustomModel(input: CustomModelInput, config: OrganizerConfig): ModelDescriptor {
  const { editCode, responseCode } = input;
  const folderName = `TS_01_REVENUE_WGS_CSBD_${editCode}_${responseCode}_payloads_sur`;
  const sourcePath =
    input.sourceDir ?? path.join(config.source.root, config.source.standardDir, folderName, "regression");
  const destPath =
    input.destDir ?? path.join(config.destination.root, rewriteFolderSuffix(folderName), "regression");

  const model: ModelDescriptor = {
    identifier: "01",
    rawIdentifier: "01",
    editCode,
    responseCode,
    category: "unspecified",
    categorySet: "standard",
    label: "Custom",
    grammar: "custom",
    folderName,
    sourcePath,
    destPath,
    collectionName:
      input.collectionName ??
      collectionNameFromPath(destPath) ??
      `TS_01_REVENUE_WGS_CSBD_${editCode}_${responseCode}`,
    collectionFilename: DEFAULT_COLLECTION_FILENAME,
  };
  return Object.freeze(model);
}
