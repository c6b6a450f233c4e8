import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { classifyCategory, collectionFilename, extractSubEdit, type Category } from "./classify.js";
import type { CategorySet, OrganizerConfig } from "./config.js";
import { OrganizerError } from "./errors.js";
import { logger as rootLogger } from "./logger.js";
import { Err, Ok, type Result } from "./result.js";
import { normalizeIdentifier } from "./utils.js";

export type ModelDescriptor = Readonly<{
  identifier: string;
  rawIdentifier: string;
  editCode: string;
  responseCode: string;
  category: Category;
  categorySet: CategorySet;
  label: string;
  grammar: string;
  folderName: string;
  subEdit?: number;
  sourcePath: string;
  destPath: string;
  collectionName: string;
  collectionFilename: string;
}>;

export type FolderParams = {
  id: string;
  edit: string;
  response: string;
  subEdit?: string;
};

export type FolderGrammar = {
  name: string;
  pattern: RegExp;
  format: (params: FolderParams) => string;
};

export type FolderMatch = {
  grammar: string;
  rawIdentifier: string;
  identifier: string;
  editCode: string;
  responseCode: string;
};

// ── Grammars ──

const ID = "(?<id>\\d{1,3})";
const EDIT = "(?<edit>[A-Za-z0-9]+)";
const RESPONSE = "(?<response>[A-Za-z0-9]+)";

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** `TS_<n>_<middle>_<edit>_<response>_sur` with a fixed middle. */
function fixedMiddle(name: string, middle: string): FolderGrammar {
  return {
    name,
    pattern: new RegExp(`^TS_${ID}_${escapeRegExp(middle)}_${EDIT}_${RESPONSE}_sur$`),
    format: (p) => `TS_${p.id}_${middle}_${p.edit}_${p.response}_sur`,
  };
}

export const STANDARD_GRAMMARS: readonly FolderGrammar[] = [
  fixedMiddle("revenue", "REVENUE_WGS_CSBD"),
  {
    name: "revenue-payloads",
    pattern: new RegExp(`^TS_${ID}_REVENUE_WGS_CSBD_${EDIT}_${RESPONSE}_p?ayloads_sur$`),
    format: (p) => `TS_${p.id}_REVENUE_WGS_CSBD_${p.edit}_${p.response}_payloads_sur`,
  },
  {
    name: "revenue-services",
    pattern: new RegExp(
      `^TS_${ID}_Revenue code Services not payable on Facility claim Sub Edit (?<subEdit>\\d+)_WGS_CSBD_${EDIT}_${RESPONSE}_sur$`,
    ),
    format: (p) =>
      `TS_${p.id}_Revenue code Services not payable on Facility claim Sub Edit ${p.subEdit ?? "1"}_WGS_CSBD_${p.edit}_${p.response}_sur`,
  },
  fixedMiddle("lab-panel", "Lab panel Model_WGS_CSBD"),
  fixedMiddle("recovery-room", "Recovery Room Reimbursement_WGS_CSBD"),
  fixedMiddle("covid", "Covid_WGS_CSBD"),
  fixedMiddle("laterality", "Laterality Policy-Disgnosis to Diagnosis_WGS_CSBD"),
  fixedMiddle("device-procedures", "Device Dependent Procedures(R1)-1B_WGS_CSBD"),
  fixedMiddle("revenue-model", "revenue model_WGS_CSBD"),
  fixedMiddle("revenue-hcpcs-xwalk", "Revenue Code to HCPCS Xwalk-1B_WGS_CSBD"),
  fixedMiddle("incidental-services", "Incidentcal Services Facility_WGS_CSBD"),
  fixedMiddle("revenue-model-cr-v3", "Revenue model CR v3_WGS_CSBD"),
  fixedMiddle("hcpcs-revenue-xwalk", "HCPCS to Revenue Code Xwalk_WGS_CSBD"),
  fixedMiddle("multiple-em", "Multiple E&M Same day_WGS_CSBD"),
];

export const ALT_GRAMMARS: readonly FolderGrammar[] = [
  fixedMiddle("covid-gbdf-mcr", "Covid_gbdf_mcr"),
];

export function grammarsFor(set: CategorySet): readonly FolderGrammar[] {
  return set === "alt" ? ALT_GRAMMARS : STANDARD_GRAMMARS;
}

/** Patterns name their captures `id`, `edit`, `response` and optionally `subEdit`. */
function toParams(groups: Record<string, string | undefined> | undefined): FolderParams | null {
  const id = groups?.id;
  const edit = groups?.edit;
  const response = groups?.response;
  if (id === undefined || edit === undefined || response === undefined) return null;
  const subEdit = groups?.subEdit;
  return subEdit === undefined ? { id, edit, response } : { id, edit, response, subEdit };
}

export function parseFolderName(
  folderName: string,
  grammars: readonly FolderGrammar[],
): { grammar: FolderGrammar; params: FolderParams } | null {
  for (const grammar of grammars) {
    const m = grammar.pattern.exec(folderName);
    if (!m) continue;
    const params = toParams(m.groups);
    if (params) return { grammar, params };
  }
  return null;
}

/**
 * Try each grammar of the set in priority order; the first hit wins.
 * Throws INVALID_IDENTIFIER when the numeric segment cannot be normalized.
 */
export function matchFolderName(
  folderName: string,
  set: CategorySet,
  grammars: readonly FolderGrammar[] = grammarsFor(set),
): FolderMatch | null {
  const parsed = parseFolderName(folderName, grammars);
  if (!parsed) return null;

  const { grammar, params } = parsed;
  return {
    grammar: grammar.name,
    rawIdentifier: params.id,
    identifier: normalizeIdentifier(params.id),
    editCode: params.edit,
    responseCode: params.response,
  };
}

// ── Destinations ──

const SUFFIX_REWRITES: ReadonlyArray<readonly [from: string, to: string]> = [
  ["_payloads_sur", "_payloads_dis"],
  ["_ayloads_sur", "_payloads_dis"],
  ["_sur", "_dis"],
];

export function rewriteFolderSuffix(folderName: string): string {
  for (const [from, to] of SUFFIX_REWRITES) {
    if (folderName.endsWith(from)) return folderName.slice(0, -from.length) + to;
  }
  return folderName;
}

export type DestinationOptions = {
  categorySet: CategorySet;
  useStandardDestination: boolean;
  config: OrganizerConfig;
};

export function deriveDestination(folderName: string, opts: DestinationOptions): string {
  const { config } = opts;
  const target = rewriteFolderSuffix(folderName);
  if (opts.categorySet === "alt") {
    return path.join(config.destination.root, config.source.altDir, target, "regression");
  }
  if (opts.useStandardDestination) {
    return path.join(config.destination.root, config.source.standardDir, target, "regression");
  }
  return path.join(config.destination.root, target, "regression");
}

/**
 * Collections follow the category directory named anywhere in the
 * destination, folder names included: `.../TS_01_REVENUE_WGS_CSBD_x_y_dis`
 * goes under the standard subtree.
 */
export function collectionOutputDir(destPath: string, config: OrganizerConfig): string {
  const { outputRoot } = config.collections;
  if (destPath.includes(config.source.standardDir)) {
    return path.join(outputRoot, config.source.standardDir);
  }
  if (destPath.includes(config.source.altDir)) {
    return path.join(outputRoot, config.source.altDir);
  }
  return outputRoot;
}

// ── Model descriptors ──

export function buildModelDescriptor(
  match: FolderMatch,
  folderPath: string,
  opts: DestinationOptions,
): ModelDescriptor {
  const folderName = path.basename(folderPath);
  const info = classifyCategory(folderName, match.identifier);
  const subEdit = extractSubEdit(folderName);

  const model: ModelDescriptor = {
    identifier: match.identifier,
    rawIdentifier: match.rawIdentifier,
    editCode: match.editCode,
    responseCode: match.responseCode,
    category: info.category,
    categorySet: opts.categorySet,
    label: info.label,
    grammar: match.grammar,
    folderName,
    ...(subEdit === undefined ? {} : { subEdit }),
    sourcePath: path.join(folderPath, "regression"),
    destPath: deriveDestination(folderName, opts),
    collectionName: info.collectionName,
    collectionFilename: collectionFilename(info.filePrefix, match.editCode, match.responseCode),
  };
  return Object.freeze(model);
}

async function isDirectory(p: string): Promise<boolean> {
  try {
    return (await fs.stat(p)).isDirectory();
  } catch {
    return false;
  }
}

export type ResolveOptions = DestinationOptions & {
  grammars?: readonly FolderGrammar[];
};

export async function resolveFolder(
  folderPath: string,
  opts: ResolveOptions,
): Promise<Result<ModelDescriptor, OrganizerError>> {
  const folderName = path.basename(folderPath);

  let match: FolderMatch | null;
  try {
    match = matchFolderName(folderName, opts.categorySet, opts.grammars);
  } catch (err) {
    if (err instanceof OrganizerError) return Err(err);
    throw err;
  }
  if (!match) return Err(OrganizerError.noMatch(folderName));

  if (!(await isDirectory(path.join(folderPath, "regression")))) {
    return Err(OrganizerError.missingPrecondition(`Regression folder not found in ${folderName}`));
  }

  return Ok(buildModelDescriptor(match, folderPath, opts));
}

export function isCandidateFolder(name: string): boolean {
  return name.startsWith("TS_") && name.endsWith("_sur");
}

/**
 * Scan one category-set directory and describe every folder that parses.
 * Only a missing base directory is thrown; bad candidates are logged and
 * skipped.
 */
export async function discoverModels(
  baseDir: string,
  opts: ResolveOptions & { logger?: Logger },
): Promise<ModelDescriptor[]> {
  const log = opts.logger ?? rootLogger;

  if (!(await isDirectory(baseDir))) throw OrganizerError.sourceNotFound(baseDir);

  const entries = await fs.readdir(baseDir, { withFileTypes: true });
  const candidates = entries
    .filter((e) => e.isDirectory() && isCandidateFolder(e.name))
    .map((e) => e.name)
    .sort();

  log.debug({ baseDir, candidates: candidates.length }, "Scanning for TS folders");

  const models: ModelDescriptor[] = [];
  for (const name of candidates) {
    const result = await resolveFolder(path.join(baseDir, name), opts);
    if (!result.ok) {
      log.warn({ folder: name, code: result.error.code }, result.error.message);
      continue;
    }
    const model = result.value;
    log.debug(
      { identifier: model.identifier, raw: model.rawIdentifier, grammar: model.grammar },
      `Discovered TS_${model.identifier} (${model.editCode}_${model.responseCode})`,
    );
    models.push(model);
  }
  return models;
}

export function categorySetDir(set: CategorySet, config: OrganizerConfig): string {
  return path.join(config.source.root, set === "alt" ? config.source.altDir : config.source.standardDir);
}

export function findModel(
  models: readonly ModelDescriptor[],
  identifier: string,
): ModelDescriptor | undefined {
  let wanted: string;
  try {
    wanted = normalizeIdentifier(identifier);
  } catch {
    return undefined;
  }
  return models.find((m) => m.identifier === wanted);
}
