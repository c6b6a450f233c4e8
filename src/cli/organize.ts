import { parseArgs } from "node:util";
import { loadConfig, type OrganizerConfig } from "../core/config.js";
import { errorMessage, OrganizerError } from "../core/errors.js";
import { categorySetDir, discoverModels, type ModelDescriptor } from "../core/folders.js";
import { logger } from "../core/logger.js";
import { createCustomModel, processModel, processModels } from "../core/processor.js";
import { formatModelListing, formatModelResult, formatSummary } from "./format.js";
import {
  flag,
  selectionOptions,
  selectModels,
  str,
  type ParsedValues,
  type Selection,
} from "./select.js";

export type CliDeps = {
  config?: OrganizerConfig;
  print?: (line: string) => void;
};

const USAGE = `Usage: tc-organizer organize [options]

  --wgs_csbd --TS07          Process one WGS_CSBD model
  --gbdf_mcr --TS47          Process one GBDF MCR model
  --wgs_csbd --all           Process every discovered WGS_CSBD model
  --list                     List all available TS models
  --no-postman               Skip collection generation
  --edit-id <id> --code <c>  Process a custom model
      [--source-dir <dir>] [--dest-dir <dir>] [--collection-name <name>]
  --config <file>            Configuration file`;

async function discoverOrEmpty(
  config: OrganizerConfig,
  set: "standard" | "alt",
): Promise<ModelDescriptor[]> {
  try {
    return await discoverModels(categorySetDir(set, config), {
      categorySet: set,
      useStandardDestination: set === "standard",
      config,
    });
  } catch (err) {
    if (err instanceof OrganizerError && err.code === "SOURCE_NOT_FOUND") {
      logger.warn(err.message);
      return [];
    }
    throw err;
  }
}

export async function runOrganize(argv: string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const config = deps.config ?? (await loadConfig(configArg(argv)));

  let values: ParsedValues;
  try {
    values = parseArgs({
      args: argv,
      options: {
        ...selectionOptions(config),
        list: { type: "boolean" },
        "no-postman": { type: "boolean" },
        "edit-id": { type: "string" },
        code: { type: "string" },
        "source-dir": { type: "string" },
        "dest-dir": { type: "string" },
        "collection-name": { type: "string" },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    print(`ERROR ${errorMessage(err)}`);
    print(USAGE);
    return 1;
  }

  if (flag(values, "help")) {
    print(USAGE);
    return 0;
  }

  if (flag(values, "list")) {
    const standard = await discoverOrEmpty(config, "standard");
    const alt = await discoverOrEmpty(config, "alt");
    formatModelListing(standard, alt).forEach((l) => print(l));
    return 0;
  }

  const generateCollection = !flag(values, "no-postman");
  const editCode = str(values, "edit-id");
  const responseCode = str(values, "code");

  if (editCode && responseCode) {
    print(`Processing custom model: ${editCode}_${responseCode}`);
    try {
      const model = createCustomModel(
        {
          editCode,
          responseCode,
          sourceDir: str(values, "source-dir"),
          destDir: str(values, "dest-dir"),
          collectionName: str(values, "collection-name"),
        },
        config,
      );
      const result = await processModel(model, { config, generateCollection });
      formatModelResult(result).forEach((l) => print(l));
      return 0;
    } catch (err) {
      print(`ERROR Custom model ${editCode}_${responseCode}: Failed with error - ${errorMessage(err)}`);
      return 1;
    }
  }

  let selection: Selection;
  try {
    selection = await selectModels(values, config);
  } catch (err) {
    print(`ERROR ${errorMessage(err)}`);
    return 1;
  }
  if (!selection.ok) {
    print(`ERROR Error: ${selection.message}`);
    selection.hints.forEach((l) => print(l));
    return 1;
  }

  print(`Processing ${selection.models.length} model(s)...`);
  const summary = await processModels(selection.models, { config, generateCollection });
  summary.results.forEach((r) => formatModelResult(r).forEach((l) => print(l)));
  formatSummary(summary).forEach((l) => print(l));
  return 0;
}

/** `--config` has to be known before the suite flags can be built. */
export function configArg(argv: readonly string[]): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--config") return argv[i + 1];
    if (arg.startsWith("--config=")) return arg.slice("--config=".length);
  }
  return undefined;
}
