import { parseArgs } from "node:util";
import {
  directoryStats,
  generateAllCollections,
  generateCollection,
  generateDirectoryCollection,
  listDirectories,
  settingsFromConfig,
  validateCollection,
} from "../core/collection.js";
import { loadConfig, type CollectionFormat } from "../core/config.js";
import { errorMessage } from "../core/errors.js";
import type { CliDeps } from "./organize.js";
import { str, type ParsedValues } from "./select.js";

const USAGE = `Usage: tc-organizer collections <command> [options]

  generate          --collection-name <name> | --directory <dir>
  generate-all
  list-directories
  stats             --directory <dir>
  validate          --collection-path <file>

  --source-dir <dir>   (default: configured destination root)
  --output-dir <dir>   (default: configured collections root)
  --format extended|minimal
  --config <file>`;

const COMMANDS = ["generate", "generate-all", "list-directories", "stats", "validate"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

function parseFormat(value: string | undefined, fallback: CollectionFormat): CollectionFormat {
  if (value === "extended" || value === "minimal") return value;
  return fallback;
}

export async function runCollections(argv: string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const [command, ...rest] = argv;

  if (!isCommand(command)) {
    print(USAGE);
    return command === undefined || command === "--help" ? 0 : 1;
  }

  let values: ParsedValues;
  try {
    values = parseArgs({
      args: rest,
      options: {
        "source-dir": { type: "string" },
        "output-dir": { type: "string" },
        "collection-name": { type: "string" },
        directory: { type: "string" },
        "collection-path": { type: "string" },
        format: { type: "string" },
        config: { type: "string" },
      },
      strict: true,
    }).values;
  } catch (err) {
    print(`ERROR ${errorMessage(err)}`);
    return 1;
  }

  const config = deps.config ?? (await loadConfig(str(values, "config")));
  const sourceDir = str(values, "source-dir") ?? config.destination.root;
  const outputDir = str(values, "output-dir") ?? config.collections.outputRoot;
  const format = parseFormat(str(values, "format"), config.collections.format);
  const settings = settingsFromConfig(config);

  switch (command) {
    case "generate": {
      const directory = str(values, "directory");
      const file = directory
        ? await generateDirectoryCollection({ sourceDir, outputDir, dirName: directory, settings })
        : await generateCollection({
            sourceDir,
            outputDir,
            collectionName: str(values, "collection-name") ?? "TestCollection",
            format,
            settings,
          });
      if (!file) {
        print("Failed to generate collection");
        return 1;
      }
      print(`Collection generated: ${file}`);
      return 0;
    }

    case "generate-all": {
      const collections = await generateAllCollections({
        sourceDir,
        outputDir,
        fallbackName: str(values, "collection-name") ?? "TestCollection",
        format,
        settings,
      });
      const names = Object.keys(collections);
      if (!names.length) {
        print("No collection was generated");
        return 1;
      }
      for (const name of names) print(`${name}: ${collections[name]}`);
      return 0;
    }

    case "list-directories": {
      const dirs = await listDirectories(sourceDir);
      if (!dirs.length) {
        print("No directories found in source directory.");
        return 0;
      }
      for (const dir of dirs) {
        const stats = await directoryStats(sourceDir, dir);
        print(`${dir}:`);
        if (!stats) continue;
        print(`   Files: ${stats.totalFiles}`);
        print(`   Types: ${stats.suffixes.join(", ")}`);
        print(`   Edit IDs: ${stats.editCodes.join(", ")}`);
        print(`   Response codes: ${stats.responseCodes.join(", ")}`);
      }
      return 0;
    }

    case "stats": {
      const directory = str(values, "directory");
      if (!directory) {
        print("ERROR --directory is required");
        return 1;
      }
      const stats = await directoryStats(sourceDir, directory);
      if (!stats) {
        print(`ERROR Directory '${directory}' not found`);
        return 1;
      }
      print(`Statistics for ${directory}:`);
      print(`  Total files: ${stats.totalFiles}`);
      print(`  File types: ${JSON.stringify(stats.fileTypes)}`);
      print(`  Edit IDs: ${stats.editCodes.join(", ")}`);
      print(`  Response codes: ${stats.responseCodes.join(", ")}`);
      print(`  Suffixes: ${stats.suffixes.join(", ")}`);
      return 0;
    }

    case "validate": {
      const file = str(values, "collection-path");
      if (!file) {
        print("ERROR --collection-path is required");
        return 1;
      }
      const result = await validateCollection(file);
      print(`Validation results for ${file} (${result.shape ?? "unknown"} shape):`);
      print(result.valid ? "Collection is valid" : "Collection has errors:");
      for (const e of result.errors) print(`  - ${e}`);
      for (const w of result.warnings) print(`  ! ${w}`);
      print(`  total_requests: ${result.totalRequests}`);
      return result.valid ? 0 : 1;
    }
  }
}
