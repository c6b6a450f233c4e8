import type { CategorySet, OrganizerConfig, SuiteDefinition } from "../core/config.js";
import {
  categorySetDir,
  discoverModels,
  findModel,
  type ModelDescriptor,
} from "../core/folders.js";

export type ParsedValues = Record<string, string | boolean | Array<string | boolean> | undefined>;

type OptionSpec = { type: "boolean" | "string" };

export function flag(values: ParsedValues, name: string): boolean {
  return values[name] === true;
}

export function str(values: ParsedValues, name: string): string | undefined {
  const v = values[name];
  return typeof v === "string" ? v : undefined;
}

export function suiteFlag(suite: SuiteDefinition): string {
  return `TS${suite.id}`;
}

/** Selection flags shared by `organize` and `plan`. */
export function selectionOptions(config: OrganizerConfig): Record<string, OptionSpec> {
  const options: Record<string, OptionSpec> = {
    wgs_csbd: { type: "boolean" },
    gbdf_mcr: { type: "boolean" },
    all: { type: "boolean" },
    config: { type: "string" },
    help: { type: "boolean" },
  };
  for (const suite of config.suites) options[suiteFlag(suite)] = { type: "boolean" };
  return options;
}

export function setFlag(set: CategorySet): string {
  return set === "alt" ? "--gbdf_mcr" : "--wgs_csbd";
}

export type Selection =
  | { ok: true; models: ModelDescriptor[] }
  | { ok: false; message: string; hints: string[] };

function suiteHints(config: OrganizerConfig): string[] {
  return [
    ...config.suites.map(
      (s) => `  ${setFlag(s.categorySet)} --${suiteFlag(s)}    Process TS${s.id} model (${s.label})`,
    ),
    "  --wgs_csbd --all     Process all discovered WGS_CSBD models",
    "  --gbdf_mcr --all     Process all discovered GBDF MCR models",
    "  --list               List all available TS models",
  ];
}

/**
 * Resolve the selection flags into models. Category flags are checked
 * before anything touches the disk; a missing source root throws.
 */
export async function selectModels(
  values: ParsedValues,
  config: OrganizerConfig,
): Promise<Selection> {
  const requested = config.suites.filter((s) => flag(values, suiteFlag(s)));
  const all = flag(values, "all");
  const enabled: Record<CategorySet, boolean> = {
    standard: flag(values, "wgs_csbd"),
    alt: flag(values, "gbdf_mcr"),
  };

  for (const suite of requested) {
    if (!enabled[suite.categorySet]) {
      return {
        ok: false,
        message: `${setFlag(suite.categorySet)} flag is required for TS${suite.id}!`,
        hints: config.suites
          .filter((s) => s.categorySet === suite.categorySet)
          .map((s) => `  ${setFlag(s.categorySet)} --${suiteFlag(s)}    Process TS${s.id} model (${s.label})`),
      };
    }
  }
  if (all && !enabled.standard && !enabled.alt) {
    return {
      ok: false,
      message: "Either --wgs_csbd or --gbdf_mcr flag is required for --all processing!",
      hints: ["  --wgs_csbd --all", "  --gbdf_mcr --all"],
    };
  }
  if (!requested.length && !all) {
    return { ok: false, message: "No model specified!", hints: suiteHints(config) };
  }

  const discovered: Record<CategorySet, ModelDescriptor[]> = { standard: [], alt: [] };
  for (const set of ["standard", "alt"] as const) {
    if (!enabled[set]) continue;
    discovered[set] = await discoverModels(categorySetDir(set, config), {
      categorySet: set,
      useStandardDestination: set === "standard",
      config,
    });
  }

  if (all) return { ok: true, models: [...discovered.standard, ...discovered.alt] };

  const models: ModelDescriptor[] = [];
  for (const suite of requested) {
    const model = findModel(discovered[suite.categorySet], suite.id);
    if (!model) return { ok: false, message: `TS${suite.id} model not found!`, hints: [] };
    models.push(model);
  }
  return { ok: true, models };
}
