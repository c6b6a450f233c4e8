import path from "node:path";
import { parseArgs } from "node:util";
import { loadConfig } from "../core/config.js";
import { errorMessage } from "../core/errors.js";
import { planModel } from "../core/processor.js";
import type { AssetPlan } from "../core/files.js";
import { configArg, type CliDeps } from "./organize.js";
import { selectionOptions, selectModels, type ParsedValues, type Selection } from "./select.js";

/** Print what `organize` would do with the same selection, touching nothing. */
export async function runPlan(argv: string[], deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const config = deps.config ?? (await loadConfig(configArg(argv)));

  let values: ParsedValues;
  try {
    values = parseArgs({ args: argv, options: selectionOptions(config), strict: true }).values;
  } catch (err) {
    print(`ERROR ${errorMessage(err)}`);
    return 1;
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
    return 1;
  }

  for (const model of selection.models) {
    print(`TS_${model.identifier} (${model.editCode}_${model.responseCode}) -> ${model.destPath}`);
    let plans: AssetPlan[];
    try {
      plans = await planModel(model);
    } catch (err) {
      print(`  ${errorMessage(err)}`);
      continue;
    }
    for (const plan of plans) {
      if (plan.kind === "rename") {
        print(`  ${plan.filename} => ${path.join(model.destPath, plan.targetName)}`);
      } else {
        print(`  ${plan.filename} => skipped (${plan.error.message})`);
      }
    }
  }
  return 0;
}
