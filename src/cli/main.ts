#!/usr/bin/env node
import { runCollections } from "./collections.js";
import { runOrganize } from "./organize.js";
import { runPlan } from "./plan.js";

async function main(): Promise<number> {
  const [command, ...rest] = process.argv.slice(2);

  switch (command) {
    case "organize":
      return runOrganize(rest);
    case "plan":
      return runPlan(rest);
    case "collections":
      return runCollections(rest);
    default:
      // Bare flags mean organize: `tc-organizer --wgs_csbd --TS07`
      return runOrganize(process.argv.slice(2));
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(err);
    process.exit(1);
  });
