import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { OrganizerError } from "./errors.js";

// ── Schema ──

const CategorySetSchema = z.enum(["standard", "alt"]);

const SuiteSchema = z.object({
  id: z.string().regex(/^\d{1,3}$/, "Suite id must be 1-3 digits"),
  label: z.string().min(1),
  categorySet: CategorySetSchema.default("standard"),
});

const HeaderSchema = z.object({
  key: z.string().min(1),
  value: z.string(),
});

const DEFAULT_SUITES: z.input<typeof SuiteSchema>[] = [
  { id: "01", label: "Covid" },
  { id: "02", label: "Laterality Policy" },
  { id: "03", label: "Revenue code Services not payable on Facility claim Sub Edit 5" },
  { id: "04", label: "Revenue code Services not payable on Facility claim Sub Edit 4" },
  { id: "05", label: "Revenue code Services not payable on Facility claim Sub Edit 3" },
  { id: "06", label: "Revenue code Services not payable on Facility claim Sub Edit 2" },
  { id: "07", label: "Revenue code Services not payable on Facility claim Sub Edit 1" },
  { id: "08", label: "Lab panel Model" },
  { id: "09", label: "Device Dependent Procedures" },
  { id: "10", label: "Revenue" },
  { id: "11", label: "Revenue Code to HCPCS Xwalk-1B" },
  { id: "12", label: "Incidentcal Services Facility" },
  { id: "13", label: "Revenue model CR v3" },
  { id: "14", label: "HCPCS to Revenue Code Xwalk" },
  { id: "15", label: "revenue model" },
  { id: "46", label: "Multiple E&M Same day" },
  { id: "47", label: "Covid GBDF MCR", categorySet: "alt" },
];

export const ConfigSchema = z.object({
  source: z
    .object({
      root: z.string().min(1).default("source_folder"),
      standardDir: z.string().min(1).default("WGS_CSBD"),
      altDir: z.string().min(1).default("GBDF"),
    })
    .default({}),
  destination: z
    .object({
      root: z.string().min(1).default("renaming_jsons"),
    })
    .default({}),
  collections: z
    .object({
      outputRoot: z.string().min(1).default("postman_collections"),
      baseUrl: z.string().min(1).default("http://localhost:3000"),
      format: z.enum(["extended", "minimal"]).default("extended"),
      headers: z
        .array(HeaderSchema)
        .default([
          { key: "meta-transid", value: "20220117181853TMBL20359Cl893580999" },
          { key: "meta-src-envrmt", value: "IMSH" },
        ]),
    })
    .default({}),
  suites: z.array(SuiteSchema).default(DEFAULT_SUITES),
});

export type OrganizerConfig = z.infer<typeof ConfigSchema>;
export type CategorySet = z.infer<typeof CategorySetSchema>;
export type SuiteDefinition = z.infer<typeof SuiteSchema>;
export type CollectionFormat = OrganizerConfig["collections"]["format"];

export const CONFIG_FILENAME = "organizer.config.json";

export function defaultConfig(): OrganizerConfig {
  return ConfigSchema.parse({});
}

export function parseConfig(input: unknown, origin = "config"): OrganizerConfig {
  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw OrganizerError.config(`Invalid ${origin}: ${issues}`);
  }
  return parsed.data;
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

/**
 * Load configuration. Lookup order: explicit path, ORGANIZER_CONFIG,
 * organizer.config.json in the working directory, built-in defaults.
 * An explicitly named file that does not exist is an error.
 */
export async function loadConfig(file?: string): Promise<OrganizerConfig> {
  const explicit = file ?? process.env.ORGANIZER_CONFIG;
  const candidate = explicit ?? path.resolve(CONFIG_FILENAME);

  if (!(await exists(candidate))) {
    if (explicit) throw OrganizerError.config(`Config file not found: ${explicit}`);
    return defaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(candidate, "utf-8"));
  } catch (err) {
    throw new OrganizerError("CONFIG_ERROR", `Could not read ${candidate}`, { cause: err });
  }
  return parseConfig(raw, candidate);
}
