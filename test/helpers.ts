import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { parseConfig, type OrganizerConfig } from "../src/core/config.js";

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "tc-organizer-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Default configuration with every root moved under `root`. */
export function testConfig(root: string): OrganizerConfig {
  return parseConfig({
    source: { root: path.join(root, "source_folder") },
    destination: { root: path.join(root, "renaming_jsons") },
    collections: {
      outputRoot: path.join(root, "postman_collections"),
      headers: [
        { key: "meta-transid", value: "test-transid" },
        { key: "meta-src-envrmt", value: "TEST" },
      ],
    },
  });
}

export async function writeFiles(dir: string, files: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    const file = path.join(dir, name);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content, "utf-8");
  }
}

export async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export async function readJson(file: string): Promise<unknown> {
  return JSON.parse(await fs.readFile(file, "utf-8"));
}

export const TS07_FOLDER = "TS_07_REVENUE_WGS_CSBD_rvn011_00W11_sur";

/** Lay out `<source>/WGS_CSBD/TS_07_.../regression/<files>`. */
export async function seedStandardModel(
  config: OrganizerConfig,
  files: Record<string, string>,
  folder = TS07_FOLDER,
): Promise<string> {
  const regression = path.join(config.source.root, config.source.standardDir, folder, "regression");
  await fs.mkdir(regression, { recursive: true });
  await writeFiles(regression, files);
  return regression;
}
