import type { ModelDescriptor } from "../core/folders.js";
import type { BatchSummary, ModelResult } from "../core/processor.js";

const RULE = "=".repeat(60);

function modelBlock(models: readonly ModelDescriptor[]): string[] {
  if (!models.length) return ["   No models found"];
  return models.flatMap((m, i) => [
    `  ${String(i + 1).padStart(2, " ")}. TS_${m.identifier} | ${m.label}`,
    `      Edit ID:    ${m.editCode}`,
    `      Code:       ${m.responseCode}`,
    `      Source:     ${m.sourcePath}`,
    `      Dest:       ${m.destPath}`,
    `      Collection: ${m.collectionName}`,
    "",
  ]);
}

export function formatModelListing(
  standard: readonly ModelDescriptor[],
  alt: readonly ModelDescriptor[],
): string[] {
  return [
    RULE,
    `Total Models Found: ${standard.length + alt.length}`,
    RULE,
    `WGS_CSBD MODELS (${standard.length} models)`,
    ...modelBlock(standard),
    `GBDF MODELS (${alt.length} models)`,
    ...modelBlock(alt),
    RULE,
  ];
}

export function formatModelResult(result: ModelResult): string[] {
  const { model } = result;
  const tag = `TS_${model.identifier} (${model.editCode}_${model.responseCode})`;
  const lines = result.renamed.length
    ? [`SUCCESS Model ${tag}: Successfully processed ${result.renamed.length} files`]
    : [`WARNING Model ${tag}: No files were processed`];
  for (const s of result.skipped) lines.push(`   skipped ${s.filename}: ${s.message}`);
  for (const f of result.failed) lines.push(`   failed  ${f.filename}: ${f.message}`);
  if (result.collectionPath) lines.push(`   collection: ${result.collectionPath}`);
  return lines;
}

export function formatSummary(summary: BatchSummary): string[] {
  const successful = summary.results.filter((r) => r.renamed.length > 0);
  const lines = [
    "",
    RULE,
    "PROCESSING SUMMARY",
    RULE,
    `Models processed: ${summary.results.length + summary.failed.length}`,
    `Successful models: ${successful.length}`,
    `Failed models: ${summary.failed.length}`,
    `Total files processed: ${summary.totalFiles}`,
  ];
  for (const r of successful) {
    lines.push(
      `   - TS_${r.model.identifier} (${r.model.editCode}_${r.model.responseCode}): ${r.renamed.length} files`,
    );
  }
  for (const f of summary.failed) {
    lines.push(`   x TS_${f.model.identifier} (${f.model.editCode}_${f.model.responseCode}): ${f.reason}`);
  }
  return lines;
}
