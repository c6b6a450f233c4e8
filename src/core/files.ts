import { mapSuffix } from "./classify.js";
import { OrganizerError } from "./errors.js";
import type { ModelDescriptor } from "./folders.js";
import { Err, Ok, type Result } from "./result.js";
import { JSON_EXTENSION, stripJsonExtension } from "./utils.js";

export type AssetFileDescriptor = {
  filename: string;
  segmentCount: 3 | 4 | 5;
  tcPrefix: string;
  tcId: string;
  editCode?: string;
  responseCode?: string;
  rawSuffix: string;
  mappedSuffix: string;
};

export type AssetPlan =
  | { kind: "rename"; filename: string; targetName: string; descriptor: AssetFileDescriptor }
  | { kind: "unrecognized"; filename: string; error: OrganizerError }
  | { kind: "mismatch"; filename: string; descriptor: AssetFileDescriptor; error: OrganizerError };

export const SEGMENT_DELIMITER = "#";

/**
 * Split an asset filename into its `#` segments.
 *
 *   TC#01_12345#deny.json               3 segments
 *   TC#01_12345#rvn001#deny.json        4 segments
 *   TC#01_12345#rvn001#00W5#LR.json     5 segments
 */
export function classifyAssetFile(filename: string): Result<AssetFileDescriptor, OrganizerError> {
  const stem = stripJsonExtension(filename);
  if (stem === null) {
    return Err(OrganizerError.unrecognized(filename, `extension must be ${JSON_EXTENSION}`));
  }

  const parts = stem.split(SEGMENT_DELIMITER);
  let descriptor: AssetFileDescriptor;

  switch (parts.length) {
    case 3: {
      const [tcPrefix, tcId, rawSuffix] = parts;
      descriptor = { filename, segmentCount: 3, tcPrefix, tcId, rawSuffix, mappedSuffix: mapSuffix(rawSuffix) };
      break;
    }
    case 4: {
      const [tcPrefix, tcId, editCode, rawSuffix] = parts;
      descriptor = {
        filename,
        segmentCount: 4,
        tcPrefix,
        tcId,
        editCode,
        rawSuffix,
        mappedSuffix: mapSuffix(rawSuffix),
      };
      break;
    }
    case 5: {
      const [tcPrefix, tcId, editCode, responseCode, rawSuffix] = parts;
      descriptor = {
        filename,
        segmentCount: 5,
        tcPrefix,
        tcId,
        editCode,
        responseCode,
        rawSuffix,
        mappedSuffix: mapSuffix(rawSuffix),
      };
      break;
    }
    default:
      return Err(
        OrganizerError.unrecognized(
          filename,
          `doesn't match expected format (needs 3, 4, or 5 parts, found ${parts.length})`,
        ),
      );
  }
  return Ok(descriptor);
}

export function composeAssetName(
  descriptor: AssetFileDescriptor,
  editCode: string,
  responseCode: string,
): string {
  return [descriptor.tcPrefix, descriptor.tcId, editCode, responseCode, descriptor.mappedSuffix]
    .join(SEGMENT_DELIMITER)
    .concat(JSON_EXTENSION);
}

/**
 * Decide what happens to one asset for a given model. Only the 5-segment
 * shape is checked against the model's codes; a 4-segment file keeps no
 * say over its edit code and is renamed with the model's.
 */
export function resolveAssetFile(
  filename: string,
  model: Pick<ModelDescriptor, "editCode" | "responseCode">,
): AssetPlan {
  const classified = classifyAssetFile(filename);
  if (!classified.ok) return { kind: "unrecognized", filename, error: classified.error };

  const descriptor = classified.value;
  if (descriptor.segmentCount !== 5) {
    return {
      kind: "rename",
      filename,
      targetName: composeAssetName(descriptor, model.editCode, model.responseCode),
      descriptor,
    };
  }

  if (descriptor.editCode !== model.editCode || descriptor.responseCode !== model.responseCode) {
    return {
      kind: "mismatch",
      filename,
      descriptor,
      error: OrganizerError.parameterMismatch(
        filename,
        `${descriptor.editCode}_${descriptor.responseCode}`,
        `${model.editCode}_${model.responseCode}`,
      ),
    };
  }

  return { kind: "rename", filename, targetName: filename, descriptor };
}
