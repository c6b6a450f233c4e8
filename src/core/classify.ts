export type Category =
  | "revenue-services"
  | "lab-panel"
  | "recovery-room"
  | "covid"
  | "laterality"
  | "device-procedures"
  | "revenue-model"
  | "revenue-hcpcs-xwalk"
  | "incidental-services"
  | "revenue-model-cr-v3"
  | "hcpcs-revenue-xwalk"
  | "multiple-em"
  | "covid-gbdf-mcr"
  | "unspecified";

export type CategoryRule = {
  match: string;
  category: Exclude<Category, "unspecified">;
  label: string;
  filePrefix: string;
  collection: (id: string, subEdit: number | undefined) => string;
};

export type CategoryInfo = {
  category: Category;
  label: string;
  filePrefix: string;
  collectionName: string;
};

const genericCollection = (id: string) => `ts_${id}_collection`;
const named = (middle: string) => (id: string) => `TS_${id}_${middle}_Collection`;

// Matched case-sensitively against the whole folder name.
export const CATEGORY_RULES: readonly CategoryRule[] = [
  {
    match: "Revenue code Services not payable on Facility claim",
    category: "revenue-services",
    label: "Revenue Services",
    filePrefix: "revenue_wgs_csbd",
    collection: (id, subEdit) =>
      subEdit === undefined
        ? genericCollection(id)
        : `TS_${id}_Revenue code Services not payable on Facility claim Sub Edit ${subEdit}_Collection`,
  },
  {
    match: "Lab panel Model",
    category: "lab-panel",
    label: "Lab Panel",
    filePrefix: "lab_wgs_csbd",
    collection: named("Lab panel Model"),
  },
  {
    match: "Recovery Room Reimbursement",
    category: "recovery-room",
    label: "Recovery Room",
    filePrefix: "recovery_wgs_csbd",
    collection: named("Recovery Room Reimbursement"),
  },
  {
    match: "Covid",
    category: "covid",
    label: "Covid",
    filePrefix: "covid_wgs_csbd",
    collection: named("Covid"),
  },
  {
    match: "Laterality Policy",
    category: "laterality",
    label: "Laterality Policy",
    filePrefix: "laterality_wgs_csbd",
    collection: named("Laterality"),
  },
  {
    match: "Device Dependent Procedures",
    category: "device-procedures",
    label: "Device Procedures",
    filePrefix: "device_wgs_csbd",
    collection: named("Device Dependent Procedures"),
  },
  {
    match: "revenue model",
    category: "revenue-model",
    label: "Revenue Model",
    filePrefix: "revenue_wgs_csbd",
    collection: named("revenue model"),
  },
  {
    match: "Revenue Code to HCPCS Xwalk-1B",
    category: "revenue-hcpcs-xwalk",
    label: "Revenue-HCPCS Crosswalk",
    filePrefix: "revenue_wgs_csbd",
    collection: named("Revenue Code to HCPCS Xwalk-1B"),
  },
  {
    match: "Incidentcal Services Facility",
    category: "incidental-services",
    label: "Incidental Services",
    filePrefix: "incidentcal_wgs_csbd",
    collection: named("Incidentcal Services Facility"),
  },
  {
    match: "Revenue model CR v3",
    category: "revenue-model-cr-v3",
    label: "Revenue Model CR v3",
    filePrefix: "revenue_model_wgs_csbd",
    collection: named("Revenue model CR v3"),
  },
  {
    match: "HCPCS to Revenue Code Xwalk",
    category: "hcpcs-revenue-xwalk",
    label: "HCPCS-Revenue Crosswalk",
    filePrefix: "hcpcs_wgs_csbd",
    collection: named("HCPCS to Revenue Code Xwalk"),
  },
  {
    match: "Multiple E&M Same day",
    category: "multiple-em",
    label: "Multiple E&M Same day",
    filePrefix: "multiple_em_wgs_csbd",
    collection: named("Multiple E&M Same day"),
  },
  {
    match: "Covid_gbdf_mcr",
    category: "covid-gbdf-mcr",
    label: "Covid GBDF MCR",
    filePrefix: "covid_gbdf_mcr",
    collection: named("Covid_gbdf_mcr"),
  },
];

const SUB_EDIT = /Sub Edit (\d+)/;

export function extractSubEdit(folderName: string): number | undefined {
  const m = folderName.match(SUB_EDIT);
  return m ? Number.parseInt(m[1], 10) : undefined;
}

/**
 * Pick the category whose marker is the longest substring of the folder
 * name, so "Covid_gbdf_mcr" beats "Covid".
 */
export function classifyCategory(
  folderName: string,
  id: string,
  rules: readonly CategoryRule[] = CATEGORY_RULES,
): CategoryInfo {
  let best: CategoryRule | undefined;
  for (const rule of rules) {
    if (!folderName.includes(rule.match)) continue;
    if (!best || rule.match.length > best.match.length) best = rule;
  }

  if (!best) {
    return {
      category: "unspecified",
      label: "General",
      filePrefix: "revenue_wgs_csbd",
      collectionName: genericCollection(id),
    };
  }

  return {
    category: best.category,
    label: best.label,
    filePrefix: best.filePrefix,
    collectionName: best.collection(id, extractSubEdit(folderName)),
  };
}

export function collectionFilename(
  filePrefix: string,
  editCode: string,
  responseCode: string,
): string {
  return `${filePrefix}_${editCode}_${responseCode.toLowerCase()}.json`;
}

// ── Result suffixes ──

export const SUFFIX_RULES: ReadonlyArray<readonly [token: string, code: string]> = [
  ["deny", "LR"],
  ["bypass", "NR"],
  ["market", "EX"],
  ["date", "EX"],
];

export function mapSuffix(raw: string): string {
  const hit = SUFFIX_RULES.find(([token]) => token === raw);
  return hit ? hit[1] : raw;
}
