import * as fs from "node:fs";
import * as yaml from "js-yaml";

/**
 * A dataset manifest names the three input files of a run. Paths are
 * relative to the manifest's directory.
 */
export interface Dataset {
  proteins: string;
  compartments: string;
  interactions: string;
  max_proteins?: number;
  strict?: boolean;
}

const PATH_FIELDS = ["proteins", "compartments", "interactions"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseDataset(yamlString: string): Dataset {
  const raw: unknown = yaml.load(yamlString);
  if (!isRecord(raw)) {
    throw new Error("Invalid dataset: expected a YAML object");
  }

  const [proteins, compartments, interactions] = PATH_FIELDS.map((field) => {
    const value = raw[field];
    if (typeof value !== "string" || value.length === 0) {
      throw new Error(`Invalid dataset: "${field}" must be a file path`);
    }
    return value;
  });

  const dataset: Dataset = { proteins, compartments, interactions };

  const maxProteins = raw.max_proteins;
  if (maxProteins !== undefined) {
    if (typeof maxProteins !== "number" || !Number.isInteger(maxProteins) || maxProteins <= 0) {
      throw new Error(`Invalid dataset: "max_proteins" must be a positive integer`);
    }
    dataset.max_proteins = maxProteins;
  }
  const strict = raw.strict;
  if (strict !== undefined) {
    if (typeof strict !== "boolean") {
      throw new Error(`Invalid dataset: "strict" must be true or false`);
    }
    dataset.strict = strict;
  }

  return dataset;
}

export function serializeDataset(dataset: Dataset): string {
  return yaml.dump(dataset, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
    sortKeys: false,
    quotingType: '"',
  });
}

export function loadDataset(filePath: string): Dataset {
  const content = fs.readFileSync(filePath, "utf-8");
  return parseDataset(content);
}

export function saveDataset(dataset: Dataset, filePath: string): void {
  fs.writeFileSync(filePath, serializeDataset(dataset), "utf-8");
}
