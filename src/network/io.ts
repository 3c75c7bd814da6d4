import * as fs from "node:fs";
import * as path from "node:path";
import type { ClassifiedPair, CompartmentId, Interaction, NetworkInput, ProteinId } from "./types.js";
import { PAIR_COLUMNS } from "./types.js";
import type { Dataset } from "./dataset.js";

function lines(text: string): string[] {
  return text.split(/\r?\n/);
}

/** One protein id per line; blank lines are skipped. */
export function parseProteinList(text: string): ProteinId[] {
  return lines(text)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Compartment CSV with a `protein_id,compartment_id` header. A protein listed
 * twice keeps its last compartment.
 */
export function parseCompartments(text: string): Map<ProteinId, CompartmentId> {
  const [header = "", ...rows] = lines(text);
  const columns = header.split(",").map((c) => c.trim());
  const idCol = columns.indexOf("protein_id");
  const compartmentCol = columns.indexOf("compartment_id");
  if (idCol === -1 || compartmentCol === -1) {
    throw new Error(
      `Invalid compartments file: header must contain protein_id and compartment_id, got "${header}"`
    );
  }

  const compartments = new Map<ProteinId, CompartmentId>();
  rows.forEach((row, index) => {
    if (row.trim().length === 0) return;
    const fields = row.split(",").map((f) => f.trim());
    const protein = fields[idCol];
    const compartment = fields[compartmentCol];
    if (!protein || !compartment) {
      throw new Error(`Invalid compartments file: line ${index + 2} is missing a field: "${row}"`);
    }
    compartments.set(protein, compartment);
  });
  return compartments;
}

/** Whitespace-separated protein pairs, one interaction per line. */
export function parseInteractions(text: string): Interaction[] {
  const interactions: Interaction[] = [];
  lines(text).forEach((line, index) => {
    const fields = line.trim().split(/\s+/).filter((f) => f.length > 0);
    if (fields.length === 0) return;
    if (fields.length !== 2) {
      throw new Error(
        `Invalid interactions file: line ${index + 1} has ${fields.length} fields, expected 2: "${line}"`
      );
    }
    interactions.push([fields[0], fields[1]]);
  });
  return interactions;
}

export function readNetworkInput(dataset: Dataset, baseDir: string): NetworkInput {
  const read = (file: string) => fs.readFileSync(path.resolve(baseDir, file), "utf-8");
  return {
    proteins: parseProteinList(read(dataset.proteins)),
    compartments: parseCompartments(read(dataset.compartments)),
    interactions: parseInteractions(read(dataset.interactions)),
  };
}

/** Quote a field holding a comma, a quote or a line break; quotes are doubled. */
function csvField(value: string | number | null): string {
  const text = value === null ? "" : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** CSV with the pair column names as header; missing values are empty fields. */
export function formatPairsCsv(rows: readonly ClassifiedPair[]): string {
  const out = [PAIR_COLUMNS.join(",")];
  for (const row of rows) {
    out.push(PAIR_COLUMNS.map((column) => csvField(row[column])).join(","));
  }
  return out.join("\n") + "\n";
}

export function writePairsCsv(rows: readonly ClassifiedPair[], filePath: string): void {
  fs.writeFileSync(filePath, formatPairsCsv(rows), "utf-8");
}
