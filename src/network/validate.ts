import type { NetworkInput } from "./types.js";
import { interactionKey, proteinNumber } from "./edge.js";

export interface ValidationError {
  rule: string;
  message: string;
  path?: string;
}

/**
 * Report data-quality problems in a parsed input. None of these stop an
 * analysis by default; analyzeNetwork() with `strict: true` rejects any.
 */
export function validateInput(input: NetworkInput): ValidationError[] {
  const errors: ValidationError[] = [];
  const proteinSet = new Set(input.proteins);

  checkDuplicateProteins(input, errors);
  checkNumericIds(input, errors);
  checkInteractions(input, proteinSet, errors);
  checkCompartments(input, errors);

  return errors;
}

/** Collapse validation errors into one message, one error per line. */
export function formatValidationErrors(errors: readonly ValidationError[]): string {
  return errors
    .map((e) => (e.path ? `[${e.rule}] ${e.path}: ${e.message}` : `[${e.rule}] ${e.message}`))
    .join("\n");
}

// Rule: No protein listed twice
function checkDuplicateProteins(
  input: NetworkInput,
  errors: ValidationError[]
): void {
  const seen = new Set<string>();
  for (const protein of input.proteins) {
    if (seen.has(protein)) {
      errors.push({
        rule: "no-duplicates",
        message: `Duplicate protein: "${protein}"`,
        path: `proteins.${protein}`,
      });
    }
    seen.add(protein);
  }
}

// Rule: Interaction endpoints need a numeric token for ordering
function checkNumericIds(input: NetworkInput, errors: ValidationError[]): void {
  const reported = new Set<string>();
  for (const protein of input.interactions.flat()) {
    if (reported.has(protein)) continue;
    try {
      proteinNumber(protein);
    } catch (err) {
      reported.add(protein);
      errors.push({
        rule: "protein-id-numeric",
        message: err instanceof Error ? err.message : String(err),
        path: `interactions.${protein}`,
      });
    }
  }
}

// Rule: Interactions join two distinct listed proteins, at most once
function checkInteractions(
  input: NetworkInput,
  proteinSet: Set<string>,
  errors: ValidationError[]
): void {
  const seen = new Set<string>();
  input.interactions.forEach(([a, b], index) => {
    const path = `interactions[${index}]`;
    if (a === b) {
      errors.push({
        rule: "interaction-self-loop",
        message: `Interaction "${a} ${b}" pairs a protein with itself`,
        path,
      });
    }

    const key = a < b ? interactionKey(a, b) : interactionKey(b, a);
    if (seen.has(key)) {
      errors.push({
        rule: "interaction-duplicate",
        message: `Duplicate interaction "${a} ${b}"`,
        path,
      });
    }
    seen.add(key);

    for (const protein of a === b ? [a] : [a, b]) {
      if (!proteinSet.has(protein)) {
        errors.push({
          rule: "interaction-protein-exists",
          message: `Interaction "${a} ${b}" references unlisted protein "${protein}"`,
          path,
        });
      }
    }
  });
}

// Rule: Every listed protein has a compartment
function checkCompartments(input: NetworkInput, errors: ValidationError[]): void {
  for (const protein of new Set(input.proteins)) {
    if (!input.compartments.has(protein)) {
      errors.push({
        rule: "compartment-assigned",
        message: `Protein "${protein}" has no compartment`,
        path: `compartments.${protein}`,
      });
    }
  }
}
