import type { ProteinId, ProteinPair } from "./types.js";

/**
 * Upper bound on proteins whose pair universe is materialized.
 * 10,000 proteins is just under 50 million pairs.
 */
export const DEFAULT_MAX_PROTEINS = 10_000;

export interface PairOptions {
  maxProteins?: number;
}

export function countPairs(n: number): number {
  return n < 2 ? 0 : (n * (n - 1)) / 2;
}

/**
 * All two-protein combinations, each pair ordered as the proteins appear in
 * the input list. Downstream joins treat (entity_A, entity_B) as a
 * positional key, so the output order is stable for a given input order.
 */
export function generateAllPairs(
  proteins: readonly ProteinId[],
  options: PairOptions = {}
): ProteinPair[] {
  const maxProteins = options.maxProteins ?? DEFAULT_MAX_PROTEINS;
  if (proteins.length > maxProteins) {
    throw new Error(
      `Too many proteins: ${proteins.length} exceeds the limit of ${maxProteins} ` +
        `(${countPairs(proteins.length)} pairs would be materialized)`
    );
  }

  const pairs: ProteinPair[] = [];
  for (let i = 0; i < proteins.length; i++) {
    for (let j = i + 1; j < proteins.length; j++) {
      pairs.push({ entity_A: proteins[i], entity_B: proteins[j] });
    }
  }
  return pairs;
}
