import type { Interaction, ProteinId } from "./types.js";

/**
 * Numeric token embedded in a protein id ("P23" -> 23n), used only to order
 * the two ends of an interaction. A bigint, so long digit runs stay exact.
 */
export function proteinNumber(id: ProteinId): bigint {
  const digits = id.replace(/\D/g, "");
  if (digits.length === 0) {
    throw new Error(`Invalid protein id "${id}": no numeric token to order by`);
  }
  return BigInt(digits);
}

/**
 * Order an interaction so the protein with the smaller number comes first.
 * Equal numbers ("P01", "P1") fall back to comparing the ids as strings.
 */
export function canonicalizeInteraction([a, b]: Interaction): Interaction {
  const numberA = proteinNumber(a);
  const numberB = proteinNumber(b);
  if (numberA !== numberB) {
    return numberA < numberB ? [a, b] : [b, a];
  }
  return a <= b ? [a, b] : [b, a];
}

export function canonicalizeInteractions(
  interactions: readonly Interaction[]
): Interaction[] {
  return interactions.map(canonicalizeInteraction);
}

/** Exact tuple key: ("P1", "P2") and ("P2", "P1") produce different keys. */
export function interactionKey(a: ProteinId, b: ProteinId): string {
  return JSON.stringify([a, b]);
}
