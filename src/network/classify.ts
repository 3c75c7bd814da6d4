import type { ClassifiedPair, Interaction } from "./types.js";
import { interactionKey } from "./edge.js";
import { differs } from "./join.js";

/**
 * Pairs in different compartments that are not a known interaction, in
 * either order. These are the candidates for new interactions.
 */
export function selectUnobservedCrossCompartment(
  rows: readonly ClassifiedPair[],
  interactions: readonly Interaction[]
): ClassifiedPair[] {
  const known = new Set(interactions.map(([a, b]) => interactionKey(a, b)));
  return rows.filter(
    (row) =>
      differs(row.compartment_A, row.compartment_B) &&
      !known.has(interactionKey(row.entity_A, row.entity_B)) &&
      !known.has(interactionKey(row.entity_B, row.entity_A))
  );
}

/**
 * Pairs in different compartments and different networks: no direct or
 * transitive interaction evidence, so unlikely to interact. Always a subset
 * of selectUnobservedCrossCompartment() for the same interactions.
 */
export function selectCrossNetworkCrossCompartment(
  rows: readonly ClassifiedPair[]
): ClassifiedPair[] {
  return rows.filter(
    (row) =>
      differs(row.compartment_A, row.compartment_B) &&
      differs(row.group_A, row.group_B)
  );
}
