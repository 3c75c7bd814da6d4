import type {
  ClassifiedPair,
  CompartmentMap,
  NetworkMap,
  ProteinPair,
} from "./types.js";

/**
 * Attach compartment and network of both sides to every pair. Lookups that
 * miss yield `null`; nothing here throws.
 */
export function joinAttributes(
  pairs: readonly ProteinPair[],
  compartments: CompartmentMap,
  networks: NetworkMap
): ClassifiedPair[] {
  return pairs.map(({ entity_A, entity_B }) => ({
    entity_A,
    entity_B,
    compartment_A: compartments.get(entity_A) ?? null,
    compartment_B: compartments.get(entity_B) ?? null,
    group_A: networks.get(entity_A) ?? null,
    group_B: networks.get(entity_B) ?? null,
  }));
}

/** Inequality in which a missing value differs from everything, itself included. */
export function differs<T>(a: T | null, b: T | null): boolean {
  return a === null || b === null || a !== b;
}
