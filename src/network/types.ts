export type ProteinId = string;
export type CompartmentId = string;

/** Dense integer id of a connected network, only meaningful within one run. */
export type NetworkId = number;

/** A known direct interaction. Undirected; see canonicalizeInteraction(). */
export type Interaction = [ProteinId, ProteinId];

export type CompartmentMap = ReadonlyMap<ProteinId, CompartmentId>;

/** Proteins without any interaction are absent from this map. */
export type NetworkMap = ReadonlyMap<ProteinId, NetworkId>;

export interface ProteinPair {
  entity_A: ProteinId;
  entity_B: ProteinId;
}

/**
 * A pair joined with the attributes of both sides.
 * `null` marks a missing compartment or network and never equals another `null`.
 */
export interface ClassifiedPair extends ProteinPair {
  compartment_A: CompartmentId | null;
  compartment_B: CompartmentId | null;
  group_A: NetworkId | null;
  group_B: NetworkId | null;
}

/** The three parsed collections a run starts from. */
export interface NetworkInput {
  proteins: ProteinId[];
  compartments: CompartmentMap;
  interactions: Interaction[];
}

export const PAIR_COLUMNS = [
  "entity_A",
  "entity_B",
  "compartment_A",
  "compartment_B",
  "group_A",
  "group_B",
] as const satisfies readonly (keyof ClassifiedPair)[];
