import type {
  ClassifiedPair,
  Interaction,
  NetworkInput,
  NetworkMap,
  ProteinId,
  ProteinPair,
} from "./types.js";
import { canonicalizeInteractions } from "./edge.js";
import { buildNetworkMap, findConnectedNetworks } from "./graph.js";
import { generateAllPairs } from "./pairs.js";
import { joinAttributes } from "./join.js";
import {
  selectCrossNetworkCrossCompartment,
  selectUnobservedCrossCompartment,
} from "./classify.js";
import { formatValidationErrors, validateInput } from "./validate.js";

export interface AnalyzeOptions {
  /** Limit on the protein list before the pair universe is built. */
  maxProteins?: number;
  /** Reject input that fails validateInput() instead of tolerating it. */
  strict?: boolean;
  logger?: (message: string) => void;
}

export interface NetworkAnalysis {
  /** Interactions with the lower-numbered protein first, input order kept. */
  interactions: Interaction[];
  pairs: ProteinPair[];
  networks: ProteinId[][];
  networkMap: NetworkMap;
  rows: ClassifiedPair[];
  unobservedCrossCompartment: ClassifiedPair[];
  crossNetworkCrossCompartment: ClassifiedPair[];
}

export interface AnalysisSummary {
  proteins: number;
  interactions: number;
  networks: number;
  largestNetwork: number;
  isolatedProteins: number;
  pairs: number;
  unobservedCrossCompartment: number;
  crossNetworkCrossCompartment: number;
}

/**
 * Run the whole pipeline: canonical interactions -> connected networks ->
 * protein/network map -> joined pair table -> the two classified subsets.
 */
export function analyzeNetwork(
  input: NetworkInput,
  options: AnalyzeOptions = {}
): NetworkAnalysis {
  const log: (message: string) => void = options.logger ?? (() => {});

  if (options.strict) {
    const errors = validateInput(input);
    if (errors.length > 0) {
      throw new Error(
        `Invalid network input (${errors.length} problem${errors.length === 1 ? "" : "s"}):\n` +
          formatValidationErrors(errors)
      );
    }
  }

  const interactions = canonicalizeInteractions(input.interactions);
  const networks = findConnectedNetworks(interactions);
  const networkMap = buildNetworkMap(networks);
  log(`Found ${networks.length} networks among ${networkMap.size} interacting proteins`);

  const pairs = generateAllPairs(input.proteins, { maxProteins: options.maxProteins });
  log(`Generated ${pairs.length} pairs from ${input.proteins.length} proteins`);

  const rows = joinAttributes(pairs, input.compartments, networkMap);
  const unobservedCrossCompartment = selectUnobservedCrossCompartment(rows, interactions);
  const crossNetworkCrossCompartment = selectCrossNetworkCrossCompartment(rows);
  log(
    `Selected ${unobservedCrossCompartment.length} unobserved and ` +
      `${crossNetworkCrossCompartment.length} cross-network cross-compartment pairs`
  );

  return {
    interactions,
    pairs,
    networks,
    networkMap,
    rows,
    unobservedCrossCompartment,
    crossNetworkCrossCompartment,
  };
}

export function summarizeAnalysis(
  input: NetworkInput,
  analysis: NetworkAnalysis
): AnalysisSummary {
  const isolated = new Set(input.proteins.filter((p) => !analysis.networkMap.has(p)));
  return {
    proteins: input.proteins.length,
    interactions: analysis.interactions.length,
    networks: analysis.networks.length,
    largestNetwork: analysis.networks.reduce((max, n) => Math.max(max, n.length), 0),
    isolatedProteins: isolated.size,
    pairs: analysis.pairs.length,
    unobservedCrossCompartment: analysis.unobservedCrossCompartment.length,
    crossNetworkCrossCompartment: analysis.crossNetworkCrossCompartment.length,
  };
}
