export type {
  ProteinId,
  CompartmentId,
  NetworkId,
  Interaction,
  CompartmentMap,
  NetworkMap,
  ProteinPair,
  ClassifiedPair,
  NetworkInput,
} from "./types.js";
export { PAIR_COLUMNS } from "./types.js";

export {
  proteinNumber,
  canonicalizeInteraction,
  canonicalizeInteractions,
  interactionKey,
} from "./edge.js";

export { UnionFind, buildUnionFind, findConnectedNetworks, buildNetworkMap } from "./graph.js";

export { generateAllPairs, countPairs, DEFAULT_MAX_PROTEINS } from "./pairs.js";
export type { PairOptions } from "./pairs.js";

export { joinAttributes, differs } from "./join.js";

export {
  selectUnobservedCrossCompartment,
  selectCrossNetworkCrossCompartment,
} from "./classify.js";

export { validateInput, formatValidationErrors } from "./validate.js";
export type { ValidationError } from "./validate.js";

export { analyzeNetwork, summarizeAnalysis } from "./analyze.js";
export type { AnalyzeOptions, NetworkAnalysis, AnalysisSummary } from "./analyze.js";

export {
  parseDataset,
  serializeDataset,
  loadDataset,
  saveDataset,
} from "./dataset.js";
export type { Dataset } from "./dataset.js";

export {
  parseProteinList,
  parseCompartments,
  parseInteractions,
  readNetworkInput,
  formatPairsCsv,
  writePairsCsv,
} from "./io.js";
