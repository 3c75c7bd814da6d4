/**
 * Classify every protein pair of the sample dataset and write the two
 * selections next to the input files.
 * Run: npx tsx data/sample/generate.ts && npx tsx data/sample/run.ts [dataset.yaml]
 */
import * as path from "node:path";
import {
  analyzeNetwork,
  loadDataset,
  readNetworkInput,
  summarizeAnalysis,
  writePairsCsv,
} from "../../src/network/index.js";

const DIR = path.dirname(new URL(import.meta.url).pathname);
const manifestPath = path.resolve(process.argv[2] ?? path.join(DIR, "dataset.yaml"));
const baseDir = path.dirname(manifestPath);

const dataset = loadDataset(manifestPath);
const input = readNetworkInput(dataset, baseDir);
const analysis = analyzeNetwork(input, {
  maxProteins: dataset.max_proteins,
  strict: dataset.strict,
  logger: (message) => console.log(`  ${message}`),
});

writePairsCsv(analysis.unobservedCrossCompartment, path.join(baseDir, "unobserved_cross_compartment.csv"));
writePairsCsv(analysis.crossNetworkCrossCompartment, path.join(baseDir, "cross_network_cross_compartment.csv"));

const summary = summarizeAnalysis(input, analysis);
console.log(`\nSummary:`);
console.log(`  Proteins: ${summary.proteins} (${summary.isolatedProteins} without interactions)`);
console.log(`  Interactions: ${summary.interactions}`);
console.log(`  Networks: ${summary.networks} (largest: ${summary.largestNetwork} proteins)`);
console.log(`  Pairs: ${summary.pairs}`);
console.log(`  Unobserved cross-compartment: ${summary.unobservedCrossCompartment}`);
console.log(`  Cross-network cross-compartment: ${summary.crossNetworkCrossCompartment}`);
