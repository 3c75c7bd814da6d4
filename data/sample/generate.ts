/**
 * Generate a synthetic protein dataset for trying out the analysis.
 * Run: npx tsx data/sample/generate.ts
 *
 * Produces small, deterministic input files that are easy to reason about:
 * a few interaction chains that mostly stay inside one compartment, plus
 * proteins that never interact.
 */
import * as fs from "node:fs";
import * as path from "node:path";

const DIR = path.dirname(new URL(import.meta.url).pathname);

// Deterministic pseudo-random (seeded LCG)
let seed = 7;
function rand(): number {
  seed = (seed * 1664525 + 1013904223) & 0x7fffffff;
  return seed / 0x7fffffff;
}
function randInt(min: number, max: number): number {
  return Math.floor(rand() * (max - min + 1)) + min;
}
function pick<T>(arr: T[]): T {
  return arr[Math.floor(rand() * arr.length)];
}

const compartmentIds = ["C1", "C2", "C3", "C4"];

// --- Proteins (40), shuffled so list order differs from numeric order ---
const proteins = Array.from({ length: 40 }, (_, i) => `P${i + 1}`);
for (let i = proteins.length - 1; i > 0; i--) {
  const j = randInt(0, i);
  [proteins[i], proteins[j]] = [proteins[j], proteins[i]];
}

// --- Compartments: every protein but the last two ---
const compartments = proteins.slice(0, -2).map((protein) => ({
  protein_id: protein,
  compartment_id: pick(compartmentIds),
}));

// --- Interactions: chains of 2-6 proteins over the first 30 listed ---
const interactions: [string, string][] = [];
let cursor = 0;
while (cursor < 30) {
  const length = randInt(2, 6);
  const chain = proteins.slice(cursor, Math.min(cursor + length, 30));
  for (let i = 1; i < chain.length; i++) {
    // Random orientation; the analysis canonicalizes it
    interactions.push(rand() < 0.5 ? [chain[i - 1], chain[i]] : [chain[i], chain[i - 1]]);
  }
  cursor += length;
}
// A repeated interaction in swapped order
if (interactions.length > 0) {
  const [a, b] = interactions[0];
  interactions.push([b, a]);
}

function writeLines(filename: string, lines: string[]) {
  const filepath = path.join(DIR, filename);
  fs.writeFileSync(filepath, lines.join("\n") + "\n");
  console.log(`  ${filename}: ${lines.length} lines`);
}

console.log("Generating sample protein data...");
writeLines("proteins.txt", proteins);
writeLines("protein_compartments.csv", [
  "protein_id,compartment_id",
  ...compartments.map((c) => `${c.protein_id},${c.compartment_id}`),
]);
writeLines("protein_interactions.txt", interactions.map(([a, b]) => `${a} ${b}`));

console.log(`\nSummary:`);
console.log(`  Proteins: ${proteins.length} (${proteins.length - compartments.length} without compartment)`);
console.log(`  Interactions: ${interactions.length}`);
console.log(`  Pairs: ${(proteins.length * (proteins.length - 1)) / 2}`);
