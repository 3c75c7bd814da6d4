import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { formatValidationErrors, validateInput } from "../../src/network/validate.js";
import type { NetworkInput } from "../../src/network/types.js";

function validInput(): NetworkInput {
  return {
    proteins: ["P1", "P2", "P3", "P4"],
    compartments: new Map([
      ["P1", "nucleus"],
      ["P2", "nucleus"],
      ["P3", "membrane"],
      ["P4", "cytosol"],
    ]),
    interactions: [["P1", "P2"], ["P3", "P2"]],
  };
}

describe("validateInput", () => {
  it("passes valid input", () => {
    assert.deepStrictEqual(validateInput(validInput()), []);
  });

  it("catches duplicate proteins", () => {
    const input = validInput();
    input.proteins.push("P3");
    assert.deepStrictEqual(validateInput(input), [
      { rule: "no-duplicates", message: 'Duplicate protein: "P3"', path: "proteins.P3" },
    ]);
  });

  it("catches ids without a numeric token once per id", () => {
    const input = validInput();
    input.proteins.push("Actin");
    const compartments = new Map(input.compartments);
    compartments.set("Actin", "cytosol");
    input.compartments = compartments;
    input.interactions.push(["Actin", "P1"], ["P4", "Actin"]);
    const errors = validateInput(input).filter((e) => e.rule === "protein-id-numeric");
    assert.deepStrictEqual(errors, [
      {
        rule: "protein-id-numeric",
        message: 'Invalid protein id "Actin": no numeric token to order by',
        path: "interactions.Actin",
      },
    ]);
  });

  it("catches self-loops", () => {
    const input = validInput();
    input.interactions.push(["P4", "P4"]);
    assert.deepStrictEqual(validateInput(input), [
      {
        rule: "interaction-self-loop",
        message: 'Interaction "P4 P4" pairs a protein with itself',
        path: "interactions[2]",
      },
    ]);
  });

  it("catches duplicates listed in either order", () => {
    const input = validInput();
    input.interactions.push(["P2", "P3"]);
    assert.deepStrictEqual(validateInput(input), [
      {
        rule: "interaction-duplicate",
        message: 'Duplicate interaction "P2 P3"',
        path: "interactions[2]",
      },
    ]);
  });

  it("catches interactions with unlisted proteins", () => {
    const input = validInput();
    input.interactions.push(["P1", "P42"]);
    const errors = validateInput(input);
    assert.equal(errors.length, 1);
    assert.equal(errors[0].rule, "interaction-protein-exists");
    assert.ok(errors[0].message.includes("P42"));
  });

  it("catches proteins without a compartment", () => {
    const input = validInput();
    input.proteins.push("P5");
    assert.deepStrictEqual(validateInput(input), [
      {
        rule: "compartment-assigned",
        message: 'Protein "P5" has no compartment',
        path: "compartments.P5",
      },
    ]);
  });

  it("returns all errors at once", () => {
    const input = validInput();
    input.proteins.push("P1", "P6");
    input.interactions.push(["P3", "P3"], ["P2", "P1"]);
    const rules = validateInput(input).map((e) => e.rule);
    assert.deepStrictEqual(rules, [
      "no-duplicates",
      "interaction-self-loop",
      "interaction-duplicate",
      "compartment-assigned",
    ]);
  });
});

describe("formatValidationErrors", () => {
  it("prints one line per error", () => {
    const text = formatValidationErrors([
      { rule: "no-duplicates", message: 'Duplicate protein: "P3"', path: "proteins.P3" },
      { rule: "custom", message: "no path here" },
    ]);
    assert.equal(text, '[no-duplicates] proteins.P3: Duplicate protein: "P3"\n[custom] no path here');
  });
});
