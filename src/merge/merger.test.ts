/**
 * Calib block merging tests.
 *
 * Run: node --import tsx --test src/merge/merger.test.ts
 *
 * Tests cover:
 *   1. Mergeability: equality up to "arm=..." strings
 *   2. Node and name merging
 *   3. Block grouping: anchored on the first remaining block
 *   4. Serial numbers and naming
 */

import { strict as assert } from "node:assert";
import { test } from "node:test";

import {
  addSerialNumbersToNames,
  isMergeable,
  mergeBlockNames,
  mergeCalibBlocks,
  mergeNodes,
  MergeError,
  nameYamlMapping,
  type NamedBlock,
} from "./merger.js";

function flatBlock(name: string, visit: string, arm: string): NamedBlock {
  return { name, flat: { id: [`visit=${visit}`, `arm=${arm}`, "spectrograph=1"] } };
}

// ═══════════════════════════════════════════════════════════════════════════
// MERGEABILITY
// ═══════════════════════════════════════════════════════════════════════════

test("blocks differing only in arm selectors and names are mergeable", () => {
  assert.equal(isMergeable(flatBlock("flat_b", "1", "b"), flatBlock("flat_r", "1", "r")), true);
});

test("blocks with different visits are not mergeable", () => {
  assert.equal(isMergeable(flatBlock("flat_b", "1", "b"), flatBlock("flat_r", "2", "r")), false);
});

test("blocks with different keys are not mergeable", () => {
  assert.equal(
    isMergeable({ name: "x_b", bias: "a" }, { name: "x_r", bias: "a", dark: "b" }),
    false
  );
});

test("sequences must have the same length", () => {
  assert.equal(isMergeable(["a", "b"], ["a"]), false);
  assert.equal(isMergeable(["arm=b", 1], ["arm=n", 1]), true);
});

test("an arm selector does not match a plain string", () => {
  assert.equal(isMergeable("arm=b", "visit=1"), false);
});

// ═══════════════════════════════════════════════════════════════════════════
// NODE AND NAME MERGING
// ═══════════════════════════════════════════════════════════════════════════

test("arm selectors are merged, deduplicated and sorted", () => {
  assert.equal(mergeNodes(["arm=r^b", "arm=r", "arm=n"]), "arm=b^n^r");
});

test("equal scalars merge to themselves", () => {
  assert.equal(mergeNodes([3, 3]), 3);
  assert.equal(mergeNodes([null, null]), null);
});

test("differing scalars cannot be merged", () => {
  assert.throws(() => mergeNodes([{ a: "x" }, { a: "y" }]), MergeError);
});

test("block names with one prefix merge their arms", () => {
  assert.equal(mergeBlockNames(["flat_r", "flat_b"]), "flat_br");
  assert.equal(mergeBlockNames(["flat_n"]), "flat_n");
});

test("block names with different prefixes cannot be merged", () => {
  assert.throws(() => mergeBlockNames(["flat_r", "dark_b"]), {
    name: "MergeError",
    message: "Block names are not mergeable: flat_r, dark_b",
  });
});

test("a block name must end with an arm", () => {
  assert.throws(() => mergeBlockNames(["flat_x"]), {
    name: "MergeError",
    message: "Block name does not end with an arm: 'flat_x'",
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// BLOCK GROUPING
// ═══════════════════════════════════════════════════════════════════════════

test("mergeable blocks are fused into one", () => {
  assert.deepEqual(
    mergeCalibBlocks([flatBlock("flat_b", "1..3", "b"), flatBlock("flat_r", "1..3", "r")]),
    [flatBlock("flat_br", "1..3", "b^r")]
  );
});

test("blocks that merge with nothing are returned unchanged", () => {
  const blocks = [flatBlock("flat_b", "1", "b"), flatBlock("flat_r", "2", "r")];
  assert.deepEqual(mergeCalibBlocks(blocks), blocks);
});

test("groups are anchored on the first block and keep first-seen order", () => {
  const merged = mergeCalibBlocks([
    flatBlock("flat_b", "1", "b"),
    flatBlock("flat_n", "2", "n"),
    flatBlock("flat_r", "1", "r"),
  ]);
  assert.deepEqual(merged, [flatBlock("flat_br", "1", "b^r"), flatBlock("flat_n", "2", "n")]);
});

test("mergeable blocks whose names do not share a prefix fail", () => {
  assert.throws(
    () => mergeCalibBlocks([flatBlock("a_b", "1", "b"), flatBlock("c_r", "1", "r")]),
    MergeError
  );
});

test("merged blocks keep their name first", () => {
  const [merged] = mergeCalibBlocks([
    flatBlock("flat_b", "1", "b"),
    flatBlock("flat_r", "1", "r"),
  ]);
  assert.deepEqual(Object.keys(merged), ["name", "flat"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// NAMING
// ═══════════════════════════════════════════════════════════════════════════

test("serial numbers are added per name, sorted by name", () => {
  const numbered = addSerialNumbersToNames([
    { name: "y", order: 0 },
    { name: "x", order: 1 },
    { name: "x", order: 2 },
    { name: "x", order: 3 },
  ]);
  assert.deepEqual(numbered, [
    { name: "x_1", order: 1 },
    { name: "x_2", order: 2 },
    { name: "x_3", order: 3 },
    { name: "y_1", order: 0 },
  ]);
});

test("nameYamlMapping puts the name first and replaces an old one", () => {
  const named = nameYamlMapping("new", { bias: "a", name: "old" });
  assert.deepEqual(Object.keys(named), ["name", "bias"]);
  assert.equal(named.name, "new");
});
