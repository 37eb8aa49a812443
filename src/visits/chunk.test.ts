/**
 * Source chunking tests.
 *
 * Run: node --import tsx --test src/visits/chunk.test.ts
 */

import { strict as assert } from "node:assert";
import { test } from "node:test";

import { splitContiguousRuns, splitSources } from "./chunk.js";
import type { FileId } from "./file-id.js";

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

function ids(visits: number[], arm: FileId["arm"] = "b"): FileId[] {
  return visits.map((visit) => ({ visit, arm, spectrograph: 1 }));
}

function range(first: number, last: number): number[] {
  const values: number[] = [];
  for (let value = first; value <= last; value++) {
    values.push(value);
  }
  return values;
}

function visitsOf(chunks: FileId[][]): number[][] {
  return chunks.map((chunk) => chunk.map((id) => id.visit));
}

// ═══════════════════════════════════════════════════════════════════════════
// CONTIGUOUS RUNS
// ═══════════════════════════════════════════════════════════════════════════

test("gaps in visit numbers split runs", () => {
  assert.deepEqual(visitsOf(splitContiguousRuns(ids([7, 1, 3, 2, 8]))), [
    [1, 2, 3],
    [7, 8],
  ]);
});

test("a repeated visit starts a new run", () => {
  const runs = splitContiguousRuns([
    { visit: 1, arm: "b", spectrograph: 1 },
    { visit: 1, arm: "r", spectrograph: 1 },
    { visit: 2, arm: "b", spectrograph: 1 },
  ]);
  assert.deepEqual(runs, [
    [{ visit: 1, arm: "b", spectrograph: 1 }],
    [
      { visit: 1, arm: "r", spectrograph: 1 },
      { visit: 2, arm: "b", spectrograph: 1 },
    ],
  ]);
});

test("no sources give no runs", () => {
  assert.deepEqual(splitContiguousRuns([]), []);
});

// ═══════════════════════════════════════════════════════════════════════════
// CHUNKING
// ═══════════════════════════════════════════════════════════════════════════

test("a run is split into chunks of nearly equal size", () => {
  assert.deepEqual(visitsOf(splitSources(ids(range(1, 11)), 5)), [
    [1, 2, 3, 4],
    [5, 6, 7, 8],
    [9, 10, 11],
  ]);
  assert.deepEqual(visitsOf(splitSources(ids(range(1, 6)), 5)), [
    [1, 2, 3],
    [4, 5, 6],
  ]);
});

test("a run no longer than the chunk size stays whole", () => {
  assert.deepEqual(visitsOf(splitSources(ids(range(1, 5)), 5)), [[1, 2, 3, 4, 5]]);
});

test("chunks never span a gap", () => {
  assert.deepEqual(visitsOf(splitSources(ids([1, 2, 3, 7, 8]), 5)), [
    [1, 2, 3],
    [7, 8],
  ]);
});

test("chunk size must be a positive integer", () => {
  for (const size of [0, -1, 1.5]) {
    assert.throws(() => splitSources(ids([1]), size), {
      name: "RangeError",
      message: `chunkSize must be positive (${size})`,
    });
  }
});
