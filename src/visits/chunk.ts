/**
 * Splitting of source exposures into bounded, contiguous chunks.
 *
 * Arc sequences can be long; the detectorMap builder is fed at most
 * `chunkSize` visits at a time, and never a set of visits that spans a gap.
 */

import type { FileId } from "./file-id.js";

/**
 * Split `sources` into maximal runs whose visit numbers increase by exactly 1.
 * Sources sharing a visit number start separate runs.
 */
export function splitContiguousRuns(sources: Iterable<FileId>): FileId[][] {
  const sorted = [...sources].sort((a, b) => a.visit - b.visit);
  const runs: FileId[][] = [];
  let current: FileId[] = [];

  for (const source of sorted) {
    const previous = current[current.length - 1];
    if (previous !== undefined && source.visit - previous.visit !== 1) {
      runs.push(current);
      current = [];
    }
    current.push(source);
  }
  if (current.length > 0) {
    runs.push(current);
  }

  return runs;
}

/**
 * Split `sources` into chunks of at most `chunkSize` items with contiguous
 * visit numbers, as evenly as possible within each contiguous run.
 * With chunkSize 5, a run of 6 becomes 3+3 and a run of 11 becomes 4+4+3.
 *
 * @throws RangeError if `chunkSize` is not a positive integer
 */
export function splitSources(sources: Iterable<FileId>, chunkSize: number): FileId[][] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunkSize must be positive (${chunkSize})`);
  }

  const chunks: FileId[][] = [];
  for (const run of splitContiguousRuns(sources)) {
    const numChunks = Math.ceil(run.length / chunkSize);
    const quotient = Math.floor(run.length / numChunks);
    let remainder = run.length % numChunks;

    let start = 0;
    for (let i = 0; i < numChunks; i++) {
      const size = remainder > 0 ? quotient + 1 : quotient;
      if (remainder > 0) {
        remainder--;
      }
      chunks.push(run.slice(start, start + size));
      start += size;
    }
  }

  return chunks;
}
