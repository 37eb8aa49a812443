/**
 * Merging of near-identical calibration blocks.
 *
 * The spec generator emits one calibration block per arm. Blocks for
 * different arms are often identical except for their "arm=..." selector
 * and their name ("flat_b", "flat_r", ...). This module fuses such blocks
 * into one ("flat_br" with "arm=b^r") so that the reduction runs one
 * command over all arms instead of one command per arm.
 *
 * Blocks are handled in their YAML form (plain mappings, sequences and
 * scalars) because merging happens before the document is written.
 *
 * Grouping is greedy and anchored on the first remaining block: every block
 * mergeable with that block joins its group, and blocks in the group are
 * not compared with each other. Names are not compared by `isMergeable`,
 * so a group can still fail in `mergeBlockNames` if its names do not share
 * a prefix.
 */

import { Arm } from "../spec/enums.js";

/**
 * A value of a parsed YAML document.
 */
export type YamlNode =
  | string
  | number
  | boolean
  | null
  | YamlNode[]
  | { [key: string]: YamlNode };

export type YamlMapping = { [key: string]: YamlNode };

/**
 * A calibration block in YAML form: a mapping with a "name" key.
 */
export type NamedBlock = YamlMapping & { name: string };

const ARM_PREFIX = "arm=";
const NAME_KEY = "name";

export class MergeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MergeError";
  }
}

export function isYamlMapping(node: YamlNode | undefined): node is YamlMapping {
  return typeof node === "object" && node !== null && !Array.isArray(node);
}

function sameKeys(a: YamlMapping, b: YamlMapping): boolean {
  const keysA = Object.keys(a);
  const keysB = new Set(Object.keys(b));
  return keysA.length === keysB.size && keysA.every((key) => keysB.has(key));
}

/**
 * Whether two (parts of) blocks are equal up to "arm=..." strings.
 * Values under the "name" key are not compared.
 */
export function isMergeable(a: YamlNode, b: YamlNode): boolean {
  if (Array.isArray(a)) {
    if (!Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    for (let i = 0; i < a.length; i++) {
      if (!isMergeable(a[i], b[i])) {
        return false;
      }
    }
    return true;
  }

  if (isYamlMapping(a)) {
    if (!isYamlMapping(b) || !sameKeys(a, b)) {
      return false;
    }
    for (const key of Object.keys(a)) {
      if (key !== NAME_KEY && !isMergeable(a[key], b[key])) {
        return false;
      }
    }
    return true;
  }

  if (typeof a === "string" && typeof b === "string") {
    if (a.startsWith(ARM_PREFIX) && b.startsWith(ARM_PREFIX)) {
      return true;
    }
  }

  return a === b;
}

function mergeArmSelectors(selectors: readonly string[]): string {
  const arms = new Set<string>();
  for (const selector of selectors) {
    for (const arm of selector.slice(ARM_PREFIX.length).split("^")) {
      arms.add(arm);
    }
  }
  return ARM_PREFIX + [...arms].sort().join("^");
}

const NAME_RE = new RegExp(`^(.*)([${Arm.options.join("")}])$`, "s");

/**
 * Merge block names of the form `${prefix}${arm}` sharing one prefix:
 * ["flat_r", "flat_b"] → "flat_br".
 *
 * @throws MergeError if a name does not end in an arm or the prefixes differ
 */
export function mergeBlockNames(names: readonly string[]): string {
  if (names.length === 0) {
    throw new MergeError("No names to merge.");
  }

  const split = names.map((name) => {
    const match = NAME_RE.exec(name);
    if (!match) {
      throw new MergeError(`Block name does not end with an arm: '${name}'`);
    }
    return { prefix: match[1], arm: match[2] };
  });

  const prefix = split[0].prefix;
  if (!split.every((name) => name.prefix === prefix)) {
    throw new MergeError(`Block names are not mergeable: ${names.join(", ")}`);
  }

  return prefix + split.map((name) => name.arm).sort().join("");
}

function mergeMappings(mappings: readonly YamlMapping[]): YamlMapping {
  const first = mappings[0];
  if (!mappings.every((mapping) => sameKeys(first, mapping))) {
    throw new MergeError("Blocks are not mergeable: their keys differ.");
  }

  const merged: YamlMapping = {};
  for (const key of Object.keys(first)) {
    if (key === NAME_KEY) {
      const names = mappings.map((mapping) => mapping[key]);
      if (!names.every((name): name is string => typeof name === "string")) {
        throw new MergeError("Block names must be strings.");
      }
      merged[key] = mergeBlockNames(names);
    } else {
      merged[key] = mergeNodes(mappings.map((mapping) => mapping[key]));
    }
  }
  return merged;
}

/**
 * Merge (parts of) blocks that are mergeable with each other.
 *
 * @throws MergeError if the nodes differ other than in "arm=..." strings
 */
export function mergeNodes(nodes: readonly YamlNode[]): YamlNode {
  if (nodes.length === 0) {
    throw new MergeError("No objects to merge.");
  }
  const first = nodes[0];

  if (Array.isArray(first)) {
    const arrays = nodes.filter((node): node is YamlNode[] => Array.isArray(node));
    if (arrays.length !== nodes.length || !arrays.every((a) => a.length === first.length)) {
      throw new MergeError("Blocks are not mergeable: sequences differ in shape.");
    }
    return first.map((_, i) => mergeNodes(arrays.map((array) => array[i])));
  }

  if (isYamlMapping(first)) {
    const mappings = nodes.filter(isYamlMapping);
    if (mappings.length !== nodes.length) {
      throw new MergeError("Blocks are not mergeable: mappings differ in shape.");
    }
    return mergeMappings(mappings);
  }

  if (typeof first === "string") {
    const strings = nodes.filter((node): node is string => typeof node === "string");
    if (strings.length === nodes.length && strings.every((s) => s.startsWith(ARM_PREFIX))) {
      return mergeArmSelectors(strings);
    }
  }

  if (!nodes.every((node) => node === first)) {
    throw new MergeError(
      `Blocks are not mergeable: ${JSON.stringify(first)} differs from another block.`
    );
  }
  return first;
}

/**
 * Find mergeable blocks and merge them. Blocks that merge with nothing are
 * returned unchanged. Output order follows the first block of each group.
 *
 * @throws MergeError if a group's names cannot be merged
 */
export function mergeCalibBlocks(blocks: readonly NamedBlock[]): NamedBlock[] {
  let remaining = [...blocks];
  const merged: NamedBlock[] = [];

  while (remaining.length > 0) {
    const [anchor, ...rest] = remaining;
    const group: NamedBlock[] = [anchor];
    const others: NamedBlock[] = [];
    for (const block of rest) {
      (isMergeable(anchor, block) ? group : others).push(block);
    }
    remaining = others;

    if (group.length === 1) {
      merged.push(anchor);
      continue;
    }

    const result = mergeMappings(group);
    const name = result[NAME_KEY];
    if (typeof name !== "string") {
      throw new MergeError("Merged block has no name.");
    }
    merged.push({ ...result, name });
  }

  return merged;
}

/**
 * Add serial numbers to block names: blocks sharing a name become
 * "x_1", "x_2", ...; a block with a unique name still becomes "y_1".
 * The result is sorted by original name (stable within a name).
 */
export function addSerialNumbersToNames(blocks: readonly NamedBlock[]): NamedBlock[] {
  const sorted = [...blocks].sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0
  );
  const counters = new Map<string, number>();

  return sorted.map((block) => {
    const serial = (counters.get(block.name) ?? 0) + 1;
    counters.set(block.name, serial);
    return { ...block, name: `${block.name}_${serial}` };
  });
}

/**
 * Copy of `mapping` with a "name" field placed first.
 */
export function nameYamlMapping(name: string, mapping: YamlMapping): NamedBlock {
  const named: NamedBlock = { name };
  for (const [key, value] of Object.entries(mapping)) {
    if (key !== NAME_KEY) {
      named[key] = value;
    }
  }
  return named;
}
