// Wire format for filtered records:
//   [id, [group...], [groupHash...]]
//   group = [index, [component...], [nonce...], tree]
//   tree  = [0, hash] included | [1, hash] leaf | [2, left, right] node

import { decode as rlpDecode, encode as rlpEncode } from "rlp";
import { array, check, instance, parse, pipe, strictTuple, unknown } from "valibot";
import { MalformedRecordError } from "../core/errors";
import { FilteredRecord, type FilteredRecordParts } from "../core/filtered";
import { fromHex, HASH_LENGTH, toHex } from "../core/hash";
import type { PartialTree } from "../core/partialMerkle";
import type { RecordOptions } from "../core/traversable";
import type { FilteredComponentGroup } from "../core/types";
import { bnToBytes, bytesToIndex } from "./rlp";

/** Deeper trees would cover more leaves than any group can hold. */
export const MAX_TREE_DEPTH = 32;

const TAG_INCLUDED = 0;
const TAG_LEAF = 1;
const TAG_NODE = 2;

type Nested = Uint8Array | Nested[];

const bytes = instance(Uint8Array);
const hash32 = pipe(
  instance(Uint8Array),
  check((b: Uint8Array) => b.length === HASH_LENGTH, "expected a 32-byte hash"),
);
const groupShape = strictTuple([bytes, array(bytes), array(hash32), unknown()]);
const recordShape = strictTuple([hash32, array(unknown()), array(hash32)]);

const encodeTree = (node: PartialTree): Nested => {
  switch (node.kind) {
    case "included":
      return [bnToBytes(BigInt(TAG_INCLUDED)), fromHex(node.hash)];
    case "leaf":
      return [bnToBytes(BigInt(TAG_LEAF)), fromHex(node.hash)];
    case "node":
      return [bnToBytes(BigInt(TAG_NODE)), encodeTree(node.left), encodeTree(node.right)];
  }
};

const decodeTree = (value: unknown, depth: number): PartialTree => {
  if (depth > MAX_TREE_DEPTH) {
    throw new Error(`partial Merkle tree deeper than ${MAX_TREE_DEPTH}`);
  }
  const [tagBytes, ...rest] = parse(array(unknown()), value);
  const tag = bytesToIndex(parse(bytes, tagBytes));
  if (tag === TAG_NODE) {
    if (rest.length !== 2) throw new Error("tree node must have two children");
    const [left, right] = rest;
    return { kind: "node", left: decodeTree(left, depth + 1), right: decodeTree(right, depth + 1) };
  }
  if (rest.length !== 1) throw new Error("tree leaf must carry exactly one hash");
  const hash = toHex(parse(hash32, rest[0]));
  if (tag === TAG_INCLUDED) return { kind: "included", hash };
  if (tag === TAG_LEAF) return { kind: "leaf", hash };
  throw new Error(`unknown tree tag ${tag}`);
};

const encodeGroup = (group: FilteredComponentGroup): Nested => [
  bnToBytes(BigInt(group.groupIndex)),
  [...group.components],
  group.nonces.map(fromHex),
  encodeTree(group.partialMerkleTree.root),
];

const decodeGroup = (value: unknown): FilteredComponentGroup => {
  const [index, components, nonces, tree] = parse(groupShape, value);
  return {
    groupIndex: bytesToIndex(index),
    components,
    nonces: nonces.map(toHex),
    partialMerkleTree: { root: decodeTree(tree, 0) },
  };
};

export const encodeFilteredRecord = (record: FilteredRecord): Uint8Array =>
  rlpEncode([
    fromHex(record.id),
    record.filteredComponentGroups.map(encodeGroup),
    record.groupHashes.map(fromHex),
  ]);

/**
 * Parses a filtered record. Only the encoding is checked here; the
 * result still has to pass `verify`.
 */
export const decodeFilteredRecord = (
  encoded: Uint8Array,
  options: RecordOptions = {},
): FilteredRecord => FilteredRecord.fromParts(decodeParts(encoded), options);

const decodeParts = (encoded: Uint8Array): FilteredRecordParts => {
  try {
    const [id, groups, groupHashes] = parse(recordShape, rlpDecode(encoded));
    return {
      id: toHex(id),
      filteredComponentGroups: groups.map(decodeGroup),
      groupHashes: groupHashes.map(toHex),
    };
  } catch (e) {
    throw new MalformedRecordError("Malformed filtered record encoding", {}, e);
  }
};
