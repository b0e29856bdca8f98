import { MerkleTreeError } from "./errors";
import { hashConcat, type SecureHash } from "./hash";
import type { MerkleNode, MerkleTree } from "./merkle";

/**
 * Authentication structure over a full Merkle tree restricted to a subset
 * of its leaves. Revealed leaves are `included`; every subtree without an
 * included leaf is collapsed to a `leaf` carrying that subtree's hash.
 */
export type PartialTree =
  | { readonly kind: "included"; readonly hash: SecureHash }
  | { readonly kind: "leaf"; readonly hash: SecureHash }
  | {
      readonly kind: "node";
      readonly left: PartialTree;
      readonly right: PartialTree;
    };

export interface PartialMerkleTree {
  readonly root: PartialTree;
}

const prune = (
  node: MerkleNode,
  include: ReadonlySet<SecureHash>,
  used: SecureHash[],
): { found: boolean; tree: PartialTree } => {
  if (node.kind === "leaf") {
    if (include.has(node.hash)) {
      used.push(node.hash);
      return { found: true, tree: { kind: "included", hash: node.hash } };
    }
    return { found: false, tree: { kind: "leaf", hash: node.hash } };
  }
  const left = prune(node.left, include, used);
  const right = prune(node.right, include, used);
  if (left.found || right.found) {
    return {
      found: true,
      tree: { kind: "node", left: left.tree, right: right.tree },
    };
  }
  return { found: false, tree: { kind: "leaf", hash: node.hash } };
};

export const buildPartialMerkleTree = (
  tree: MerkleTree,
  includeHashes: readonly SecureHash[],
): PartialMerkleTree => {
  const used: SecureHash[] = [];
  const { tree: root } = prune(tree.root, new Set(includeHashes), used);
  if (used.length !== includeHashes.length) {
    throw new MerkleTreeError("Some of the provided hashes are not in the tree.");
  }
  return { root };
};

/** Recomputes the root, pushing every included leaf onto `used` (left to right). */
export const rootAndUsedHashes = (
  node: PartialTree,
  used: SecureHash[],
): SecureHash => {
  switch (node.kind) {
    case "included":
      used.push(node.hash);
      return node.hash;
    case "leaf":
      return node.hash;
    case "node": {
      const left = rootAndUsedHashes(node.left, used);
      const right = rootAndUsedHashes(node.right, used);
      return hashConcat(left, right);
    }
  }
};

const sameMultiset = (a: readonly SecureHash[], b: readonly SecureHash[]) => {
  if (a.length !== b.length) return false;
  const left = [...a].sort();
  const right = [...b].sort();
  return left.every((h, i) => h === right[i]);
};

/**
 * True when the tree hashes to `rootHash` and its included leaves are
 * exactly `hashesToCheck`.
 */
export const verifyPartialMerkleTree = (
  pmt: PartialMerkleTree,
  rootHash: SecureHash,
  hashesToCheck: readonly SecureHash[],
): boolean => {
  const used: SecureHash[] = [];
  const root = rootAndUsedHashes(pmt.root, used);
  return root === rootHash && sameMultiset(used, hashesToCheck);
};

// path from the root down to the leaf; true = right branch
const pathTo = (leaf: SecureHash, node: PartialTree): boolean[] | undefined => {
  if (node.kind === "included") return node.hash === leaf ? [] : undefined;
  if (node.kind === "leaf") return undefined;
  const left = pathTo(leaf, node.left);
  if (left) return [false, ...left];
  const right = pathTo(leaf, node.right);
  if (right) return [true, ...right];
  return undefined;
};

/** Position of an included leaf in the original (full) leaf ordering. */
export const leafIndex = (pmt: PartialMerkleTree, leaf: SecureHash): number => {
  const path = pathTo(leaf, pmt.root);
  if (path === undefined) {
    throw new MerkleTreeError(
      "The supplied leaf hash was not included in the partial Merkle tree.",
    );
  }
  return path.reduce((index, right) => index * 2 + (right ? 1 : 0), 0);
};
