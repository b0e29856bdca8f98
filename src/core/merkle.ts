import { MerkleTreeError } from "./errors";
import { hashConcat, ZERO_HASH, type SecureHash } from "./hash";

export type MerkleNode =
  | { readonly kind: "leaf"; readonly hash: SecureHash }
  | {
      readonly kind: "node";
      readonly hash: SecureHash;
      readonly left: MerkleNode;
      readonly right: MerkleNode;
    };

export interface MerkleTree {
  readonly root: MerkleNode;
  readonly hash: SecureHash;
  readonly leafCount: number;
}

const isPowerOfTwo = (n: number) => n > 0 && (n & (n - 1)) === 0;

/* ── padding: zero-hash leaves up to the next power of two ── */
const padWithZeros = (leaves: readonly SecureHash[]): SecureHash[] => {
  const padded = [...leaves];
  while (!isPowerOfTwo(padded.length)) padded.push(ZERO_HASH);
  return padded;
};

/**
 * Builds a binary Merkle tree over `leaves` in the given order. Internal
 * nodes are `SHA256(left ‖ right)`; a single leaf is its own root.
 */
export const buildMerkleTree = (leaves: readonly SecureHash[]): MerkleTree => {
  if (leaves.length === 0) {
    throw new MerkleTreeError("Cannot calculate Merkle root on empty hash list.");
  }
  let level: MerkleNode[] = padWithZeros(leaves).map((hash) => ({
    kind: "leaf",
    hash,
  }));
  while (level.length > 1) {
    const next: MerkleNode[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const left = level[i];
      const right = level[i + 1];
      if (left === undefined || right === undefined) {
        throw new MerkleTreeError("Unexpected missing node in tree level");
      }
      next.push({
        kind: "node",
        hash: hashConcat(left.hash, right.hash),
        left,
        right,
      });
    }
    level = next;
  }
  const [root] = level;
  if (root === undefined) throw new MerkleTreeError("Unexpected empty tree level");
  return { root, hash: root.hash, leafCount: leaves.length };
};

export const merkleRoot = (leaves: readonly SecureHash[]): SecureHash =>
  buildMerkleTree(leaves).hash;
