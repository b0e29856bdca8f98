import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, concatBytes, hexToBytes } from "@noble/hashes/utils";

export type Hex = `0x${string}`;
export type SecureHash = Hex;

export const HASH_LENGTH = 32;

/* ── hex helpers ─────────────────────────────────────────── */
export const toHex = (bytes: Uint8Array): Hex => `0x${bytesToHex(bytes)}`;

export const fromHex = (hex: Hex): Uint8Array => hexToBytes(hex.slice(2));

export const isSecureHash = (value: string): value is SecureHash =>
  /^0x[0-9a-f]{64}$/.test(value);

/* ── sentinels ───────────────────────────────────────────── */
/** Padding leaf for Merkle trees whose leaf count is not a power of two. */
export const ZERO_HASH: SecureHash = toHex(new Uint8Array(HASH_LENGTH));

/** Group root recorded for a component group that is absent or empty. */
export const ALL_ONES_HASH: SecureHash = toHex(
  new Uint8Array(HASH_LENGTH).fill(0xff),
);

/* ── primitives ──────────────────────────────────────────── */
export const sha256Twice = (data: Uint8Array): Uint8Array =>
  sha256(sha256(data));

export const hashConcat = (left: SecureHash, right: SecureHash): SecureHash =>
  toHex(sha256(concatBytes(fromHex(left), fromHex(right))));

/**
 * Commitment to a single serialized component. The nonce is unique per
 * (record, group, position), so equal components in different slots hash
 * differently and low-entropy values cannot be guessed from their hash.
 */
export const componentHash = (
  nonce: SecureHash,
  component: Uint8Array,
): SecureHash => toHex(sha256Twice(concatBytes(fromHex(nonce), component)));

export const computeNonce = (
  privacySalt: Uint8Array,
  groupIndex: number,
  internalIndex: number,
): SecureHash => {
  const position = new Uint8Array(8);
  const view = new DataView(position.buffer);
  view.setInt32(0, groupIndex);
  view.setInt32(4, internalIndex);
  return toHex(sha256Twice(concatBytes(privacySalt, position)));
};
