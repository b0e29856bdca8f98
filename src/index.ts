export * from "./core/hash";
export * from "./core/errors";
export * from "./core/types";
export { buildMerkleTree, merkleRoot, type MerkleNode, type MerkleTree } from "./core/merkle";
export {
  buildPartialMerkleTree,
  leafIndex,
  rootAndUsedHashes,
  verifyPartialMerkleTree,
  type PartialMerkleTree,
  type PartialTree,
} from "./core/partialMerkle";
export type { ComponentList } from "./core/lazy";
export { TraversableRecord, type RecordOptions } from "./core/traversable";
export {
  createComponentGroups,
  createWireRecord,
  randomPrivacySalt,
  WireRecord,
  type WireRecordParts,
} from "./core/wire";
export { filterComponentGroups } from "./core/filter";
export { FilteredRecord, type FilteredRecordParts } from "./core/filtered";
export {
  signAsOracle,
  verifyOracleSignature,
  type OracleRejection,
  type OracleResult,
  type OracleSignature,
} from "./core/oracle";
export {
  createRlpCodecs,
  rlpCodecs,
  type ComponentCodecs,
  type ComponentTypes,
  type DeserializationContext,
  type RlpCodecOptions,
  type ValueCodec,
} from "./codec/rlp";
export { decodeFilteredRecord, encodeFilteredRecord, MAX_TREE_DEPTH } from "./codec/filtered";
export { keyPair, randomPriv, pub, type KeyPair } from "./crypto/bls";
export { loadConfig, type LogLevel, type TearoffConfig } from "./config";
export { logger, makeLogger, type ILogger } from "./logging";
