import { randomBytes } from "@noble/hashes/utils";
import type { ComponentCodecs } from "../codec/rlp";
import { rlpCodecs } from "../codec/rlp";
import { MalformedRecordError } from "./errors";
import { FilteredRecord } from "./filtered";
import {
  ALL_ONES_HASH,
  componentHash,
  computeNonce,
  HASH_LENGTH,
  type SecureHash,
} from "./hash";
import { buildMerkleTree, type MerkleTree } from "./merkle";
import { TraversableRecord, type RecordOptions } from "./traversable";
import {
  GroupIndex,
  KNOWN_GROUP_COUNT,
  type Command,
  type ComponentGroup,
  type ComponentPredicate,
  type Party,
  type RecordComponent,
  type StateRef,
  type TimeWindow,
  type TransactionState,
} from "./types";

export const randomPrivacySalt = (): Uint8Array => randomBytes(HASH_LENGTH);

const checkPrivacySalt = (salt: Uint8Array) => {
  if (salt.length !== HASH_LENGTH) {
    throw new MalformedRecordError(`Privacy salt must be ${HASH_LENGTH} bytes, got ${salt.length}`);
  }
  if (salt.every((b) => b === 0)) {
    throw new MalformedRecordError("Privacy salt must not be all zeros");
  }
};

/**
 * Complete record. Its id is the root of a Merkle tree whose leaves are the
 * roots of each component group's tree, with `ALL_ONES_HASH` standing in
 * for absent groups.
 */
export class WireRecord extends TraversableRecord {
  readonly privacySalt: Uint8Array;
  readonly recordOptions: RecordOptions;
  private nonces?: ReadonlyMap<number, readonly SecureHash[]>;
  private hashes?: ReadonlyMap<number, readonly SecureHash[]>;
  private readonly groupTrees = new Map<number, MerkleTree>();
  private topLevel?: MerkleTree;
  private groupRoots?: readonly SecureHash[];

  constructor(
    componentGroups: readonly ComponentGroup[],
    privacySalt: Uint8Array,
    options: RecordOptions = {},
  ) {
    super(componentGroups, options);
    checkPrivacySalt(privacySalt);
    this.privacySalt = Uint8Array.from(privacySalt);
    this.recordOptions = options;
  }

  get availableComponentNonces(): ReadonlyMap<number, readonly SecureHash[]> {
    return (this.nonces ??= new Map(
      this.componentGroups.map((g) => [
        g.groupIndex,
        g.components.map((_, i) => computeNonce(this.privacySalt, g.groupIndex, i)),
      ]),
    ));
  }

  get availableComponentHashes(): ReadonlyMap<number, readonly SecureHash[]> {
    return (this.hashes ??= new Map(
      this.componentGroups.map((g) => {
        const nonces = this.groupNonces(g.groupIndex);
        return [g.groupIndex, g.components.map((c, i) => componentHash(this.at(nonces, i), c))];
      }),
    ));
  }

  /** Leaf hashes of a present group, in component order. */
  groupComponentHashes(groupIndex: number): readonly SecureHash[] {
    const hashes = this.availableComponentHashes.get(groupIndex);
    if (hashes === undefined) {
      throw new MalformedRecordError(`No component group ${groupIndex} in record`, { groupIndex });
    }
    return hashes;
  }

  groupNonces(groupIndex: number): readonly SecureHash[] {
    const nonces = this.availableComponentNonces.get(groupIndex);
    if (nonces === undefined) {
      throw new MalformedRecordError(`No component group ${groupIndex} in record`, { groupIndex });
    }
    return nonces;
  }

  /** Full Merkle tree over a non-empty group's component hashes. */
  groupMerkleTree(groupIndex: number): MerkleTree {
    let tree = this.groupTrees.get(groupIndex);
    if (tree === undefined) {
      tree = buildMerkleTree(this.groupComponentHashes(groupIndex));
      this.groupTrees.set(groupIndex, tree);
    }
    return tree;
  }

  /**
   * Root of every group up to the highest present discriminant (and at
   * least every known one), `ALL_ONES_HASH` where the group is absent or empty.
   */
  get groupHashes(): readonly SecureHash[] {
    if (this.groupRoots === undefined) {
      const highest = Math.max(KNOWN_GROUP_COUNT - 1, ...this.componentGroups.map((g) => g.groupIndex));
      const roots: SecureHash[] = [];
      for (let i = 0; i <= highest; i++) {
        roots.push(this.componentCount(i) > 0 ? this.groupMerkleTree(i).hash : ALL_ONES_HASH);
      }
      this.groupRoots = roots;
    }
    return this.groupRoots;
  }

  get merkleTree(): MerkleTree {
    return (this.topLevel ??= buildMerkleTree(this.groupHashes));
  }

  get id(): SecureHash {
    return this.merkleTree.hash;
  }

  /** Serialized bytes of one component. */
  serializedComponent(groupIndex: number, internalIndex: number): Uint8Array {
    const component = this.group(groupIndex)?.components[internalIndex];
    if (component === undefined) {
      throw new MalformedRecordError(
        `No component at index ${internalIndex} of group ${groupIndex}`,
        { groupIndex, componentIndex: internalIndex },
      );
    }
    return component;
  }

  /** Every typed component a filter predicate is offered, in traversal order. */
  *filterableComponents(): Generator<RecordComponent> {
    yield* this.knownComponents();
    yield* this.unknownComponents();
  }

  /** Tears off the components accepted by `predicate`. */
  buildFilteredRecord(predicate: ComponentPredicate): FilteredRecord {
    return FilteredRecord.build(this, predicate);
  }

  private at(nonces: readonly SecureHash[], i: number): SecureHash {
    const nonce = nonces[i];
    if (nonce === undefined) throw new MalformedRecordError(`Missing nonce at index ${i}`);
    return nonce;
  }
}

/* ── construction from typed parts ───────────────────────── */
export interface WireRecordParts {
  inputs?: readonly StateRef[];
  outputs?: readonly TransactionState[];
  commands?: readonly Command[];
  attachments?: readonly SecureHash[];
  notary?: Party;
  timeWindow?: TimeWindow;
  references?: readonly StateRef[];
  /** Opaque groups with discriminants beyond the known ones. */
  unknownGroups?: readonly ComponentGroup[];
}

export const createComponentGroups = (
  parts: WireRecordParts,
  codecs: ComponentCodecs = rlpCodecs,
): ComponentGroup[] => {
  const groups: ComponentGroup[] = [];
  const add = (groupIndex: number, components: Uint8Array[]) => {
    if (components.length > 0) groups.push({ groupIndex, components });
  };
  const commands = parts.commands ?? [];

  add(GroupIndex.Inputs, (parts.inputs ?? []).map((r) => codecs.stateRef.encode(r)));
  add(GroupIndex.Outputs, (parts.outputs ?? []).map((s) => codecs.transactionState.encode(s)));
  add(GroupIndex.Commands, commands.map((c) => codecs.commandData.encode(c.data)));
  add(GroupIndex.Attachments, (parts.attachments ?? []).map((h) => codecs.secureHash.encode(h)));
  add(GroupIndex.Notary, parts.notary ? [codecs.party.encode(parts.notary)] : []);
  add(GroupIndex.TimeWindow, parts.timeWindow ? [codecs.timeWindow.encode(parts.timeWindow)] : []);
  add(GroupIndex.Signers, commands.map((c) => codecs.signers.encode(c.signers)));
  add(GroupIndex.References, (parts.references ?? []).map((r) => codecs.stateRef.encode(r)));

  for (const group of parts.unknownGroups ?? []) {
    if (group.groupIndex < KNOWN_GROUP_COUNT) {
      throw new MalformedRecordError(
        `Group ${group.groupIndex} is a known group and cannot be supplied as opaque bytes`,
        { groupIndex: group.groupIndex },
      );
    }
    add(group.groupIndex, [...group.components]);
  }
  return groups;
};

export const createWireRecord = (
  parts: WireRecordParts,
  privacySalt: Uint8Array = randomPrivacySalt(),
  options: RecordOptions = {},
): WireRecord =>
  new WireRecord(createComponentGroups(parts, options.codecs), privacySalt, options);
