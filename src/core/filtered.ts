import {
  ComponentVisibilityError,
  fail,
  FilteredRecordVerificationError,
  MalformedRecordError,
  OK,
  type CheckResult,
} from "./errors";
import { filterComponentGroups } from "./filter";
import { ALL_ONES_HASH, componentHash, isSecureHash, type SecureHash } from "./hash";
import { merkleRoot } from "./merkle";
import { rootAndUsedHashes, verifyPartialMerkleTree } from "./partialMerkle";
import { TraversableRecord, type RecordOptions } from "./traversable";
import {
  GroupIndex,
  groupName,
  type ComponentPredicate,
  type FilteredComponentGroup,
  type PublicKey,
  type RecordComponent,
} from "./types";
import type { WireRecord } from "./wire";

export interface FilteredRecordParts {
  id: SecureHash;
  filteredComponentGroups: readonly FilteredComponentGroup[];
  groupHashes: readonly SecureHash[];
}

const hashesOf = (group: FilteredComponentGroup): SecureHash[] =>
  group.components.map((component, i) => {
    const nonce = group.nonces[i];
    if (nonce === undefined) throw new RangeError(`No nonce at index ${i}`);
    return componentHash(nonce, component);
  });

// lower-case 32-byte hex only; equality checks compare strings
const checkHashes = ({ id, filteredComponentGroups, groupHashes }: FilteredRecordParts) => {
  if (!isSecureHash(id)) throw new MalformedRecordError(`Invalid record id ${id}`);
  groupHashes.forEach((hash, groupIndex) => {
    if (!isSecureHash(hash)) {
      throw new MalformedRecordError(`Invalid hash for component group ${groupIndex}`, { groupIndex });
    }
  });
  for (const { groupIndex, nonces } of filteredComponentGroups) {
    nonces.forEach((nonce, componentIndex) => {
      if (!isSecureHash(nonce)) {
        throw new MalformedRecordError(`Invalid nonce in component group ${groupIndex}`, {
          groupIndex,
          componentIndex,
        });
      }
    });
  }
};

/**
 * Torn-off view of a record: only some components are present, each with
 * its nonce and a partial Merkle tree per group, plus the full record's id
 * and group roots. Nothing here is trusted until `verify` succeeds.
 */
export class FilteredRecord extends TraversableRecord {
  readonly filteredComponentGroups: readonly FilteredComponentGroup[];
  readonly groupHashes: readonly SecureHash[];
  private readonly recordId: SecureHash;

  private constructor(parts: FilteredRecordParts, options: RecordOptions) {
    super(parts.filteredComponentGroups, options);
    checkHashes(parts);
    this.recordId = parts.id;
    this.filteredComponentGroups = parts.filteredComponentGroups;
    this.groupHashes = parts.groupHashes;
  }

  static build(
    wire: WireRecord,
    predicate: ComponentPredicate,
    options: RecordOptions = wire.recordOptions,
  ): FilteredRecord {
    const groups = filterComponentGroups(wire, predicate);
    const record = new FilteredRecord(
      { id: wire.id, filteredComponentGroups: groups, groupHashes: wire.groupHashes },
      options,
    );
    record.log.debug(
      { id: record.id, groups: groups.map((g) => [g.groupIndex, g.components.length]) },
      "built filtered record",
    );
    return record;
  }

  /** Rebuilds a filtered record received from elsewhere; call `verify` before trusting it. */
  static fromParts(parts: FilteredRecordParts, options: RecordOptions = {}): FilteredRecord {
    return new FilteredRecord(parts, options);
  }

  get id(): SecureHash {
    return this.recordId;
  }

  /**
   * Checks that every revealed component belongs to the record with this
   * id. A record with no groups at all proves only the id itself.
   */
  verify(): CheckResult<FilteredRecordVerificationError> {
    const result = this.structuralCheck();
    if (result.ok) {
      this.log.debug({ id: this.id, groups: this.filteredComponentGroups.length }, "verified");
    } else {
      this.log.warn({ id: this.id, reason: result.error.reason }, "verification failed");
    }
    return result;
  }

  /**
   * Checks that group `groupIndex` was revealed in full. An absent group
   * passes only when the full record had no such group either.
   */
  checkAllComponentsVisible(groupIndex: number): CheckResult<ComponentVisibilityError> {
    const result = this.visibilityCheck(groupIndex);
    if (!result.ok) {
      this.log.warn(
        { id: this.id, group: groupName(groupIndex), reason: result.error.reason },
        "component visibility check failed",
      );
    }
    return result;
  }

  /**
   * Checks that every command `publicKey` is required to sign is revealed.
   * Needs the signers group in full.
   */
  checkCommandVisibility(publicKey: PublicKey): CheckResult<ComponentVisibilityError> {
    const signersVisible = this.checkAllComponentsVisible(GroupIndex.Signers);
    if (!signersVisible.ok) return signersVisible;

    const expected = this.signersList.toArray().filter((keys) => keys.includes(publicKey)).length;
    const received = this.commands.toArray().filter((c) => c.signers.includes(publicKey)).length;
    if (expected !== received) {
      const error = new ComponentVisibilityError(
        this.id,
        `${expected} commands were expected, but received ${received}`,
      );
      this.log.warn({ id: this.id, publicKey, expected, received }, "command visibility check failed");
      return fail(error);
    }
    this.log.debug({ id: this.id, publicKey, commands: received }, "command visibility ok");
    return OK;
  }

  /** False when nothing is revealed, otherwise whether `fn` accepts every revealed component. */
  checkWithFun(fn: (component: RecordComponent) => boolean): boolean {
    const revealed = this.availableComponents;
    return revealed.length > 0 && revealed.every(fn);
  }

  private structuralCheck(): CheckResult<FilteredRecordVerificationError> {
    const reject = (reason: string) => fail(new FilteredRecordVerificationError(this.id, reason));

    if (this.groupHashes.length === 0) {
      return reject("At least one component group hash is required");
    }
    if (merkleRoot(this.groupHashes) !== this.id) {
      return reject("Top level Merkle tree cannot be verified against record's id");
    }
    for (const group of this.filteredComponentGroups) {
      const { groupIndex } = group;
      const groupHash = this.groupHashes[groupIndex];
      if (groupHash === undefined) {
        return reject(`There is no matching component group hash for group ${groupIndex}`);
      }
      if (rootAndUsedHashes(group.partialMerkleTree.root, []) !== groupHash) {
        return reject(
          `Partial Merkle tree root and advertised full Merkle tree root for component group ${groupIndex} do not match`,
        );
      }
      if (!verifyPartialMerkleTree(group.partialMerkleTree, groupHash, hashesOf(group))) {
        return reject(
          `Visible components in group ${groupIndex} cannot be verified against their partial Merkle tree`,
        );
      }
    }
    return OK;
  }

  private visibilityCheck(groupIndex: number): CheckResult<ComponentVisibilityError> {
    const reject = (reason: string) => fail(new ComponentVisibilityError(this.id, reason));
    if (!Number.isInteger(groupIndex) || groupIndex < 0) {
      return reject(`Invalid component group index ${groupIndex}`);
    }
    const group = this.filteredComponentGroups.find((g) => g.groupIndex === groupIndex);

    if (group === undefined) {
      const groupHash = this.groupHashes[groupIndex];
      if (groupHash === undefined || groupHash === ALL_ONES_HASH) return OK;
      return reject(
        `Did not receive components for group ${groupIndex} and cannot verify they didn't exist in the original wire record`,
      );
    }

    const groupHash = this.groupHashes[groupIndex];
    if (groupHash === undefined) {
      return reject(`There is no matching component group hash for group ${groupIndex}`);
    }
    const hashes = hashesOf(group);
    if (hashes.length === 0 || merkleRoot(hashes) !== groupHash) {
      return reject(`Some components for group ${groupIndex} are not visible`);
    }
    if (this.groupHashes.length === 0 || merkleRoot(this.groupHashes) !== this.id) {
      return reject("Record is malformed. Top level Merkle tree cannot be verified against record's id");
    }
    return OK;
  }
}
