import type { SecureHash } from "./hash";
import { buildPartialMerkleTree } from "./partialMerkle";
import {
  componentGroupIndex,
  GroupIndex,
  type ComponentPredicate,
  type FilteredComponentGroup,
} from "./types";
import type { WireRecord } from "./wire";

interface Accumulator {
  components: Uint8Array[];
  nonces: SecureHash[];
  hashes: SecureHash[];
}

/**
 * Tears off every component of `wire` that `predicate` accepts, keeping
 * original relative order inside each group. Revealing any command reveals
 * the whole signers group. Groups come out ascending by discriminant.
 */
export const filterComponentGroups = (
  wire: WireRecord,
  predicate: ComponentPredicate,
): FilteredComponentGroup[] => {
  const accumulators: Array<Accumulator | undefined> = [];
  const slot = (groupIndex: number): Accumulator =>
    (accumulators[groupIndex] ??= { components: [], nonces: [], hashes: [] });

  const take = (groupIndex: number, internalIndex: number) => {
    const acc = slot(groupIndex);
    acc.components.push(wire.serializedComponent(groupIndex, internalIndex));
    acc.nonces.push(pick(wire.groupNonces(groupIndex), internalIndex));
    acc.hashes.push(pick(wire.groupComponentHashes(groupIndex), internalIndex));
  };

  let signersTaken = false;
  for (const component of wire.filterableComponents()) {
    if (!predicate(component)) continue;
    const groupIndex = componentGroupIndex(component);
    take(groupIndex, component.index);

    if (component.kind === "command" && !signersTaken) {
      signersTaken = true;
      const acc = slot(GroupIndex.Signers);
      const count = wire.groupNonces(GroupIndex.Signers).length;
      for (let i = 0; i < count; i++) {
        acc.components.push(wire.serializedComponent(GroupIndex.Signers, i));
      }
      acc.nonces.push(...wire.groupNonces(GroupIndex.Signers));
      acc.hashes.push(...wire.groupComponentHashes(GroupIndex.Signers));
    }
  }

  const groups: FilteredComponentGroup[] = [];
  accumulators.forEach((acc, groupIndex) => {
    if (acc === undefined || acc.components.length === 0) return;
    groups.push({
      groupIndex,
      components: acc.components,
      nonces: acc.nonces,
      partialMerkleTree: buildPartialMerkleTree(wire.groupMerkleTree(groupIndex), acc.hashes),
    });
  });
  return groups;
};

const pick = (values: readonly SecureHash[], index: number): SecureHash => {
  const value = values[index];
  if (value === undefined) throw new RangeError(`No entry at index ${index}`);
  return value;
};
