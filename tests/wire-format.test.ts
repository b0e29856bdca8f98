import { describe, it, expect } from "vitest";
import { encode } from "rlp";
import { decodeFilteredRecord, encodeFilteredRecord, MAX_TREE_DEPTH } from "../src/codec/filtered";
import { MalformedRecordError } from "../src/core/errors";
import { fromHex } from "../src/core/hash";
import { GroupIndex } from "../src/core/types";
import { ALICE, BOB, command, reasonOf, sampleWire, testHash } from "./helpers/record";

const wire = sampleWire();

describe("filtered record wire format", () => {
  it("decodes to a record that verifies like the original", () => {
    const filtered = wire.buildFilteredRecord((c) => c.kind === "command" || c.kind === "timeWindow");
    const decoded = decodeFilteredRecord(encodeFilteredRecord(filtered));

    expect(decoded.id).toBe(wire.id);
    expect(decoded.groupHashes).toEqual(filtered.groupHashes);
    expect(decoded.filteredComponentGroups).toEqual(filtered.filteredComponentGroups);
    expect(decoded.verify()).toEqual({ ok: true });
    expect(decoded.commands.toArray()).toEqual([command("move", ALICE), command("issue", ALICE, BOB)]);
    expect(decoded.timeWindow).toEqual({ fromTime: 1000n, untilTime: 2000n });
  });

  it("carries blind records", () => {
    const blind = decodeFilteredRecord(encodeFilteredRecord(wire.buildFilteredRecord(() => false)));
    expect(blind.filteredComponentGroups).toEqual([]);
    expect(blind.verify()).toEqual({ ok: true });
  });

  it("keeps a partial group partial", () => {
    const filtered = wire.buildFilteredRecord((c) => c.kind === "input" && c.index === 1);
    const decoded = decodeFilteredRecord(encodeFilteredRecord(filtered));
    expect(reasonOf(decoded.checkAllComponentsVisible(GroupIndex.Inputs))).toBe(
      "Some components for group 0 are not visible",
    );
  });

  it("rejects bytes that are not a filtered record", () => {
    expect(() => decodeFilteredRecord(Uint8Array.from([0x01, 0x02]))).toThrow(MalformedRecordError);
    expect(() => decodeFilteredRecord(encode([fromHex(testHash(1)), [], []]).subarray(1))).toThrow(
      "Malformed filtered record encoding",
    );
  });

  it("rejects hashes of the wrong length", () => {
    const bad = encode([new Uint8Array(31), [], [fromHex(testHash(2))]]);
    expect(() => decodeFilteredRecord(bad)).toThrow(MalformedRecordError);
  });

  it("rejects unknown tree tags", () => {
    const group = [new Uint8Array(0), [Uint8Array.from([1])], [fromHex(testHash(3))], [Uint8Array.from([7]), fromHex(testHash(4))]];
    const bad = encode([fromHex(testHash(1)), [group], [fromHex(testHash(2))]]);
    expect(() => decodeFilteredRecord(bad)).toThrow(MalformedRecordError);
  });

  it("bounds the tree depth", () => {
    type Tree = Uint8Array | Tree[];
    let tree: Tree = [new Uint8Array(0), fromHex(testHash(5))];
    for (let i = 0; i <= MAX_TREE_DEPTH; i++) {
      tree = [Uint8Array.from([2]), tree, [Uint8Array.from([1]), fromHex(testHash(6))]];
    }
    const group = [new Uint8Array(0), [Uint8Array.from([1])], [fromHex(testHash(3))], tree];
    const bad = encode([fromHex(testHash(1)), [group], [fromHex(testHash(2))]]);
    let caught: unknown;
    try {
      decodeFilteredRecord(bad);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(MalformedRecordError);
    expect(caught).toMatchObject({ cause: { message: `partial Merkle tree deeper than ${MAX_TREE_DEPTH}` } });
  });
});
