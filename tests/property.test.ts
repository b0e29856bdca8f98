import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { toHex } from "../src/core/hash";
import type { FilteredRecord } from "../src/core/filtered";
import { GroupIndex, type ComponentPredicate } from "../src/core/types";
import { createWireRecord, type WireRecordParts } from "../src/core/wire";
import { ALICE, BOB, cash, command, NOTARY, ref } from "./helpers/record";

const saltArb = fc
  .uint8Array({ minLength: 32, maxLength: 32 })
  .filter((salt) => salt.some((b) => b !== 0));

const partsArb: fc.Arbitrary<WireRecordParts> = fc.record({
  inputs: fc.array(fc.tuple(fc.integer({ min: 1, max: 200 }), fc.nat(9)), { maxLength: 6 }).map((xs) =>
    xs.map(([n, i]) => ref(n, i)),
  ),
  outputs: fc.array(fc.nat(1_000), { maxLength: 6 }).map((xs) => xs.map(cash)),
  commands: fc
    .array(fc.constantFrom([ALICE], [BOB], [ALICE, BOB]), { maxLength: 5 })
    .map((xs) => xs.map((keys, i) => command(`c${i}`, ...keys))),
  notary: fc.option(fc.constant(NOTARY), { nil: undefined }),
  unknownGroups: fc.array(fc.uint8Array({ minLength: 1, maxLength: 8 }), { maxLength: 3 }).map((cs) =>
    cs.length === 0 ? [] : [{ groupIndex: 8, components: cs }],
  ),
});

// decides by traversal position, so the same mask picks the same components
const fromMask = (mask: readonly boolean[]): ComponentPredicate => {
  let position = 0;
  return () => mask[position++ % mask.length] ?? false;
};

const revealed = (record: FilteredRecord): Set<string> =>
  new Set(
    record.filteredComponentGroups.flatMap((g) =>
      g.components.map((c, i) => `${g.groupIndex}:${g.nonces[i]}:${toHex(c)}`),
    ),
  );

describe("filtered record properties", () => {
  it("every tear-off verifies", () => {
    fc.assert(
      fc.property(partsArb, saltArb, fc.array(fc.boolean(), { minLength: 1, maxLength: 40 }), (parts, salt, mask) => {
        const filtered = createWireRecord(parts, salt).buildFilteredRecord(fromMask(mask));
        expect(filtered.verify()).toEqual({ ok: true });
      }),
      { numRuns: 50 },
    );
  });

  it("a weaker predicate reveals a superset", () => {
    fc.assert(
      fc.property(
        partsArb,
        saltArb,
        fc.array(fc.tuple(fc.boolean(), fc.boolean()), { minLength: 1, maxLength: 40 }),
        (parts, salt, pairs) => {
          const wire = createWireRecord(parts, salt);
          const narrow = wire.buildFilteredRecord(fromMask(pairs.map(([a]) => a)));
          const wide = wire.buildFilteredRecord(fromMask(pairs.map(([a, b]) => a || b)));
          const wideSet = revealed(wide);
          for (const entry of revealed(narrow)) expect(wideSet.has(entry)).toBe(true);
          expect(narrow.verify()).toEqual({ ok: true });
          expect(wide.verify()).toEqual({ ok: true });
        },
      ),
      { numRuns: 50 },
    );
  });

  it("revealing any command reveals every signer", () => {
    fc.assert(
      fc.property(partsArb, saltArb, fc.nat(4), (parts, salt, pick) => {
        const wire = createWireRecord(parts, salt);
        const count = wire.commands.length;
        fc.pre(count > 0);
        const filtered = wire.buildFilteredRecord(
          (c) => c.kind === "command" && c.index === pick % count,
        );
        expect(filtered.checkAllComponentsVisible(GroupIndex.Signers)).toEqual({ ok: true });
        expect(filtered.commands.toArray()).toEqual([wire.commands.get(pick % count)]);
      }),
      { numRuns: 50 },
    );
  });

  it("revealing everything proves full visibility of every group", () => {
    fc.assert(
      fc.property(partsArb, saltArb, (parts, salt) => {
        const wire = createWireRecord(parts, salt);
        const filtered = wire.buildFilteredRecord(() => true);
        for (let g = 0; g < wire.groupHashes.length; g++) {
          expect(filtered.checkAllComponentsVisible(g)).toEqual({ ok: true });
        }
      }),
      { numRuns: 30 },
    );
  });
});
