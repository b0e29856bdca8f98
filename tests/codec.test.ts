import { describe, it, expect } from "vitest";
import { encode } from "rlp";
import { createRlpCodecs, DEFAULT_CONTEXT, rlpCodecs } from "../src/codec/rlp";
import { MissingAttachmentsError } from "../src/core/errors";
import { ALICE, BOB, cash, NOTARY, ref, testHash } from "./helpers/record";

describe("rlp component codecs", () => {
  it("decodes what it encodes for each component kind", () => {
    const state = { ...cash(25), encumbrance: 1 };
    expect(rlpCodecs.stateRef.decode(rlpCodecs.stateRef.encode(ref(4, 300)), DEFAULT_CONTEXT)).toEqual(
      ref(4, 300),
    );
    expect(
      rlpCodecs.transactionState.decode(rlpCodecs.transactionState.encode(state), DEFAULT_CONTEXT),
    ).toEqual(state);
    expect(rlpCodecs.party.decode(rlpCodecs.party.encode(NOTARY), DEFAULT_CONTEXT)).toEqual(NOTARY);
    expect(rlpCodecs.signers.decode(rlpCodecs.signers.encode([ALICE, BOB]), DEFAULT_CONTEXT)).toEqual([
      ALICE,
      BOB,
    ]);
    expect(
      rlpCodecs.secureHash.decode(rlpCodecs.secureHash.encode(testHash(8)), DEFAULT_CONTEXT),
    ).toBe(testHash(8));
  });

  it("keeps open-ended time windows open", () => {
    const until = { untilTime: 1_700_000_000_000n };
    expect(rlpCodecs.timeWindow.decode(rlpCodecs.timeWindow.encode(until), DEFAULT_CONTEXT)).toEqual(
      until,
    );
  });

  it("leaves encumbrance out when absent", () => {
    const decoded = rlpCodecs.transactionState.decode(
      rlpCodecs.transactionState.encode(cash(1)),
      DEFAULT_CONTEXT,
    );
    expect("encumbrance" in decoded).toBe(false);
  });

  it("rejects a state ref whose hash is not 32 bytes", () => {
    const bad = encode([new Uint8Array(31), new Uint8Array([1])]);
    expect(() => rlpCodecs.stateRef.decode(bad, DEFAULT_CONTEXT)).toThrow();
  });

  it("rejects non-canonical integers", () => {
    const bad = encode([new Uint8Array(32), Uint8Array.from([0, 1])]);
    expect(() => rlpCodecs.stateRef.decode(bad, DEFAULT_CONTEXT)).toThrow(
      "non-canonical integer encoding",
    );
  });

  it("rejects a command with no signers", () => {
    expect(() => rlpCodecs.signers.decode(encode([]), DEFAULT_CONTEXT)).toThrow(
      "a command needs at least one signer",
    );
  });

  it("rejects time windows without bounds or with bounds out of order", () => {
    expect(() => rlpCodecs.timeWindow.decode(encode([[], []]), DEFAULT_CONTEXT)).toThrow(
      "time window must have at least one bound",
    );
    const reversed = rlpCodecs.timeWindow.encode({ fromTime: 5n, untilTime: 5n });
    expect(() => rlpCodecs.timeWindow.decode(reversed, DEFAULT_CONTEXT)).toThrow(
      "time window start must be before its end",
    );
  });

  describe("attachment context", () => {
    const codecs = createRlpCodecs({ contractAttachments: new Map([["cash", testHash(40)]]) });
    const bytes = codecs.transactionState.encode(cash(5));

    it("decodes when the required attachment is present", () => {
      expect(codecs.transactionState.decode(bytes, { attachments: [testHash(40)] })).toEqual(cash(5));
    });

    it("raises MissingAttachmentsError when it is not", () => {
      expect(() => codecs.transactionState.decode(bytes, { attachments: [testHash(41)] })).toThrow(
        MissingAttachmentsError,
      );
    });

    it("skips the check without an attachment context", () => {
      expect(codecs.transactionState.decode(bytes, DEFAULT_CONTEXT)).toEqual(cash(5));
    });
  });
});
