import { vi } from "vitest";
import type {
  CheckResult,
  ComponentVisibilityError,
  FilteredRecordVerificationError,
} from "../../src/core/errors";
import { toHex, type SecureHash } from "../../src/core/hash";
import type {
  Command,
  Party,
  PublicKey,
  StateRef,
  TransactionState,
} from "../../src/core/types";
import { createWireRecord, type WireRecordParts } from "../../src/core/wire";
import type { RecordOptions } from "../../src/core/traversable";
import type { ILogger } from "../../src/logging";

export const SALT = new Uint8Array(32).fill(7);

/** Placeholder key bytes; only BLS tests need real curve points. */
export const testKey = (n: number): PublicKey => toHex(new Uint8Array(48).fill(n));

export const testHash = (n: number): SecureHash => toHex(new Uint8Array(32).fill(n));

export const party = (name: string, n: number): Party => ({ name, owningKey: testKey(n) });

export const NOTARY = party("Notary", 90);
export const ALICE = testKey(1);
export const BOB = testKey(2);

export const ref = (n: number, index = 0): StateRef => ({ txhash: testHash(n), index });

export const cash = (amount: number): TransactionState => ({
  contract: "cash",
  data: { amount },
  notary: NOTARY,
});

export const command = (type: string, ...signers: PublicKey[]): Command => ({
  data: { contract: "cash", type, value: null },
  signers,
});

export const sampleParts = (): WireRecordParts => ({
  inputs: [ref(1, 0), ref(2, 1)],
  outputs: [cash(10), cash(20), cash(30)],
  commands: [command("move", ALICE), command("issue", ALICE, BOB)],
  attachments: [testHash(40)],
  notary: NOTARY,
  timeWindow: { fromTime: 1000n, untilTime: 2000n },
  references: [ref(3, 2)],
});

export const sampleWire = (parts: WireRecordParts = sampleParts(), options: RecordOptions = {}) =>
  createWireRecord(parts, SALT, options);

export const spyLogger = () => {
  const log = {
    debug: vi.fn<[Record<string, unknown>, string?], void>(),
    info: vi.fn<[Record<string, unknown>, string?], void>(),
    warn: vi.fn<[Record<string, unknown>, string?], void>(),
    error: vi.fn<[Record<string, unknown>, string?], void>(),
  };
  const logger: ILogger = log;
  return { log, logger };
};

/** Reason carried by a failed check, undefined when it passed. */
export const reasonOf = (
  result: CheckResult<FilteredRecordVerificationError | ComponentVisibilityError>,
): string | undefined => (result.ok ? undefined : result.error.reason);
