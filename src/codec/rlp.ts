// RLP component codecs. Decoded shapes are checked with valibot before use.

import { decode as rlpDecode, encode as rlpEncode } from "rlp";
import {
  array,
  check,
  instance,
  maxLength,
  parse,
  pipe,
  strictTuple,
} from "valibot";
import { bytesToHex, hexToBytes, utf8ToBytes } from "@noble/hashes/utils";
import { MissingAttachmentsError } from "../core/errors";
import { fromHex, HASH_LENGTH, toHex, type SecureHash } from "../core/hash";
import type {
  CommandData,
  Party,
  PublicKey,
  StateRef,
  TimeWindow,
  TransactionState,
} from "../core/types";

/* ── contract ──────────────────────────── */
export interface DeserializationContext {
  /** Set for attachment-aware decoding (outputs and commands). */
  readonly attachments?: readonly SecureHash[];
}

export interface ValueCodec<T> {
  encode(value: T): Uint8Array;
  decode(bytes: Uint8Array, context: DeserializationContext): T;
}

export interface ComponentTypes {
  stateRef: StateRef;
  transactionState: TransactionState;
  commandData: CommandData;
  secureHash: SecureHash;
  party: Party;
  timeWindow: TimeWindow;
  signers: readonly PublicKey[];
}

export type ComponentCodecs = {
  readonly [K in keyof ComponentTypes]: ValueCodec<ComponentTypes[K]>;
};

export const DEFAULT_CONTEXT: DeserializationContext = {};

/* ── helpers ──────────────────────────── */
const utf8 = new TextDecoder("utf-8", { fatal: true });

export const bnToBytes = (n: bigint): Uint8Array => {
  if (n < 0n) throw new RangeError(`cannot encode negative integer ${n}`);
  if (n === 0n) return new Uint8Array(0);
  const hex = n.toString(16);
  return hexToBytes(hex.length % 2 === 0 ? hex : `0${hex}`);
};

const bytesToBn = (b: Uint8Array): bigint => {
  if (b.length === 0) return 0n;
  if (b[0] === 0) throw new Error("non-canonical integer encoding");
  return BigInt(`0x${bytesToHex(b)}`);
};

export const bytesToIndex = (b: Uint8Array): number => {
  const n = bytesToBn(b);
  if (n > BigInt(Number.MAX_SAFE_INTEGER)) throw new RangeError("index out of range");
  return Number(n);
};

const encJson = (value: unknown): Uint8Array =>
  utf8ToBytes(JSON.stringify(value ?? null));
const decJson = (b: Uint8Array): unknown => JSON.parse(utf8.decode(b));

/* ── shapes ──────────────────────────── */
const bytes = instance(Uint8Array);
const hash32 = pipe(
  instance(Uint8Array),
  check((b: Uint8Array) => b.length === HASH_LENGTH, "expected a 32-byte hash"),
);
const keyBytes = pipe(
  instance(Uint8Array),
  check((b: Uint8Array) => b.length > 0, "expected a non-empty public key"),
);
const optionalUint = pipe(array(bytes), maxLength(1));

const stateRefShape = strictTuple([hash32, bytes]);
const partyShape = strictTuple([bytes, keyBytes]);
const transactionStateShape = strictTuple([bytes, bytes, partyShape, optionalUint]);
const commandDataShape = strictTuple([bytes, bytes, bytes]);
const timeWindowShape = strictTuple([optionalUint, optionalUint]);
const signersShape = array(keyBytes);

const optional = (n: bigint | number | undefined): Uint8Array[] =>
  n === undefined ? [] : [bnToBytes(BigInt(n))];
const first = (items: readonly Uint8Array[]): Uint8Array | undefined => items[0];

const encParty = (p: Party) => [utf8ToBytes(p.name), fromHex(p.owningKey)];
const decParty = ([name, key]: [Uint8Array, Uint8Array]): Party => ({
  name: utf8.decode(name),
  owningKey: toHex(key),
});

/* ── options ──────────────────────────── */
export interface RlpCodecOptions {
  /**
   * Contracts whose outputs and commands can only be decoded when the given
   * attachment is part of the record.
   */
  contractAttachments?: ReadonlyMap<string, SecureHash>;
}

export const createRlpCodecs = (options: RlpCodecOptions = {}): ComponentCodecs => {
  const requireAttachment = (contract: string, context: DeserializationContext) => {
    const required = options.contractAttachments?.get(contract);
    if (required === undefined || context.attachments === undefined) return;
    if (!context.attachments.includes(required)) {
      throw new MissingAttachmentsError(contract, required);
    }
  };

  return {
    stateRef: {
      encode: (ref) =>
        rlpEncode([fromHex(ref.txhash), bnToBytes(BigInt(ref.index))]),
      decode: (b) => {
        const [txhash, index] = parse(stateRefShape, rlpDecode(b));
        return { txhash: toHex(txhash), index: bytesToIndex(index) };
      },
    },

    transactionState: {
      encode: (s) =>
        rlpEncode([
          utf8ToBytes(s.contract),
          encJson(s.data),
          encParty(s.notary),
          optional(s.encumbrance),
        ]),
      decode: (b, context) => {
        const [contract, data, notary, optionalEncumbrance] = parse(
          transactionStateShape,
          rlpDecode(b),
        );
        const encumbrance = first(optionalEncumbrance);
        const state: TransactionState = {
          contract: utf8.decode(contract),
          data: decJson(data),
          notary: decParty(notary),
        };
        requireAttachment(state.contract, context);
        if (encumbrance !== undefined) state.encumbrance = bytesToIndex(encumbrance);
        return state;
      },
    },

    commandData: {
      encode: (c) =>
        rlpEncode([utf8ToBytes(c.contract), utf8ToBytes(c.type), encJson(c.value)]),
      decode: (b, context) => {
        const [contract, type, value] = parse(commandDataShape, rlpDecode(b));
        const data: CommandData = {
          contract: utf8.decode(contract),
          type: utf8.decode(type),
          value: decJson(value),
        };
        requireAttachment(data.contract, context);
        return data;
      },
    },

    secureHash: {
      encode: (h) => rlpEncode(fromHex(h)),
      decode: (b) => toHex(parse(hash32, rlpDecode(b))),
    },

    party: {
      encode: (p) => rlpEncode(encParty(p)),
      decode: (b) => decParty(parse(partyShape, rlpDecode(b))),
    },

    timeWindow: {
      encode: (w) => rlpEncode([optional(w.fromTime), optional(w.untilTime)]),
      decode: (b) => {
        const [fromBound, untilBound] = parse(timeWindowShape, rlpDecode(b));
        const from = first(fromBound);
        const until = first(untilBound);
        const window: TimeWindow = {};
        if (from !== undefined) window.fromTime = bytesToBn(from);
        if (until !== undefined) window.untilTime = bytesToBn(until);
        if (window.fromTime === undefined && window.untilTime === undefined) {
          throw new Error("time window must have at least one bound");
        }
        if (
          window.fromTime !== undefined &&
          window.untilTime !== undefined &&
          window.fromTime >= window.untilTime
        ) {
          throw new Error("time window start must be before its end");
        }
        return window;
      },
    },

    signers: {
      encode: (keys) => rlpEncode(keys.map(fromHex)),
      decode: (b) => {
        const keys = parse(signersShape, rlpDecode(b));
        if (keys.length === 0) throw new Error("a command needs at least one signer");
        return keys.map(toHex);
      },
    },
  };
};

export const rlpCodecs: ComponentCodecs = createRlpCodecs();
