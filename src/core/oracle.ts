import { sign, verifySig, type KeyPair } from "../crypto/bls";
import {
  RecordRejectedError,
  type ComponentVisibilityError,
  type FilteredRecordVerificationError,
} from "./errors";
import type { FilteredRecord } from "./filtered";
import { fromHex, type Hex, type SecureHash } from "./hash";
import type { PublicKey, RecordComponent } from "./types";

export interface OracleSignature {
  readonly by: PublicKey;
  /** BLS12-381 signature over the record id bytes. */
  readonly signature: Hex;
}

export type OracleRejection =
  | FilteredRecordVerificationError
  | ComponentVisibilityError
  | RecordRejectedError;

export type OracleResult =
  | { readonly ok: true; readonly signature: OracleSignature }
  | { readonly ok: false; readonly error: OracleRejection };

/**
 * Signs a torn-off record as an oracle would: the record must verify,
 * every command naming this oracle's key must be revealed, and `accept`
 * must approve every revealed component. The signature covers the id only.
 */
export const signAsOracle = async (
  record: FilteredRecord,
  keys: KeyPair,
  accept: (component: RecordComponent) => boolean,
): Promise<OracleResult> => {
  const verified = record.verify();
  if (!verified.ok) return verified;

  const visible = record.checkCommandVisibility(keys.publicKey);
  if (!visible.ok) return visible;

  if (!record.checkWithFun(accept)) {
    return {
      ok: false,
      error: new RecordRejectedError(record.id, "Revealed components were not accepted"),
    };
  }

  const signature = await sign(fromHex(record.id), keys.privateKey);
  return { ok: true, signature: { by: keys.publicKey, signature } };
};

export const verifyOracleSignature = (
  id: SecureHash,
  { by, signature }: OracleSignature,
): Promise<boolean> => verifySig(fromHex(id), signature, by);
