import type { SecureHash } from "./hash";

/**
 * Base class for every failure raised by record traversal, Merkle proofs
 * and filtered-record checks. None of them is transient: retrying the same
 * call on the same input fails the same way.
 */
export abstract class RecordError extends Error {
  /** Machine-readable error code */
  abstract readonly code: string;

  /** Underlying failure, if any */
  override readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

/**
 * Structural problem in a record: undecodable component bytes, too many
 * singleton entries, command/signer count mismatch, orphan commands.
 */
export class MalformedRecordError extends RecordError {
  readonly code = "MALFORMED_RECORD" as const;

  readonly groupIndex: number | undefined;
  readonly componentIndex: number | undefined;

  constructor(
    message: string,
    location: { groupIndex?: number; componentIndex?: number } = {},
    cause?: unknown,
  ) {
    super(message, cause);
    this.groupIndex = location.groupIndex;
    this.componentIndex = location.componentIndex;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      groupIndex: this.groupIndex,
      componentIndex: this.componentIndex,
    };
  }
}

/** Raised (or returned) when `FilteredRecord.verify` fails. */
export class FilteredRecordVerificationError extends RecordError {
  readonly code = "VERIFICATION_FAILED" as const;

  constructor(
    readonly id: SecureHash,
    readonly reason: string,
  ) {
    super(`Record with id:${id} cannot be verified. Reason: ${reason}`);
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), id: this.id, reason: this.reason };
  }
}

/** Partial disclosure found where full disclosure was required. */
export class ComponentVisibilityError extends RecordError {
  readonly code = "COMPONENT_NOT_VISIBLE" as const;

  constructor(
    readonly id: SecureHash,
    readonly reason: string,
  ) {
    super(
      `Component visibility error for record with id:${id}. Reason: ${reason}`,
    );
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), id: this.id, reason: this.reason };
  }
}

export class MerkleTreeError extends RecordError {
  readonly code = "MERKLE_TREE" as const;
}

/**
 * A contract referenced by an output or command needs an attachment the
 * record does not carry. Not a malformed component, so it is never wrapped.
 */
export class MissingAttachmentsError extends RecordError {
  readonly code = "MISSING_ATTACHMENTS" as const;

  constructor(
    readonly contract: string,
    readonly attachment: SecureHash,
  ) {
    super(`Contract ${contract} requires missing attachment ${attachment}`);
  }
}

/** A signing oracle refused to sign what it was shown. */
export class RecordRejectedError extends RecordError {
  readonly code = "RECORD_REJECTED" as const;

  constructor(
    readonly id: SecureHash,
    readonly reason: string,
  ) {
    super(`Record with id:${id} rejected. Reason: ${reason}`);
  }
}

/* ── check results ───────────────────────────────────────── */
export type CheckResult<E extends RecordError> =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: E };

export const OK: { readonly ok: true } = { ok: true };

export const fail = <E extends RecordError>(error: E): CheckResult<E> => ({
  ok: false,
  error,
});

/** Throws the carried error of a failed check. */
export const unwrap = <E extends RecordError>(result: CheckResult<E>): void => {
  if (!result.ok) throw result.error;
};
