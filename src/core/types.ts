import type { Hex, SecureHash } from "./hash";
import type { PartialMerkleTree } from "./partialMerkle";

/* ── group discriminants ─────────────────────────────────── */
export const GroupIndex = {
  Inputs: 0,
  Outputs: 1,
  Commands: 2,
  Attachments: 3,
  Notary: 4,
  TimeWindow: 5,
  Signers: 6,
  References: 7,
} as const;

export type KnownGroupIndex = (typeof GroupIndex)[keyof typeof GroupIndex];

/** Discriminants at or above this value are forward-compatible unknown groups. */
export const KNOWN_GROUP_COUNT = 8;

const GROUP_NAMES: readonly string[] = [
  "INPUTS_GROUP",
  "OUTPUTS_GROUP",
  "COMMANDS_GROUP",
  "ATTACHMENTS_GROUP",
  "NOTARY_GROUP",
  "TIMEWINDOW_GROUP",
  "SIGNERS_GROUP",
  "REFERENCES_GROUP",
];

export const groupName = (groupIndex: number): string =>
  GROUP_NAMES[groupIndex] ?? `UNKNOWN_GROUP(${groupIndex})`;

/* ── component values ────────────────────────────────────── */
export type PublicKey = Hex;

export interface Party {
  name: string;
  owningKey: PublicKey;
}

/** Pointer to a state on the ledger: (record id, output index). */
export interface StateRef {
  txhash: SecureHash;
  index: number;
}

export interface TransactionState {
  contract: string;
  data: unknown; // JSON-serializable contract state
  notary: Party;
  encumbrance?: number;
}

export interface CommandData {
  contract: string;
  type: string;
  value: unknown;
}

/** Validity interval in ms since epoch; at least one bound is set. */
export interface TimeWindow {
  fromTime?: bigint;
  untilTime?: bigint;
}

/** Reconstructed from the commands and signers groups, never stored as such. */
export interface Command {
  data: CommandData;
  signers: readonly PublicKey[];
}

/* ── component groups ────────────────────────────────────── */
export interface ComponentGroup {
  readonly groupIndex: number;
  readonly components: readonly Uint8Array[];
}

export interface FilteredComponentGroup extends ComponentGroup {
  readonly nonces: readonly SecureHash[];
  readonly partialMerkleTree: PartialMerkleTree;
}

export const isFilteredGroup = (
  group: ComponentGroup,
): group is FilteredComponentGroup =>
  "nonces" in group && "partialMerkleTree" in group;

/* ── traversal view ──────────────────────────────────────── */
export type RecordComponent =
  | { kind: "input"; index: number; value: StateRef }
  | { kind: "output"; index: number; value: TransactionState }
  | { kind: "command"; index: number; value: Command }
  | { kind: "attachment"; index: number; value: SecureHash }
  | { kind: "notary"; index: number; value: Party }
  | { kind: "timeWindow"; index: number; value: TimeWindow }
  | { kind: "reference"; index: number; value: StateRef }
  | { kind: "unknown"; groupIndex: number; index: number; value: Uint8Array };

export type ComponentPredicate = (component: RecordComponent) => boolean;

const KIND_GROUP = {
  input: GroupIndex.Inputs,
  output: GroupIndex.Outputs,
  command: GroupIndex.Commands,
  attachment: GroupIndex.Attachments,
  notary: GroupIndex.Notary,
  timeWindow: GroupIndex.TimeWindow,
  reference: GroupIndex.References,
} as const;

export const componentGroupIndex = (component: RecordComponent): number =>
  component.kind === "unknown" ? component.groupIndex : KIND_GROUP[component.kind];
