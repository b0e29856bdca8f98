import {
  DEFAULT_CONTEXT,
  rlpCodecs,
  type ComponentCodecs,
  type DeserializationContext,
} from "../codec/rlp";
import { logger, type ILogger } from "../logging";
import { MalformedRecordError, MissingAttachmentsError } from "./errors";
import { componentHash, type SecureHash } from "./hash";
import { emptyList, LazyMappedList, type ComponentList } from "./lazy";
import { leafIndex } from "./partialMerkle";
import {
  componentGroupIndex,
  GroupIndex,
  groupName,
  isFilteredGroup,
  KNOWN_GROUP_COUNT,
  type Command,
  type CommandData,
  type ComponentGroup,
  type Party,
  type PublicKey,
  type RecordComponent,
  type StateRef,
  type TimeWindow,
  type TransactionState,
} from "./types";

export interface RecordOptions {
  /** Serialization service for component bytes. Defaults to the RLP codecs. */
  codecs?: ComponentCodecs;
  logger?: ILogger;
}

const indexGroups = (groups: readonly ComponentGroup[]): Map<number, ComponentGroup> => {
  const byIndex = new Map<number, ComponentGroup>();
  for (const group of groups) {
    const { groupIndex } = group;
    if (!Number.isInteger(groupIndex) || groupIndex < 0) {
      throw new MalformedRecordError(`Invalid component group index ${groupIndex}`, {
        groupIndex,
      });
    }
    if (byIndex.has(groupIndex)) {
      throw new MalformedRecordError("Duplicated component groups detected", { groupIndex });
    }
    if (isFilteredGroup(group) && group.components.length !== group.nonces.length) {
      throw new MalformedRecordError("Size of record components and nonces do not match", {
        groupIndex,
      });
    }
    byIndex.set(groupIndex, group);
  }
  return byIndex;
};

const KNOWN_COMPONENT_GROUPS: readonly number[] = [
  GroupIndex.Inputs,
  GroupIndex.Outputs,
  GroupIndex.Commands,
  GroupIndex.Attachments,
  GroupIndex.Notary,
  GroupIndex.TimeWindow,
  GroupIndex.References,
];

interface Memo {
  inputs?: ComponentList<StateRef>;
  outputs?: ComponentList<TransactionState>;
  commandData?: ComponentList<CommandData>;
  signers?: ComponentList<readonly PublicKey[]>;
  commands?: ComponentList<Command>;
  attachments?: ComponentList<SecureHash>;
  notaries?: ComponentList<Party>;
  timeWindows?: ComponentList<TimeWindow>;
  references?: ComponentList<StateRef>;
  attachmentsContext?: DeserializationContext;
}

/**
 * A record whose components are grouped by kind, some of which may be
 * missing when this is a torn-off (filtered) view. Component bytes are
 * decoded on first access and kept.
 */
export abstract class TraversableRecord {
  protected readonly codecs: ComponentCodecs;
  protected readonly log: ILogger;
  private readonly groupsByIndex: ReadonlyMap<number, ComponentGroup>;
  private readonly memo: Memo = {};

  constructor(
    readonly componentGroups: readonly ComponentGroup[],
    options: RecordOptions = {},
  ) {
    this.codecs = options.codecs ?? rlpCodecs;
    this.log = options.logger ?? logger();
    this.groupsByIndex = indexGroups(componentGroups);
    this.checkCardinality();
  }

  abstract get id(): SecureHash;

  /** Hashes of the attachments needed to interpret outputs and commands. */
  get attachments(): ComponentList<SecureHash> {
    return (this.memo.attachments ??= this.deserialiseGroup(
      GroupIndex.Attachments,
      (b, ctx) => this.codecs.secureHash.decode(b, ctx),
    ));
  }

  /** Input states, identified by (record id, output index). */
  get inputs(): ComponentList<StateRef> {
    return (this.memo.inputs ??= this.deserialiseGroup(GroupIndex.Inputs, (b, ctx) =>
      this.codecs.stateRef.decode(b, ctx),
    ));
  }

  /** Reference states, identified by (record id, output index). */
  get references(): ComponentList<StateRef> {
    return (this.memo.references ??= this.deserialiseGroup(GroupIndex.References, (b, ctx) =>
      this.codecs.stateRef.decode(b, ctx),
    ));
  }

  get outputs(): ComponentList<TransactionState> {
    return (this.memo.outputs ??= this.deserialiseGroup(
      GroupIndex.Outputs,
      (b, ctx) => this.codecs.transactionState.decode(b, ctx),
      true,
    ));
  }

  /** Command data paired with the keys that must sign it. */
  get commands(): ComponentList<Command> {
    return (this.memo.commands ??= this.deserialiseCommands());
  }

  get notary(): Party | undefined {
    const notaries = (this.memo.notaries ??= this.deserialiseGroup(GroupIndex.Notary, (b, ctx) =>
      this.codecs.party.decode(b, ctx),
    ));
    return notaries.length === 0 ? undefined : notaries.get(0);
  }

  get timeWindow(): TimeWindow | undefined {
    const windows = (this.memo.timeWindows ??= this.deserialiseGroup(
      GroupIndex.TimeWindow,
      (b, ctx) => this.codecs.timeWindow.decode(b, ctx),
    ));
    return windows.length === 0 ? undefined : windows.get(0);
  }

  /**
   * Every available typed component of the known groups except signers,
   * in group order: inputs, outputs, commands, attachments, notary,
   * time-window, references.
   */
  get availableComponents(): RecordComponent[] {
    return [...this.knownComponents()];
  }

  /**
   * The same components split per known group (signers excluded), one
   * possibly empty list per group.
   */
  get availableComponentGroups(): RecordComponent[][] {
    const byGroup = new Map<number, RecordComponent[]>(
      KNOWN_COMPONENT_GROUPS.map((groupIndex) => [groupIndex, []]),
    );
    for (const component of this.knownComponents()) {
      byGroup.get(componentGroupIndex(component))?.push(component);
    }
    return [...byGroup.values()];
  }

  protected *knownComponents(): Generator<RecordComponent> {
    let index = 0;
    for (const value of this.inputs) yield { kind: "input", index: index++, value };
    index = 0;
    for (const value of this.outputs) yield { kind: "output", index: index++, value };
    index = 0;
    for (const value of this.commands) yield { kind: "command", index: index++, value };
    index = 0;
    for (const value of this.attachments) yield { kind: "attachment", index: index++, value };
    const notary = this.notary;
    if (notary !== undefined) yield { kind: "notary", index: 0, value: notary };
    const timeWindow = this.timeWindow;
    if (timeWindow !== undefined) yield { kind: "timeWindow", index: 0, value: timeWindow };
    index = 0;
    for (const value of this.references) yield { kind: "reference", index: index++, value };
  }

  /** Components of forward-compatible groups, ascending by discriminant. */
  protected *unknownComponents(): Generator<RecordComponent> {
    const unknown = this.componentGroups
      .filter((g) => g.groupIndex >= KNOWN_GROUP_COUNT)
      .sort((a, b) => a.groupIndex - b.groupIndex);
    for (const group of unknown) {
      for (const [index, value] of group.components.entries()) {
        yield { kind: "unknown", groupIndex: group.groupIndex, index, value };
      }
    }
  }

  protected group(groupIndex: number): ComponentGroup | undefined {
    return this.groupsByIndex.get(groupIndex);
  }

  protected componentCount(groupIndex: number): number {
    return this.group(groupIndex)?.components.length ?? 0;
  }

  /** Decoded signer sets of the signers group, as present in this record. */
  protected get signersList(): ComponentList<readonly PublicKey[]> {
    return (this.memo.signers ??= this.deserialiseGroup(GroupIndex.Signers, (b, ctx) =>
      this.codecs.signers.decode(b, ctx),
    ));
  }

  private checkCardinality(): void {
    const singletons: Array<[number, string]> = [
      [GroupIndex.Notary, "notary party"],
      [GroupIndex.TimeWindow, "time-window"],
    ];
    for (const [groupIndex, label] of singletons) {
      if (this.componentCount(groupIndex) > 1) {
        throw new MalformedRecordError(`Invalid record. More than 1 ${label} detected.`, {
          groupIndex,
        });
      }
    }

    const commandCount = this.componentCount(GroupIndex.Commands);
    const signerCount = this.componentCount(GroupIndex.Signers);
    const commandsGroup = this.group(GroupIndex.Commands);
    if (commandsGroup !== undefined && isFilteredGroup(commandsGroup)) {
      if (commandCount > signerCount) {
        throw new MalformedRecordError(
          `Invalid record. Less Signers (${signerCount}) than CommandData (${commandCount}) objects`,
          { groupIndex: GroupIndex.Signers },
        );
      }
    } else if (commandCount !== signerCount) {
      throw new MalformedRecordError(
        `Invalid record. Sizes of CommandData (${commandCount}) and Signers (${signerCount}) do not match`,
        { groupIndex: GroupIndex.Commands },
      );
    }
  }

  private attachmentsContext(): DeserializationContext {
    return (this.memo.attachmentsContext ??= { attachments: this.attachments.toArray() });
  }

  private deserialiseGroup<T>(
    groupIndex: number,
    decode: (bytes: Uint8Array, context: DeserializationContext) => T,
    attachmentsContext = false,
  ): ComponentList<T> {
    const group = this.group(groupIndex);
    if (group === undefined || group.components.length === 0) return emptyList<T>();

    return new LazyMappedList(group.components, (component, internalIndex) => {
      const context = attachmentsContext ? this.attachmentsContext() : DEFAULT_CONTEXT;
      try {
        return decode(component, context);
      } catch (e) {
        if (e instanceof MissingAttachmentsError) throw e;
        throw new MalformedRecordError(
          `Malformed record, ${groupName(groupIndex)} at index ${internalIndex} cannot be deserialised`,
          { groupIndex, componentIndex: internalIndex },
          e,
        );
      }
    });
  }

  /**
   * Position in the full signers group of each command present here. In a
   * filtered record commands may be a subset, so the position comes from
   * the command's leaf index in its partial Merkle tree.
   */
  private signerPositions(): number[] {
    const group = this.group(GroupIndex.Commands);
    if (group === undefined) return [];
    if (!isFilteredGroup(group)) return group.components.map((_, index) => index);

    const positions = group.components.map((component, index) => {
      const nonce = group.nonces[index];
      if (nonce === undefined) {
        throw new MalformedRecordError("Size of record components and nonces do not match", {
          groupIndex: GroupIndex.Commands,
        });
      }
      try {
        return leafIndex(group.partialMerkleTree, componentHash(nonce, component));
      } catch (e) {
        throw new MalformedRecordError(
          `Invalid record. Command at index ${index} is not part of its partial Merkle tree`,
          { groupIndex: GroupIndex.Commands, componentIndex: index },
          e,
        );
      }
    });
    const signerCount = this.componentCount(GroupIndex.Signers);
    if (positions.length > 0 && Math.max(...positions) >= signerCount) {
      throw new MalformedRecordError(
        "Invalid record. A command with no corresponding signer detected",
        { groupIndex: GroupIndex.Commands },
      );
    }
    return positions;
  }

  private deserialiseCommands(): ComponentList<Command> {
    const commandData = (this.memo.commandData ??= this.deserialiseGroup(
      GroupIndex.Commands,
      (b, ctx) => this.codecs.commandData.decode(b, ctx),
      true,
    ));
    const signers = this.signersList;
    return new LazyMappedList(this.signerPositions(), (position, index) => ({
      data: commandData.get(index),
      signers: signers.get(position),
    }));
  }
}
