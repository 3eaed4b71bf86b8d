import type {
  AttributeDelta,
  AttributeValue,
  Attributes,
  ControlValueOrigin,
  NodeId,
  NodeKind,
  Revision,
  Seq,
} from "@scenewire/interface";

export type CreateNodeMessage = {
  type: "createNode";
  id: NodeId;
  parent: NodeId | null;
  kind: NodeKind;
  attributes: Attributes;
  revision: Revision;
  seq: Seq;
};

export type UpdateNodeMessage = {
  type: "updateNode";
  id: NodeId;
  delta: AttributeDelta;
  revision: Revision;
  seq: Seq;
};

export type RemoveNodeMessage = {
  type: "removeNode";
  id: NodeId;
  revision: Revision;
  seq: Seq;
};

/**
 * Control value change. Clients send the last revision they saw for the control and `seq` 0; the
 * server stamps its own values when the change is applied to the store.
 */
export type ControlValueMessage = {
  type: "controlValue";
  id: NodeId;
  value: AttributeValue;
  origin: ControlValueOrigin;
  revision: Revision;
  seq: Seq;
};

/**
 * Marks the end of a session's bootstrap: every node live as of `seq` has been sent.
 */
export type BootstrapCompleteMessage = {
  type: "bootstrapComplete";
  seq: Seq;
  nodeCount: number;
};

export type MutationMessage =
  | CreateNodeMessage
  | UpdateNodeMessage
  | RemoveNodeMessage
  | ControlValueMessage;

export type SceneMessage = MutationMessage | BootstrapCompleteMessage;

export type SceneMessageType = SceneMessage["type"];

/**
 * Receives every mutation the store applies, in store order, inside the store's apply path,
 * together with its encoded frame.
 */
export interface MutationSink {
  publish(message: MutationMessage, frame: Uint8Array, opts?: PublishOptions): void;
}

export type PublishOptions = {
  /** Session that should not receive the message (the client it came from). */
  excludeSessionId?: string;
};
