/**
 * Capability model shared by the negotiator, the dispatcher and host policies.
 * @module
 */

/** Declarative predicate over an event's type, state key and content. */
export type EventFilter =
  /** Message-like events (no state key) of the given type. */
  | { kind: "message_like_with_type"; eventType: string }
  /** `m.room.message` events whose `content.msgtype` equals `msgtype`. */
  | { kind: "room_message_with_msgtype"; msgtype: string }
  /** State events of the given type, any state key. */
  | { kind: "state_with_type"; eventType: string }
  /** State events of the given type and exact state key. */
  | { kind: "state_with_type_and_state_key"; eventType: string; stateKey: string };

export type EventFilterKind = EventFilter["kind"];

/**
 * A capability set: what a widget asked for, or what the host approved.
 * An empty filter list grants nothing in that direction.
 */
export interface Permissions {
  read: EventFilter[];
  send: EventFilter[];
  /** The widget must not be opened outside of the host client. */
  requiresClient: boolean;
}

export function emptyPermissions(): Permissions {
  return { read: [], send: [], requiresClient: false };
}
