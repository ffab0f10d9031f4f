/**
 * Capability strings <-> Permissions.
 *
 * Widgets exchange capabilities as plain strings
 * (`org.matrix.msc2762.receive.state_event:m.room.topic`). The driver works
 * with typed filters and only converts at the codec boundary.
 */

import type { EventFilter, Permissions } from "../types/permissions.js";
import { ROOM_MESSAGE_TYPE } from "./event-filter.js";

export const REQUIRES_CLIENT_CAPABILITY = "io.element.requires_client";

const CAPABILITY_PREFIX = "org.matrix.msc2762";
const EVENT_CAPABILITY_RE = /^org\.matrix\.msc2762\.(receive|send)\.(event|state_event):(.+)$/;

type Direction = "receive" | "send";

function filterToCapability(direction: Direction, filter: EventFilter): string {
  const base = `${CAPABILITY_PREFIX}.${direction}`;
  switch (filter.kind) {
    case "message_like_with_type":
      return `${base}.event:${filter.eventType}`;
    case "room_message_with_msgtype":
      return `${base}.event:${ROOM_MESSAGE_TYPE}#${filter.msgtype}`;
    case "state_with_type":
      return `${base}.state_event:${filter.eventType}`;
    case "state_with_type_and_state_key":
      return `${base}.state_event:${filter.eventType}#${filter.stateKey}`;
  }
}

function parseEventCapability(kind: string, rest: string): EventFilter | undefined {
  const hash = rest.indexOf("#");
  if (kind === "event") {
    if (hash >= 0 && rest.slice(0, hash) === ROOM_MESSAGE_TYPE) {
      return { kind: "room_message_with_msgtype", msgtype: rest.slice(hash + 1) };
    }
    return { kind: "message_like_with_type", eventType: rest };
  }
  if (hash < 0) return { kind: "state_with_type", eventType: rest };
  const eventType = rest.slice(0, hash);
  if (!eventType) return undefined;
  return { kind: "state_with_type_and_state_key", eventType, stateKey: rest.slice(hash + 1) };
}

/** Read filters, then send filters, then requires_client. */
export function serializeCapabilities(permissions: Permissions): string[] {
  const capabilities = [
    ...permissions.read.map((filter) => filterToCapability("receive", filter)),
    ...permissions.send.map((filter) => filterToCapability("send", filter)),
  ];
  if (permissions.requiresClient) capabilities.push(REQUIRES_CLIENT_CAPABILITY);
  return capabilities;
}

/** Capabilities this driver does not understand are left out. */
export function parseCapabilities(capabilities: readonly string[]): Permissions {
  const permissions: Permissions = { read: [], send: [], requiresClient: false };
  for (const capability of capabilities) {
    if (capability === REQUIRES_CLIENT_CAPABILITY) {
      permissions.requiresClient = true;
      continue;
    }
    const match = EVENT_CAPABILITY_RE.exec(capability);
    if (!match) continue;
    const [, direction, kind, rest] = match;
    const filter = parseEventCapability(kind, rest);
    if (!filter) continue;
    (direction === "receive" ? permissions.read : permissions.send).push(filter);
  }
  return permissions;
}
