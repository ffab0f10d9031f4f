/**
 * Event filter matching used to scope negotiated capabilities and to gate
 * every read and send a widget asks for.
 */

import { z } from "zod";
import type { EventFilter } from "../types/permissions.js";
import type { SendEventRequest } from "../types/widget-messages.js";

export const ROOM_MESSAGE_TYPE = "m.room.message";

/** The parts of an event a filter looks at. */
export interface FilterInput {
  eventType: string;
  /** Present iff the event is a state event. */
  stateKey?: string;
  content: Record<string, unknown>;
}

const filterInputSchema = z.object({
  type: z.string(),
  state_key: z.string().optional(),
  content: z.record(z.unknown()).default({}),
});

export function matchesFilter(filter: EventFilter, input: FilterInput): boolean {
  switch (filter.kind) {
    case "message_like_with_type":
      return input.stateKey === undefined && input.eventType === filter.eventType;
    case "room_message_with_msgtype":
      return (
        input.stateKey === undefined &&
        input.eventType === ROOM_MESSAGE_TYPE &&
        input.content.msgtype === filter.msgtype
      );
    case "state_with_type":
      return input.stateKey !== undefined && input.eventType === filter.eventType;
    case "state_with_type_and_state_key":
      return (
        input.stateKey !== undefined &&
        input.eventType === filter.eventType &&
        input.stateKey === filter.stateKey
      );
  }
}

/** OR over the list; an empty list matches nothing. */
export function matchesAny(filters: readonly EventFilter[], input: FilterInput): boolean {
  return filters.some((filter) => matchesFilter(filter, input));
}

export type FilterInputResult = { ok: true; input: FilterInput } | { ok: false; reason: string };

/** Parse a raw room event into filter input. Callers treat a failure as non-matching. */
export function toFilterInput(raw: unknown): FilterInputResult {
  const parsed = filterInputSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: parsed.error.issues.map((issue) => issue.message).join("; ") };
  }
  const { type, state_key, content } = parsed.data;
  return {
    ok: true,
    input: state_key === undefined
      ? { eventType: type, content }
      : { eventType: type, stateKey: state_key, content },
  };
}

export function sendRequestToFilterInput(request: SendEventRequest): FilterInput {
  return request.state_key === undefined
    ? { eventType: request.type, content: request.content }
    : { eventType: request.type, stateKey: request.state_key, content: request.content };
}

// ── Constructors ──

export function messageLikeWithType(eventType: string): EventFilter {
  return { kind: "message_like_with_type", eventType };
}

export function roomMessageWithMsgtype(msgtype: string): EventFilter {
  return { kind: "room_message_with_msgtype", msgtype };
}

export function stateWithType(eventType: string): EventFilter {
  return { kind: "state_with_type", eventType };
}

export function stateWithTypeAndStateKey(eventType: string, stateKey: string): EventFilter {
  return { kind: "state_with_type_and_state_key", eventType, stateKey };
}
