import type { EventFilter } from "../types/permissions.js";
import type { RawEvent } from "../types/widget-messages.js";

export interface ReadEventsQuery {
  eventType: string;
  /** A specific state key, or `true` for state events with any key. Absent for message-like events. */
  stateKey?: string | true;
  limit: number;
}

export interface SendEventCommand {
  eventType: string;
  stateKey?: string;
  content: Record<string, unknown>;
}

export interface OpenIdToken {
  access_token: string;
  expires_in: number;
  matrix_server_name: string;
  token_type: string;
}

export interface RoomEventSubscription {
  /** Room events as they arrive. Ends when the subscription is closed. */
  readonly events: AsyncIterable<RawEvent>;
  close(): void;
}

/**
 * The room the widget is embedded in, as seen by the host client.
 * Implementations report failures by rejecting; the driver relays the
 * rejection's message to the widget.
 */
export interface RoomDriver {
  readonly roomId: string;
  readonly ownUserId: string;
  /** Most recent events first, at most `limit`. */
  readEvents(query: ReadEventsQuery): Promise<RawEvent[]>;
  /** Returns the new event's id. */
  sendEvent(command: SendEventCommand): Promise<string>;
  requestOpenIdToken(userId: string): Promise<OpenIdToken>;
  /** Server-side filtering is best effort; callers re-check every event. */
  subscribe(filters: readonly EventFilter[]): RoomEventSubscription;
}
