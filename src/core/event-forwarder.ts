/**
 * EventForwarder: relays live room events the widget may read.
 *
 * Subscriptions are filtered upstream on a best-effort basis, so every event
 * is checked against the approved read filters again before it is pushed.
 * Events reach the widget stamped with the id of the room they came from.
 */

import { errorMessage } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { RoomEventSubscription } from "../interfaces/room-driver.js";
import type { EventFilter } from "../types/permissions.js";
import { noopLogger } from "../utils/noop-logger.js";
import { matchesAny, toFilterInput } from "./event-filter.js";
import { sendEventToWidget } from "./outgoing-requests.js";
import type { WidgetProxy } from "./widget-proxy.js";

export class EventForwarder {
  private stopped = false;

  constructor(
    private readonly subscription: RoomEventSubscription,
    private readonly roomId: string,
    private readonly filters: readonly EventFilter[],
    private readonly proxy: WidgetProxy,
    private readonly logger: Logger = noopLogger,
  ) {}

  /** Forward events one at a time until the subscription ends or `stop()` is called. */
  async run(): Promise<void> {
    for await (const event of this.subscription.events) {
      if (this.stopped) break;

      const parsed = toFilterInput(event);
      if (!parsed.ok) {
        this.logger.warn("Skipping unreadable room event", { reason: parsed.reason });
        continue;
      }
      if (!matchesAny(this.filters, parsed.input)) continue;

      try {
        await this.proxy.send(sendEventToWidget({ ...event, room_id: this.roomId }));
      } catch (err) {
        this.logger.warn("Failed to forward event to widget", {
          eventType: parsed.input.eventType,
          error: errorMessage(err),
        });
      }
    }
  }

  stop(): void {
    this.stopped = true;
    this.subscription.close();
  }
}
