/**
 * CapabilityNegotiator: asks the widget what it wants, lets the host policy
 * decide, and tells the widget the outcome.
 *
 * Negotiation and notification are split so that the caller can commit the
 * approved set before the widget hears about it: a widget acting on
 * `notify_capabilities` straight away must already find the session
 * initialized.
 */

import { errorMessage } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { PermissionsProvider } from "../interfaces/permissions-provider.js";
import type { RoomDriver, RoomEventSubscription } from "../interfaces/room-driver.js";
import type { Permissions } from "../types/permissions.js";
import { noopLogger } from "../utils/noop-logger.js";
import { capabilitiesRequest, capabilitiesUpdate } from "./outgoing-requests.js";
import type { WidgetProxy } from "./widget-proxy.js";

export interface NegotiationResult {
  requested: Permissions;
  approved: Permissions;
  /** Open iff `approved.read` is non-empty. */
  subscription: RoomEventSubscription | undefined;
}

export interface CapabilityNegotiatorOptions {
  proxy: WidgetProxy;
  permissionsProvider: PermissionsProvider;
  room: Pick<RoomDriver, "subscribe">;
  logger?: Logger;
}

export class CapabilityNegotiator {
  private readonly proxy: WidgetProxy;
  private readonly permissionsProvider: PermissionsProvider;
  private readonly room: Pick<RoomDriver, "subscribe">;
  private readonly logger: Logger;

  constructor(options: CapabilityNegotiatorOptions) {
    this.proxy = options.proxy;
    this.permissionsProvider = options.permissionsProvider;
    this.room = options.room;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Rejects when the widget does not answer the capabilities request or the
   * policy throws. Nothing is left open in that case.
   */
  async negotiate(): Promise<NegotiationResult> {
    const { capabilities: requested } = await this.proxy.send(capabilitiesRequest());
    this.logger.debug?.("Widget requested capabilities", {
      read: requested.read.length,
      send: requested.send.length,
    });

    const approved = await this.permissionsProvider.acquirePermissions(requested);
    const subscription = this.subscribe(approved);
    return { requested, approved, subscription };
  }

  /** Open a room subscription for `approved.read`, or nothing when it is empty. */
  subscribe(approved: Permissions): RoomEventSubscription | undefined {
    return approved.read.length > 0 ? this.room.subscribe(approved.read) : undefined;
  }

  /**
   * Send `notify_capabilities`. Never rejects: the session is usable whether
   * or not the widget acknowledges.
   */
  async notify(requested: Permissions, approved: Permissions): Promise<void> {
    try {
      await this.proxy.send(capabilitiesUpdate(requested, approved));
    } catch (err) {
      this.logger.warn("Widget did not acknowledge capabilities", { error: errorMessage(err) });
    }
  }
}
