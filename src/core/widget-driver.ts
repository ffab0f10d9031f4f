/**
 * WidgetDriver: runs the Widget API for one widget connection.
 *
 * Owns the transport, the session state and the outbound request table.
 * `run()` pumps incoming messages until the transport closes: widget
 * requests go to the dispatcher, replies to our own requests go to the
 * proxy, and anything undecodable is answered out-of-band. Every request is
 * handled as its own task, so a slow permission prompt or room call never
 * holds up the loop.
 */

import { StructuredLogger } from "../adapters/structured-logger.js";
import {
  errorMessage,
  InvalidStateError,
  toWidgetApiError,
  WidgetApiError,
  WidgetDisconnectedError,
} from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { PermissionsProvider } from "../interfaces/permissions-provider.js";
import type { RoomDriver, RoomEventSubscription } from "../interfaces/room-driver.js";
import type { WidgetTransport } from "../interfaces/transport.js";
import {
  type ResolvedConfig,
  resolveConfig,
  validateSettings,
  type WidgetDriverConfig,
  type WidgetSettings,
} from "../types/config.js";
import type { EventFilter, Permissions } from "../types/permissions.js";
import type { WidgetMessage } from "../types/widget-messages.js";
import { noopLogger } from "../utils/noop-logger.js";
import { CapabilityNegotiator, type NegotiationResult } from "./capability-negotiator.js";
import { EventForwarder } from "./event-forwarder.js";
import { decodeMessage } from "./message-codec.js";
import { RequestDispatcher } from "./request-dispatcher.js";
import { isSessionTransitionAllowed, type SessionState, type SessionStatus } from "./session-state.js";
import { TypedEventEmitter } from "./typed-emitter.js";
import { WidgetProxy } from "./widget-proxy.js";

export interface WidgetDriverEvents {
  "state:changed": { from: SessionStatus; to: SessionStatus };
  "capabilities:negotiated": { requested: Permissions; approved: Permissions };
  "negotiation:failed": { error: WidgetApiError };
  "protocol:violation": { reason: string; requestId: string | null };
  disconnected: Record<string, never>;
}

export interface WidgetDriverOptions {
  settings: WidgetSettings;
  transport: WidgetTransport;
  room: RoomDriver;
  permissionsProvider: PermissionsProvider;
  config?: WidgetDriverConfig;
  logger?: Logger;
  /** Correlation id source for host-initiated requests. Defaults to random UUIDs. */
  generateRequestId?: () => string;
}

export class WidgetDriver extends TypedEventEmitter<WidgetDriverEvents> {
  readonly config: ResolvedConfig;
  private readonly settings: WidgetSettings;
  private readonly transport: WidgetTransport;
  private readonly logger: Logger;
  private readonly roomId: string;
  private readonly proxy: WidgetProxy;
  private readonly negotiator: CapabilityNegotiator;
  private readonly dispatcher: RequestDispatcher;

  private session: SessionState = { status: "uninitialized" };
  private readonly tasks = new Set<Promise<void>>();
  private forwarder: EventForwarder | null = null;
  private forwarding: Promise<void> = Promise.resolve();
  private fatalError: unknown = null;
  private started = false;

  constructor(options: WidgetDriverOptions) {
    super();
    this.config = resolveConfig(options.config);
    this.settings = validateSettings(options.settings);
    this.transport = options.transport;
    this.roomId = options.room.roomId;
    const logger = options.logger ?? noopLogger;
    this.logger =
      logger instanceof StructuredLogger ? logger.child({ widgetId: this.settings.id }, "widget-driver") : logger;

    this.proxy = new WidgetProxy({
      transport: this.transport,
      widgetId: this.settings.id,
      requestTimeoutMs: this.config.requestTimeoutMs,
      logger: this.logger,
      generateRequestId: options.generateRequestId,
    });
    this.negotiator = new CapabilityNegotiator({
      proxy: this.proxy,
      permissionsProvider: options.permissionsProvider,
      room: options.room,
      logger: this.logger,
    });

    const self = this;
    this.dispatcher = new RequestDispatcher({
      proxy: this.proxy,
      room: options.room,
      config: this.config,
      logger: this.logger,
      session: {
        get state() {
          return self.session;
        },
        initOnContentLoad: this.settings.initOnContentLoad,
        beginNegotiation: () => this.beginNegotiation(),
        negotiate: () => this.negotiate(),
      },
    });
  }

  get widgetId(): string {
    return this.settings.id;
  }

  get state(): SessionState {
    return this.session;
  }

  /** Host-initiated requests still waiting for the widget. */
  get pendingRequestCount(): number {
    return this.proxy.pendingCount;
  }

  /**
   * Serve the widget until the transport closes. Resolves on a normal close;
   * rejects with the first error a request handler could not turn into a
   * reply, after the session has been shut down.
   */
  async run(): Promise<void> {
    if (this.started) {
      throw new InvalidStateError("Driver has already been started");
    }
    this.started = true;
    this.logger.info("Widget driver started", {
      widgetId: this.settings.id,
      initOnContentLoad: this.settings.initOnContentLoad,
    });

    if (!this.settings.initOnContentLoad && this.beginNegotiation()) {
      this.track(this.negotiate());
    }

    for await (const text of this.transport.messages) {
      this.handleText(text);
    }

    this.shutdown();
    await this.forwarding;
    if (this.fatalError !== null) throw this.fatalError;
  }

  /**
   * Replace the approved capabilities of an initialized session and tell the
   * widget. The read subscription is reopened for the new read filters.
   */
  async updateCapabilities(approved: Permissions): Promise<void> {
    const current = this.session;
    if (current.status !== "initialized") {
      throw new InvalidStateError(`Cannot update capabilities while ${current.status}`);
    }

    this.stopForwarding();
    const subscription = this.negotiator.subscribe(approved);
    this.transition({ status: "initialized", requested: current.requested, approved });
    this.startForwarding(subscription, approved.read);
    this.emit("capabilities:negotiated", { requested: current.requested, approved });
    await this.negotiator.notify(current.requested, approved);
  }

  /** End the session from the host side; `run()` resolves once the loop drains. */
  close(): void {
    this.transport.close();
  }

  /**
   * Wait for every request task started so far, including ones started while
   * waiting. Rejects with the first handler bug, if there was one.
   */
  async whenIdle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
    if (this.fatalError !== null) throw this.fatalError;
  }

  // ---------------------------------------------------------------------------
  // Message routing
  // ---------------------------------------------------------------------------

  private handleText(text: string): void {
    const decoded = decodeMessage(text);
    if (!decoded.ok) {
      const requestId = decoded.error.requestId ?? null;
      this.logger.warn("Failed to decode widget message", {
        requestId,
        error: decoded.error.message,
      });
      this.emit("protocol:violation", { reason: decoded.error.message, requestId });
      this.track(this.proxy.sendError(requestId, decoded.error.message));
      return;
    }
    this.route(decoded.message);
  }

  private route({ header, action }: WidgetMessage): void {
    if (action.api === "fromWidget") {
      if (action.response !== undefined) {
        this.logger.debug?.("Ignoring echoed reply", { requestId: header.requestId });
        return;
      }
      this.track(this.dispatcher.dispatch(header, action));
      return;
    }

    if (action.response === undefined) {
      this.logger.debug?.("Ignoring echoed request", { requestId: header.requestId });
      return;
    }
    this.track(this.proxy.handleResponse(header, action));
  }

  private track(task: Promise<void>): void {
    const tracked = task
      .catch((err: unknown) => {
        this.fail(err);
      })
      .finally(() => {
        this.tasks.delete(tracked);
      });
    this.tasks.add(tracked);
  }

  /** A handler threw something it should not have: stop serving this widget. */
  private fail(err: unknown): void {
    this.logger.error("Widget request handler failed", { error: err instanceof Error ? err : errorMessage(err) });
    if (this.fatalError === null) this.fatalError = err;
    this.transport.close();
  }

  // ---------------------------------------------------------------------------
  // Negotiation
  // ---------------------------------------------------------------------------

  private beginNegotiation(): boolean {
    if (this.session.status !== "uninitialized") return false;
    this.transition({ status: "negotiating" });
    return true;
  }

  private async negotiate(): Promise<void> {
    let result: NegotiationResult;
    try {
      result = await this.negotiator.negotiate();
    } catch (err) {
      const error = toWidgetApiError(err);
      this.logger.warn("Capability negotiation failed", { error: error.message, code: error.code });
      if (this.session.status === "negotiating") {
        this.transition({ status: "uninitialized" });
      }
      this.emit("negotiation:failed", { error });
      return;
    }

    if (this.session.status !== "negotiating") {
      // Disconnected while the host policy was deciding.
      result.subscription?.close();
      return;
    }

    const { requested, approved } = result;
    this.transition({ status: "initialized", requested, approved });
    this.startForwarding(result.subscription, approved.read);
    this.logger.info("Capabilities negotiated", {
      read: approved.read.length,
      send: approved.send.length,
      requiresClient: approved.requiresClient,
    });
    this.emit("capabilities:negotiated", { requested, approved });
    await this.negotiator.notify(requested, approved);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  private transition(next: SessionState): void {
    const from = this.session.status;
    if (!isSessionTransitionAllowed(from, next.status)) {
      throw new InvalidStateError(`Invalid session transition: ${from} -> ${next.status}`);
    }
    this.session = next;
    this.emit("state:changed", { from, to: next.status });
  }

  private startForwarding(
    subscription: RoomEventSubscription | undefined,
    filters: readonly EventFilter[],
  ): void {
    if (!subscription) return;
    const forwarder = new EventForwarder(subscription, this.roomId, filters, this.proxy, this.logger);
    this.forwarder = forwarder;
    const previous = this.forwarding;
    this.forwarding = Promise.all([
      previous,
      forwarder.run().catch((err: unknown) => {
        this.logger.error("Event forwarding stopped", { error: errorMessage(err) });
      }),
    ]).then(() => undefined);
  }

  private stopForwarding(): void {
    this.forwarder?.stop();
    this.forwarder = null;
  }

  private shutdown(): void {
    if (this.session.status !== "disconnected") {
      this.transition({ status: "disconnected" });
    }
    this.stopForwarding();
    this.proxy.cancelAll(new WidgetDisconnectedError());
    this.logger.info("Widget disconnected", { widgetId: this.settings.id });
    this.emit("disconnected", {});
  }
}
