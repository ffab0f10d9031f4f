/**
 * RequestDispatcher: answers the requests a widget sends to the host.
 *
 * Each request gets exactly one correlated reply. Reads and sends are gated
 * by the approved capabilities; failures of the room collaborator are
 * relayed to the widget with the collaborator's own message.
 */

import {
  errorMessage,
  InvalidStateError,
  PermissionDeniedError,
  UpstreamError,
  WidgetApiError,
} from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { RoomDriver } from "../interfaces/room-driver.js";
import type { ResolvedConfig } from "../types/config.js";
import type { EventFilter, Permissions } from "../types/permissions.js";
import {
  type Empty,
  failure,
  type FromWidgetAction,
  type Header,
  type OpenIdResponse,
  type RawEvent,
  type ReadEventsRequest,
  type ReadEventsResponse,
  type ResponseBody,
  type SendEventRequest,
  type SendEventResponse,
  type SupportedApiVersionsResponse,
  success,
} from "../types/widget-messages.js";
import { noopLogger } from "../utils/noop-logger.js";
import { matchesAny, sendRequestToFilterInput, toFilterInput } from "./event-filter.js";
import { openIdCredentialsUpdate } from "./outgoing-requests.js";
import type { SessionState } from "./session-state.js";
import type { WidgetProxy } from "./widget-proxy.js";

export const SUPPORTED_API_VERSIONS: readonly string[] = [
  "0.0.1",
  "0.0.2",
  "org.matrix.msc2762",
  "org.matrix.msc2871",
  "org.matrix.msc3819",
];

export const ALREADY_LOADED_MESSAGE = "Already loaded";
export const NOT_NEGOTIATED_MESSAGE = "Capabilities not negotiated";
export const NO_READ_PERMISSION_MESSAGE = "No permission to read any events";
export const NO_SEND_PERMISSION_MESSAGE = "Not allowed to send any events";
export const SEND_NOT_ALLOWED_MESSAGE = "Event not allowed by send filters";

/** The dispatcher's view of the session it serves. */
export interface SessionControl {
  readonly state: SessionState;
  /** When false the driver negotiates on start and `content_loaded` is only acknowledged. */
  readonly initOnContentLoad: boolean;
  /** Claim the single negotiation slot. False when the session is past `uninitialized`. */
  beginNegotiation(): boolean;
  /** Run the negotiation claimed with `beginNegotiation()`. Never rejects. */
  negotiate(): Promise<void>;
}

export interface RequestDispatcherOptions {
  proxy: WidgetProxy;
  room: RoomDriver;
  session: SessionControl;
  config: ResolvedConfig;
  logger?: Logger;
}

export class RequestDispatcher {
  private readonly proxy: WidgetProxy;
  private readonly room: RoomDriver;
  private readonly session: SessionControl;
  private readonly config: ResolvedConfig;
  private readonly logger: Logger;

  constructor(options: RequestDispatcherOptions) {
    this.proxy = options.proxy;
    this.room = options.room;
    this.session = options.session;
    this.config = options.config;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Handle one widget request through to its reply (and, for `content_loaded`
   * and `get_openid`, the follow-up work). Errors that are not
   * `WidgetApiError`s are bugs and propagate.
   */
  async dispatch(header: Header, action: FromWidgetAction): Promise<void> {
    this.logger.debug?.("Widget request", { requestId: header.requestId, action: action.action });

    switch (action.action) {
      case "supported_api_versions":
        await this.proxy.reply(header, {
          ...action,
          response: await this.attempt(() => this.supportedApiVersions()),
        });
        return;

      case "content_loaded":
        await this.contentLoaded(header, action);
        return;

      case "get_openid":
        await this.proxy.reply(header, {
          ...action,
          response: success<OpenIdResponse>({ state: "request" }),
        });
        await this.pushOpenIdCredentials(header.requestId);
        return;

      case "read_events":
        await this.proxy.reply(header, {
          ...action,
          response: await this.attempt(() => this.readEvents(action.data)),
        });
        return;

      case "send_event":
        await this.proxy.reply(header, {
          ...action,
          response: await this.attempt(() => this.sendEvent(action.data)),
        });
        return;
    }
  }

  private async attempt<T>(handler: () => Promise<T>): Promise<ResponseBody<T>> {
    try {
      return success(await handler());
    } catch (err) {
      if (err instanceof WidgetApiError) return failure(err.message);
      throw err;
    }
  }

  private async supportedApiVersions(): Promise<SupportedApiVersionsResponse> {
    return { supported_versions: [...SUPPORTED_API_VERSIONS] };
  }

  private async contentLoaded(
    header: Header,
    action: Extract<FromWidgetAction, { action: "content_loaded" }>,
  ): Promise<void> {
    if (!this.session.initOnContentLoad) {
      await this.proxy.reply(header, { ...action, response: success<Empty>({}) });
      return;
    }
    if (!this.session.beginNegotiation()) {
      await this.proxy.reply(header, { ...action, response: failure(ALREADY_LOADED_MESSAGE) });
      return;
    }
    await this.proxy.reply(header, { ...action, response: success<Empty>({}) });
    await this.session.negotiate();
  }

  private async readEvents(request: ReadEventsRequest): Promise<ReadEventsResponse> {
    const { approved } = this.requireInitialized();
    if (approved.read.length === 0) {
      throw new PermissionDeniedError(NO_READ_PERMISSION_MESSAGE);
    }

    const defaultLimit =
      typeof request.state_key === "string"
        ? this.config.defaultStateLimit
        : this.config.defaultMessageLimit;
    const limit = Math.min(request.limit ?? defaultLimit, this.config.maxReadLimit);

    const events = await this.callRoom("readEvents", () =>
      this.room.readEvents({ eventType: request.type, stateKey: request.state_key, limit }),
    );
    return {
      events: events.filter((event) => this.isReadable(event, approved.read, request.state_key)),
    };
  }

  private isReadable(
    event: RawEvent,
    filters: readonly EventFilter[],
    stateKey: string | true | undefined,
  ): boolean {
    const parsed = toFilterInput(event);
    if (!parsed.ok) {
      this.logger.warn("Skipping unreadable room event", { reason: parsed.reason });
      return false;
    }
    if (!matchesAny(filters, parsed.input)) return false;
    return typeof stateKey !== "string" || parsed.input.stateKey === stateKey;
  }

  private async sendEvent(request: SendEventRequest): Promise<SendEventResponse> {
    const { approved } = this.requireInitialized();
    if (approved.send.length === 0) {
      throw new PermissionDeniedError(NO_SEND_PERMISSION_MESSAGE);
    }
    if (!matchesAny(approved.send, sendRequestToFilterInput(request))) {
      throw new PermissionDeniedError(SEND_NOT_ALLOWED_MESSAGE);
    }

    const eventId = await this.callRoom("sendEvent", () =>
      this.room.sendEvent({
        eventType: request.type,
        stateKey: request.state_key,
        content: request.content,
      }),
    );
    return { room_id: this.room.roomId, event_id: eventId };
  }

  /**
   * Fetch an OpenID token for the widget and push it as `openid_credentials`.
   * Any failure, including the fetch outliving `openIdTimeoutMs`, is reported
   * to the widget as `blocked`.
   */
  private async pushOpenIdCredentials(originalRequestId: string): Promise<void> {
    let credentials: OpenIdResponse;
    try {
      const token = await this.withTimeout(
        this.room.requestOpenIdToken(this.room.ownUserId),
        this.config.openIdTimeoutMs,
        "OpenID token request",
      );
      credentials = { state: "allowed", original_request_id: originalRequestId, ...token };
    } catch (err) {
      this.logger.warn("OpenID token request failed", {
        requestId: originalRequestId,
        error: errorMessage(err),
      });
      credentials = { state: "blocked", original_request_id: originalRequestId };
    }

    try {
      await this.proxy.send(openIdCredentialsUpdate(credentials));
    } catch (err) {
      this.logger.warn("Widget did not acknowledge OpenID credentials", {
        requestId: originalRequestId,
        error: errorMessage(err),
      });
    }
  }

  private requireInitialized(): { approved: Permissions } {
    const state = this.session.state;
    if (state.status !== "initialized") {
      throw new InvalidStateError(NOT_NEGOTIATED_MESSAGE);
    }
    return { approved: state.approved };
  }

  private async callRoom<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      this.logger.warn("Room operation failed", { operation, error: errorMessage(err) });
      throw new UpstreamError(errorMessage(err), { cause: err });
    }
  }

  private withTimeout<T>(promise: Promise<T>, timeoutMs: number, what: string): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`${what} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });
    return Promise.race([promise, timeout]).finally(() => {
      clearTimeout(timer);
    });
  }
}
