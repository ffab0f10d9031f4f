/**
 * WidgetProxy: the host's side of the conversation with one widget.
 *
 * Sends host-initiated requests and waits for their correlated replies,
 * writes replies to widget-initiated requests, and reports traffic that
 * cannot be correlated as out-of-band errors.
 */

import { randomUUID } from "node:crypto";
import {
  errorMessage,
  ProtocolViolationError,
  WidgetDisconnectedError,
  WidgetErrorReplyError,
} from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { WidgetTransport } from "../interfaces/transport.js";
import type { FromWidgetAction, Header, ToWidgetAction } from "../types/widget-messages.js";
import { noopLogger } from "../utils/noop-logger.js";
import { encodeErrorMessage, encodeMessage } from "./message-codec.js";
import type { OutgoingRequest } from "./outgoing-requests.js";
import { PendingRequestTable } from "./pending-request-table.js";

export const UNEXPECTED_RESPONSE_MESSAGE = "Unexpected response from a widget";
export const INVALID_RESPONSE_MESSAGE = "Widget sent invalid response";

export interface WidgetProxyOptions {
  transport: Pick<WidgetTransport, "send">;
  widgetId: string;
  requestTimeoutMs: number;
  logger?: Logger;
  /** Correlation id source for host-initiated requests. */
  generateRequestId?: () => string;
}

export class WidgetProxy {
  private readonly transport: Pick<WidgetTransport, "send">;
  private readonly widgetId: string;
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;
  private readonly generateRequestId: () => string;
  private readonly pending = new PendingRequestTable();

  constructor(options: WidgetProxyOptions) {
    this.transport = options.transport;
    this.widgetId = options.widgetId;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.logger = options.logger ?? noopLogger;
    this.generateRequestId = options.generateRequestId ?? randomUUID;
  }

  /**
   * Send a request to the widget and wait for its reply.
   *
   * @throws WidgetDisconnectedError if the request could not be written
   * @throws RequestTimeoutError if no reply arrived in time
   * @throws ProtocolViolationError if the reply does not answer this request
   * @throws WidgetErrorReplyError if the widget answered with an error
   */
  async send<R>(outgoing: OutgoingRequest<R>): Promise<R> {
    const requestId = this.generateRequestId();
    const text = encodeMessage({
      header: { requestId, widgetId: this.widgetId },
      action: outgoing.request,
    });

    // Registered before the write so that a fast reply always finds its slot.
    const reply = this.pending.register(requestId, this.requestTimeoutMs);
    const written = this.write(text).catch((err: unknown) => {
      const error = new WidgetDisconnectedError("Failed to send request to widget", { cause: err });
      this.pending.cancel(requestId, error);
      throw error;
    });
    const [, response] = await Promise.all([written, reply]);

    const body = outgoing.extractResponse(response);
    if (!body) {
      throw new ProtocolViolationError(INVALID_RESPONSE_MESSAGE);
    }
    if (body.kind === "failure") {
      throw new WidgetErrorReplyError(body.error.message);
    }
    return body.value;
  }

  /**
   * Route a widget's reply to the request waiting for it. A reply nobody is
   * waiting for (late, duplicate or made up) is answered out-of-band.
   */
  async handleResponse(header: Header, action: ToWidgetAction): Promise<void> {
    if (this.pending.resolve(header.requestId, action)) return;
    this.logger.warn("Unexpected response from widget", {
      requestId: header.requestId,
      action: action.action,
    });
    await this.sendError(header.requestId, UNEXPECTED_RESPONSE_MESSAGE);
  }

  /**
   * Answer a widget-initiated request. Returns false when the reply could not
   * be written; the widget is gone and there is nobody left to tell.
   */
  async reply(header: Header, action: FromWidgetAction): Promise<boolean> {
    const text = encodeMessage({ header, action });
    try {
      await this.transport.send(text);
      return true;
    } catch (err) {
      this.logger.warn("Dropped reply to widget", {
        requestId: header.requestId,
        action: action.action,
        error: errorMessage(err),
      });
      return false;
    }
  }

  async sendError(requestId: string | null, message: string): Promise<void> {
    try {
      await this.transport.send(encodeErrorMessage(this.widgetId, requestId, message));
    } catch (err) {
      this.logger.warn("Dropped error message to widget", {
        requestId,
        message,
        error: errorMessage(err),
      });
    }
  }

  /** `transport.send`, with a synchronous throw turned into a rejection. */
  private write(text: string): Promise<void> {
    try {
      return this.transport.send(text);
    } catch (err) {
      return Promise.reject(err);
    }
  }

  /** Fail every request still waiting for a reply. */
  cancelAll(error: Error = new WidgetDisconnectedError()): void {
    this.pending.cancelAll(error);
  }

  hasPending(requestId: string): boolean {
    return this.pending.has(requestId);
  }

  get pendingCount(): number {
    return this.pending.size;
  }
}
