import { z } from "zod";
import { TransportClosedError } from "../errors.js";
import type { WidgetTransport } from "../interfaces/transport.js";

const wireMessageSchema = z
  .object({
    api: z.enum(["fromWidget", "toWidget"]).optional(),
    requestId: z.string().optional(),
    widgetId: z.string(),
    action: z.string().optional(),
    data: z.unknown(),
    response: z.unknown().optional(),
  })
  .passthrough();

/** A message as it appeared on the wire, parsed but not interpreted. */
export type WireMessage = z.infer<typeof wireMessageSchema>;

interface Waiter {
  match: (message: WireMessage) => boolean;
  resolve: (message: WireMessage) => void;
}

class Mailbox {
  private readonly backlog: WireMessage[] = [];
  private readonly waiters: Waiter[] = [];

  put(message: WireMessage): void {
    const index = this.waiters.findIndex((waiter) => waiter.match(message));
    if (index >= 0) {
      const [waiter] = this.waiters.splice(index, 1);
      waiter.resolve(message);
      return;
    }
    this.backlog.push(message);
  }

  take(match: (message: WireMessage) => boolean): Promise<WireMessage> {
    const index = this.backlog.findIndex(match);
    if (index >= 0) {
      const [message] = this.backlog.splice(index, 1);
      return Promise.resolve(message);
    }
    return new Promise((resolve) => {
      this.waiters.push({ match, resolve });
    });
  }
}

export interface FakeWidgetOptions {
  widgetId?: string;
  /**
   * Capability strings sent back to a `capabilities` request. When unset,
   * capabilities requests wait in `nextRequest()` for a manual answer.
   */
  capabilities?: string[];
  /** Answer notify_capabilities, openid_credentials and send_event with `{}`. Default true. */
  acknowledge?: boolean;
}

/**
 * Scripted widget on the far end of a transport. Sends fromWidget requests,
 * answers (or holds) toWidget requests, and collects out-of-band errors.
 */
export class FakeWidget {
  readonly widgetId: string;
  /** Every toWidget request seen, including the ones answered automatically. */
  readonly requestsSeen: WireMessage[] = [];
  /** Out-of-band errors, in arrival order. */
  readonly errors: WireMessage[] = [];
  readonly malformed: string[] = [];
  /** Settles when the host side closes the channel. */
  readonly closed: Promise<void>;

  private readonly capabilities: string[] | undefined;
  private readonly acknowledge: boolean;
  private readonly requests = new Mailbox();
  private readonly errorBox = new Mailbox();
  private readonly replies = new Map<string, (message: WireMessage) => void>();
  private requestCounter = 0;

  constructor(
    private readonly transport: WidgetTransport,
    options: FakeWidgetOptions = {},
  ) {
    this.widgetId = options.widgetId ?? "test-widget";
    this.capabilities = options.capabilities;
    this.acknowledge = options.acknowledge ?? true;
    this.closed = this.pump();
  }

  /** Send a fromWidget request and wait for the host's reply. */
  request(action: string, data: unknown = {}): Promise<WireMessage> {
    this.requestCounter += 1;
    const requestId = `widget-${this.requestCounter}`;
    const reply = new Promise<WireMessage>((resolve) => {
      this.replies.set(requestId, resolve);
    });
    return this.transport
      .send(JSON.stringify({ api: "fromWidget", requestId, widgetId: this.widgetId, action, data }))
      .then(() => reply);
  }

  sendRaw(text: string): Promise<void> {
    return this.transport.send(text);
  }

  /** Next toWidget request not answered automatically, optionally of one action. */
  nextRequest(action?: string): Promise<WireMessage> {
    return this.requests.take((message) => action === undefined || message.action === action);
  }

  nextError(): Promise<WireMessage> {
    return this.errorBox.take(() => true);
  }

  /** Answer a toWidget request with a success payload or `{ error: { message } }`. */
  respond(request: WireMessage, response: unknown): Promise<void> {
    return this.transport.send(JSON.stringify({ ...request, response }));
  }

  close(): void {
    this.transport.close();
  }

  private async pump(): Promise<void> {
    for await (const text of this.transport.messages) {
      const message = parseWire(text);
      if (!message) {
        this.malformed.push(text);
        continue;
      }
      await this.route(message);
    }
  }

  private async route(message: WireMessage): Promise<void> {
    if (message.api === undefined) {
      this.errors.push(message);
      this.errorBox.put(message);
      return;
    }
    if (message.api === "fromWidget") {
      const resolve = message.requestId === undefined ? undefined : this.replies.get(message.requestId);
      if (resolve && message.requestId !== undefined) {
        this.replies.delete(message.requestId);
        resolve(message);
      }
      return;
    }

    this.requestsSeen.push(message);
    const automatic = this.automaticResponse(message);
    if (automatic === undefined) {
      this.requests.put(message);
      return;
    }
    try {
      await this.respond(message, automatic);
    } catch (err) {
      if (!(err instanceof TransportClosedError)) throw err;
    }
  }

  private automaticResponse(message: WireMessage): unknown {
    if (message.action === "capabilities") {
      return this.capabilities === undefined ? undefined : { capabilities: this.capabilities };
    }
    return this.acknowledge ? {} : undefined;
  }
}

function parseWire(text: string): WireMessage | undefined {
  try {
    const parsed = wireMessageSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}
