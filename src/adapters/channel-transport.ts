/**
 * In-process transport pair: whatever one end sends, the other end receives.
 * Closing either end closes the channel in both directions.
 *
 * Used by tests and by hosts that run the widget in the same process.
 */

import { AsyncMessageQueue } from "../core/async-message-queue.js";
import { TransportClosedError } from "../errors.js";
import type { WidgetTransport } from "../interfaces/transport.js";

class Channel {
  readonly toHost = new AsyncMessageQueue<string>();
  readonly toWidget = new AsyncMessageQueue<string>();
  closed = false;

  close(): void {
    this.closed = true;
    this.toHost.finish();
    this.toWidget.finish();
  }
}

export class ChannelTransport implements WidgetTransport {
  constructor(
    private readonly channel: Channel,
    private readonly inbox: AsyncMessageQueue<string>,
    private readonly outbox: AsyncMessageQueue<string>,
  ) {}

  get messages(): AsyncIterable<string> {
    return this.inbox;
  }

  get isClosed(): boolean {
    return this.channel.closed;
  }

  async send(text: string): Promise<void> {
    if (this.channel.closed) throw new TransportClosedError();
    this.outbox.enqueue(text);
  }

  close(): void {
    this.channel.close();
  }
}

export interface ChannelTransportPair {
  /** Hand this end to the driver. */
  host: ChannelTransport;
  widget: ChannelTransport;
}

export function createChannelTransportPair(): ChannelTransportPair {
  const channel = new Channel();
  return {
    host: new ChannelTransport(channel, channel.toHost, channel.toWidget),
    widget: new ChannelTransport(channel, channel.toWidget, channel.toHost),
  };
}
