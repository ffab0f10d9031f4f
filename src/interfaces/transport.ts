/**
 * The text channel between host and widget (postMessage, a WebSocket, an
 * in-process pipe). The driver owns it for the lifetime of a session.
 */
export interface WidgetTransport {
  /** Write one message. Rejects with `TransportClosedError` once the channel is closed. */
  send(text: string): Promise<void>;
  /** Incoming messages in arrival order. Ends when the channel closes. */
  readonly messages: AsyncIterable<string>;
  close(): void;
}
