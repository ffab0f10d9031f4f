import { type RawData, WebSocket } from "ws";
import { AsyncMessageQueue } from "../core/async-message-queue.js";
import { errorMessage, TransportClosedError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import type { WidgetTransport } from "../interfaces/transport.js";
import { noopLogger } from "../utils/noop-logger.js";

/** The part of a `ws` WebSocket the transport uses. */
export interface WidgetSocket {
  readonly readyState: number;
  send(data: string, cb: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  on(event: "message", listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

/** Widget transport over a WebSocket; one text frame per message. */
export class WsWidgetTransport implements WidgetTransport {
  private readonly inbox = new AsyncMessageQueue<string>();

  constructor(
    private readonly socket: WidgetSocket,
    private readonly logger: Logger = noopLogger,
  ) {
    socket.on("message", (data, isBinary) => {
      if (isBinary) {
        this.logger.warn("Ignoring binary frame from widget");
        return;
      }
      this.inbox.enqueue(rawDataToString(data));
    });

    socket.on("close", () => {
      this.inbox.finish();
    });

    socket.on("error", (err) => {
      this.logger.warn("Widget socket error", { error: errorMessage(err) });
      this.inbox.finish();
    });
  }

  /** Open a client connection to a widget endpoint. Rejects if the handshake fails. */
  static connect(url: string, logger?: Logger): Promise<WsWidgetTransport> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url);
      const onError = (err: Error) => {
        reject(new TransportClosedError(`Failed to connect to ${url}`, { cause: err }));
      };
      socket.once("error", onError);
      socket.once("open", () => {
        socket.off("error", onError);
        resolve(new WsWidgetTransport(socket, logger));
      });
    });
  }

  get messages(): AsyncIterable<string> {
    return this.inbox;
  }

  send(text: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TransportClosedError());
    }
    return new Promise<void>((resolve, reject) => {
      this.socket.send(text, (err) => {
        if (err) {
          reject(new TransportClosedError("Failed to write to widget socket", { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  close(): void {
    this.inbox.finish();
    this.socket.close(1000, "Session closed");
  }
}
