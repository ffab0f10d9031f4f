import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import {
  ProtocolViolationError,
  RequestTimeoutError,
  TransportClosedError,
  WidgetDisconnectedError,
  WidgetErrorReplyError,
} from "../errors.js";
import type { Logger } from "../interfaces/logger.js";
import { stateWithType } from "./event-filter.js";
import { capabilitiesRequest, capabilitiesUpdate, sendEventToWidget } from "./outgoing-requests.js";
import { WidgetProxy } from "./widget-proxy.js";

function createTransport() {
  const sent: string[] = [];
  const send = vi.fn(async (text: string) => {
    sent.push(text);
  });
  return { sent, send };
}

function createLogger(): Logger & { warn: Mock } {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const topicOnly = { read: [stateWithType("m.room.topic")], send: [], requiresClient: false };

describe("WidgetProxy", () => {
  let transport: ReturnType<typeof createTransport>;
  let logger: ReturnType<typeof createLogger>;
  let counter: number;
  let proxy: WidgetProxy;

  beforeEach(() => {
    transport = createTransport();
    logger = createLogger();
    counter = 0;
    proxy = new WidgetProxy({
      transport,
      widgetId: "w1",
      requestTimeoutMs: 10_000,
      logger,
      generateRequestId: () => `req-${++counter}`,
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("send", () => {
    it("writes the request and resolves with the widget's answer", async () => {
      const result = proxy.send(capabilitiesRequest());

      expect(JSON.parse(transport.sent[0])).toEqual({
        api: "toWidget",
        requestId: "req-1",
        widgetId: "w1",
        action: "capabilities",
        data: {},
      });

      await proxy.handleResponse(
        { requestId: "req-1", widgetId: "w1" },
        {
          api: "toWidget",
          action: "capabilities",
          data: {},
          response: { kind: "success", value: { capabilities: topicOnly } },
        },
      );

      await expect(result).resolves.toEqual({ capabilities: topicOnly });
      expect(proxy.pendingCount).toBe(0);
    });

    it("surfaces an error reply as WidgetErrorReplyError", async () => {
      const result = proxy.send(capabilitiesUpdate(topicOnly, topicOnly));
      await proxy.handleResponse(
        { requestId: "req-1", widgetId: "w1" },
        {
          api: "toWidget",
          action: "notify_capabilities",
          data: { requested: topicOnly, approved: topicOnly },
          response: { kind: "failure", error: { message: "widget says no" } },
        },
      );

      await expect(result).rejects.toBeInstanceOf(WidgetErrorReplyError);
      await expect(result).rejects.toThrow("widget says no");
    });

    it("rejects a reply of another action kind", async () => {
      const result = proxy.send(capabilitiesRequest());
      await proxy.handleResponse(
        { requestId: "req-1", widgetId: "w1" },
        { api: "toWidget", action: "send_event", data: {}, response: { kind: "success", value: {} } },
      );

      await expect(result).rejects.toBeInstanceOf(ProtocolViolationError);
      await expect(result).rejects.toThrow("Widget sent invalid response");
    });

    it("rejects a reply without a response", async () => {
      const result = proxy.send(sendEventToWidget({ type: "m.room.topic" }));
      await proxy.handleResponse(
        { requestId: "req-1", widgetId: "w1" },
        { api: "toWidget", action: "send_event", data: { type: "m.room.topic" } },
      );

      await expect(result).rejects.toThrow("Widget sent invalid response");
    });

    it("fails with WidgetDisconnectedError when the write fails, leaving nothing pending", async () => {
      transport.send.mockRejectedValueOnce(new TransportClosedError());

      const result = proxy.send(capabilitiesRequest());

      await expect(result).rejects.toBeInstanceOf(WidgetDisconnectedError);
      expect(proxy.pendingCount).toBe(0);
    });

    it("treats a transport that throws like a failed write", async () => {
      vi.useFakeTimers();
      const cause = new TypeError("socket gone");
      transport.send.mockImplementationOnce(() => {
        throw cause;
      });

      const result = proxy.send(capabilitiesRequest());

      await expect(result).rejects.toMatchObject({
        name: "WidgetDisconnectedError",
        message: "Failed to send request to widget",
        cause,
      });
      expect(proxy.pendingCount).toBe(0);
      await vi.advanceTimersByTimeAsync(10_000);
      expect(vi.getTimerCount()).toBe(0);
    });

    it("times out after the configured bound and drops the entry", async () => {
      vi.useFakeTimers();
      const result = proxy.send(capabilitiesRequest());
      const settled = expect(result).rejects.toBeInstanceOf(RequestTimeoutError);

      await vi.advanceTimersByTimeAsync(10_000);

      await settled;
      expect(proxy.hasPending("req-1")).toBe(false);
    });

    it("answers a late reply out-of-band", async () => {
      vi.useFakeTimers();
      const result = proxy.send(capabilitiesRequest());
      const settled = expect(result).rejects.toBeInstanceOf(RequestTimeoutError);
      await vi.advanceTimersByTimeAsync(10_000);
      await settled;

      await proxy.handleResponse(
        { requestId: "req-1", widgetId: "w1" },
        { api: "toWidget", action: "capabilities", data: {}, response: { kind: "success", value: { capabilities: topicOnly } } },
      );

      expect(transport.sent).toHaveLength(2);
      expect(transport.sent[1]).toBe(
        '{"widgetId":"w1","requestId":"req-1","response":{"error":{"message":"Unexpected response from a widget"}}}',
      );
      expect(logger.warn).toHaveBeenCalledWith("Unexpected response from widget", {
        requestId: "req-1",
        action: "capabilities",
      });
    });

    it("gives every concurrent request its own id", async () => {
      const uuidProxy = new WidgetProxy({ transport, widgetId: "w1", requestTimeoutMs: 10_000 });
      const results = Array.from({ length: 50 }, () =>
        uuidProxy.send(capabilitiesRequest()).catch((err: unknown) => err),
      );

      const ids = transport.sent.map((text) => JSON.parse(text).requestId);
      expect(new Set(ids).size).toBe(50);
      expect(uuidProxy.pendingCount).toBe(50);

      uuidProxy.cancelAll();
      for (const outcome of await Promise.all(results)) {
        expect(outcome).toBeInstanceOf(WidgetDisconnectedError);
      }
    });
  });

  describe("reply", () => {
    it("writes the correlated reply", async () => {
      const delivered = await proxy.reply(
        { requestId: "w-7", widgetId: "w1" },
        {
          api: "fromWidget",
          action: "supported_api_versions",
          data: {},
          response: { kind: "success", value: { supported_versions: ["0.0.2"] } },
        },
      );

      expect(delivered).toBe(true);
      expect(JSON.parse(transport.sent[0])).toEqual({
        api: "fromWidget",
        requestId: "w-7",
        widgetId: "w1",
        action: "supported_api_versions",
        data: {},
        response: { supported_versions: ["0.0.2"] },
      });
    });

    it("logs and reports a reply it could not write", async () => {
      transport.send.mockRejectedValueOnce(new TransportClosedError());

      const delivered = await proxy.reply(
        { requestId: "w-8", widgetId: "w1" },
        { api: "fromWidget", action: "content_loaded", data: {}, response: { kind: "success", value: {} } },
      );

      expect(delivered).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith("Dropped reply to widget", {
        requestId: "w-8",
        action: "content_loaded",
        error: "Transport is closed",
      });
    });
  });

  describe("sendError", () => {
    it("logs when the error cannot be written", async () => {
      transport.send.mockRejectedValueOnce(new TransportClosedError());

      await proxy.sendError(null, "Invalid JSON");

      expect(logger.warn).toHaveBeenCalledWith("Dropped error message to widget", {
        requestId: null,
        message: "Invalid JSON",
        error: "Transport is closed",
      });
    });
  });
});
