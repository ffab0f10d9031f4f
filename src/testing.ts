/**
 * Test utilities, exported from the `"widget-host/testing"` entry point.
 * Hosts can drive a WidgetDriver end to end without a browser or homeserver.
 */
export { createChannelTransportPair } from "./adapters/channel-transport.js";
export type { FakeWidgetOptions, WireMessage } from "./testing/fake-widget.js";
export { FakeWidget } from "./testing/fake-widget.js";
export type { InMemoryRoomDriverOptions } from "./testing/in-memory-room-driver.js";
export { InMemoryRoomDriver } from "./testing/in-memory-room-driver.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
