/**
 * Public API barrel.
 *
 * Re-exports the driver, its collaborator interfaces, the wire codec and the
 * filter/capability helpers hosts need to build a permissions policy.
 * @module
 */

// Adapters
export { ChannelTransport, createChannelTransportPair } from "./adapters/channel-transport.js";
export type { ChannelTransportPair } from "./adapters/channel-transport.js";
export { LogLevel, StructuredLogger } from "./adapters/structured-logger.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export { WsWidgetTransport } from "./adapters/ws-widget-transport.js";
export type { WidgetSocket } from "./adapters/ws-widget-transport.js";

// Config
export { widgetDriverConfigSchema, widgetSettingsSchema } from "./config/config-schema.js";
export type { ResolvedConfig, WidgetDriverConfig, WidgetSettings } from "./types/config.js";
export { DEFAULT_CONFIG, resolveConfig } from "./types/config.js";

// Core
export {
  parseCapabilities,
  REQUIRES_CLIENT_CAPABILITY,
  serializeCapabilities,
} from "./core/capabilities.js";
export {
  matchesAny,
  matchesFilter,
  messageLikeWithType,
  ROOM_MESSAGE_TYPE,
  roomMessageWithMsgtype,
  stateWithType,
  stateWithTypeAndStateKey,
  toFilterInput,
} from "./core/event-filter.js";
export type { FilterInput, FilterInputResult } from "./core/event-filter.js";
export { decodeMessage, encodeErrorMessage, encodeMessage } from "./core/message-codec.js";
export type { DecodeResult } from "./core/message-codec.js";
export { SUPPORTED_API_VERSIONS } from "./core/request-dispatcher.js";
export { isSessionTransitionAllowed, SESSION_STATUSES } from "./core/session-state.js";
export type { SessionState, SessionStatus } from "./core/session-state.js";
export { WidgetDriver } from "./core/widget-driver.js";
export type { WidgetDriverEvents, WidgetDriverOptions } from "./core/widget-driver.js";

// Errors
export {
  DecodeError,
  errorMessage,
  InvalidStateError,
  PermissionDeniedError,
  ProtocolViolationError,
  RequestTimeoutError,
  TransportClosedError,
  toWidgetApiError,
  UpstreamError,
  WidgetApiError,
  WidgetDisconnectedError,
  WidgetErrorReplyError,
} from "./errors.js";

// Interfaces
export type { Logger } from "./interfaces/logger.js";
export type { PermissionsProvider } from "./interfaces/permissions-provider.js";
export type {
  OpenIdToken,
  ReadEventsQuery,
  RoomDriver,
  RoomEventSubscription,
  SendEventCommand,
} from "./interfaces/room-driver.js";
export type { WidgetTransport } from "./interfaces/transport.js";

// Types
export type { EventFilter, EventFilterKind, Permissions } from "./types/permissions.js";
export { emptyPermissions } from "./types/permissions.js";
export type {
  CapabilitiesResponse,
  CapabilitiesUpdate,
  FromWidgetAction,
  Header,
  OpenIdResponse,
  RawEvent,
  ReadEventsRequest,
  ReadEventsResponse,
  ResponseBody,
  SendEventRequest,
  SendEventResponse,
  ToWidgetAction,
  WidgetAction,
  WidgetMessage,
} from "./types/widget-messages.js";
export { failure, success } from "./types/widget-messages.js";

// Utils
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
