export class WidgetApiError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "WidgetApiError";
    this.code = code;
  }
}

// ── Transport ──

/** The widget went away while we were talking to it. */
export class WidgetDisconnectedError extends WidgetApiError {
  constructor(message = "Widget is disconnected", options?: ErrorOptions) {
    super(message, "DISCONNECTED", options);
    this.name = "WidgetDisconnectedError";
  }
}

/** Raised by a transport whose channel has been closed. */
export class TransportClosedError extends WidgetApiError {
  constructor(message = "Transport is closed", options?: ErrorOptions) {
    super(message, "TRANSPORT_CLOSED", options);
    this.name = "TransportClosedError";
  }
}

export class RequestTimeoutError extends WidgetApiError {
  readonly requestId: string;

  constructor(requestId: string, message: string, options?: ErrorOptions) {
    super(message, "TIMEOUT", options);
    this.name = "RequestTimeoutError";
    this.requestId = requestId;
  }
}

// ── Protocol ──

export class ProtocolViolationError extends WidgetApiError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "PROTOCOL_VIOLATION", options);
    this.name = "ProtocolViolationError";
  }
}

/** Raw text from the widget that is not a well-formed Widget API message. */
export class DecodeError extends ProtocolViolationError {
  /** Present when the envelope was readable enough to recover it. */
  readonly requestId: string | undefined;
  readonly widgetId: string | undefined;

  constructor(
    message: string,
    ids: { requestId?: string; widgetId?: string } = {},
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "DecodeError";
    this.requestId = ids.requestId;
    this.widgetId = ids.widgetId;
  }
}

/** The widget answered one of our requests with `{ error: { message } }`. */
export class WidgetErrorReplyError extends WidgetApiError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "WIDGET_ERROR_REPLY", options);
    this.name = "WidgetErrorReplyError";
  }
}

// ── Request handling ──

export class PermissionDeniedError extends WidgetApiError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "PERMISSION_DENIED", options);
    this.name = "PermissionDeniedError";
  }
}

export class InvalidStateError extends WidgetApiError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "INVALID_STATE", options);
    this.name = "InvalidStateError";
  }
}

/** A room collaborator call failed; the message is the collaborator's own. */
export class UpstreamError extends WidgetApiError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "UPSTREAM", options);
    this.name = "UpstreamError";
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to WidgetApiError (preserves cause chain). */
export function toWidgetApiError(value: unknown): WidgetApiError {
  if (value instanceof WidgetApiError) return value;
  if (value instanceof Error) return new WidgetApiError(value.message, "UNKNOWN", { cause: value });
  return new WidgetApiError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
