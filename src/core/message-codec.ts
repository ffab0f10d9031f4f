/**
 * Widget API wire codec.
 *
 * Wire messages are flat JSON objects:
 *   `{ api, requestId, widgetId, action, data, response? }`
 * where a successful `response` is the bare payload and a failed one is
 * `{ error: { message } }`. Capabilities travel as strings and are converted
 * to `Permissions` here, so nothing past the codec sees capability strings.
 */

import { z } from "zod";
import { DecodeError } from "../errors.js";
import {
  capabilitiesResponseSchema,
  capabilitiesUpdateSchema,
  emptySchema,
  envelopeSchema,
  errorBodySchema,
  openIdResponseSchema,
  rawEventSchema,
  readEventsRequestSchema,
  readEventsResponseSchema,
  sendEventRequestSchema,
  sendEventResponseSchema,
  supportedApiVersionsResponseSchema,
} from "../types/widget-message-schema.js";
import type {
  FromWidgetAction,
  ResponseBody,
  ToWidgetAction,
  WidgetAction,
  WidgetMessage,
} from "../types/widget-messages.js";
import { serializeCapabilities } from "./capabilities.js";

export type DecodeResult = { ok: true; message: WidgetMessage } | { ok: false; error: DecodeError };

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

function encodeResponse(body: ResponseBody<unknown> | undefined): unknown {
  if (body === undefined) return undefined;
  return body.kind === "success" ? body.value : { error: body.error };
}

function encodePayload(action: WidgetAction): { data: unknown; response: unknown } {
  if (action.api === "toWidget") {
    switch (action.action) {
      case "capabilities": {
        const body = action.response;
        return {
          data: action.data,
          response:
            body?.kind === "success"
              ? { capabilities: serializeCapabilities(body.value.capabilities) }
              : encodeResponse(body),
        };
      }
      case "notify_capabilities":
        return {
          data: {
            requested: serializeCapabilities(action.data.requested),
            approved: serializeCapabilities(action.data.approved),
          },
          response: encodeResponse(action.response),
        };
      case "openid_credentials":
      case "send_event":
        return { data: action.data, response: encodeResponse(action.response) };
    }
  }
  return { data: action.data, response: encodeResponse(action.response) };
}

/** Serialize a message. Throws only on values that cannot be JSON (a bug). */
export function encodeMessage(message: WidgetMessage): string {
  const { data, response } = encodePayload(message.action);
  return JSON.stringify({
    api: message.action.api,
    requestId: message.header.requestId,
    widgetId: message.header.widgetId,
    action: message.action.action,
    data,
    response,
  });
}

/**
 * Out-of-band error for traffic that cannot be answered with a correlated
 * reply. `requestId` is omitted when the offending message had none.
 */
export function encodeErrorMessage(
  widgetId: string,
  requestId: string | null,
  message: string,
): string {
  return JSON.stringify({
    widgetId,
    ...(requestId !== null ? { requestId } : {}),
    response: { error: { message } },
  });
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function decodeResponse<S extends z.ZodTypeAny>(
  raw: unknown,
  schema: S,
): { response?: ResponseBody<z.output<S>> } {
  if (raw === undefined) return {};
  const error = errorBodySchema.safeParse(raw);
  if (error.success) return { response: { kind: "failure", error: error.data.error } };
  return { response: { kind: "success", value: schema.parse(raw) } };
}

function decodeFromWidget(action: string, data: unknown, response: unknown): FromWidgetAction {
  switch (action) {
    case "supported_api_versions":
      return {
        api: "fromWidget",
        action: "supported_api_versions",
        data: emptySchema.parse(data ?? {}),
        ...decodeResponse(response, supportedApiVersionsResponseSchema),
      };
    case "content_loaded":
      return {
        api: "fromWidget",
        action: "content_loaded",
        data: emptySchema.parse(data ?? {}),
        ...decodeResponse(response, emptySchema),
      };
    case "get_openid":
      return {
        api: "fromWidget",
        action: "get_openid",
        data: emptySchema.parse(data ?? {}),
        ...decodeResponse(response, openIdResponseSchema),
      };
    case "send_event":
      return {
        api: "fromWidget",
        action: "send_event",
        data: sendEventRequestSchema.parse(data),
        ...decodeResponse(response, sendEventResponseSchema),
      };
    case "read_events":
      return {
        api: "fromWidget",
        action: "read_events",
        data: readEventsRequestSchema.parse(data),
        ...decodeResponse(response, readEventsResponseSchema),
      };
    default:
      throw new DecodeError(`Unknown fromWidget action: ${action}`);
  }
}

function decodeToWidget(action: string, data: unknown, response: unknown): ToWidgetAction {
  switch (action) {
    case "capabilities":
      return {
        api: "toWidget",
        action: "capabilities",
        data: emptySchema.parse(data ?? {}),
        ...decodeResponse(response, capabilitiesResponseSchema),
      };
    case "notify_capabilities":
      return {
        api: "toWidget",
        action: "notify_capabilities",
        data: capabilitiesUpdateSchema.parse(data),
        ...decodeResponse(response, emptySchema),
      };
    case "openid_credentials":
      return {
        api: "toWidget",
        action: "openid_credentials",
        data: openIdResponseSchema.parse(data),
        ...decodeResponse(response, emptySchema),
      };
    case "send_event":
      return {
        api: "toWidget",
        action: "send_event",
        data: rawEventSchema.parse(data),
        ...decodeResponse(response, emptySchema),
      };
    default:
      throw new DecodeError(`Unknown toWidget action: ${action}`);
  }
}

function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Best-effort id recovery so an error can still point at the offending request. */
function recoverIds(value: unknown): { requestId?: string; widgetId?: string } {
  if (typeof value !== "object" || value === null) return {};
  const ids: { requestId?: string; widgetId?: string } = {};
  if ("requestId" in value && typeof value.requestId === "string") ids.requestId = value.requestId;
  if ("widgetId" in value && typeof value.widgetId === "string") ids.widgetId = value.widgetId;
  return ids;
}

export function decodeMessage(text: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, error: new DecodeError(`Invalid JSON: ${reason}`, {}, { cause: err }) };
  }

  const envelope = envelopeSchema.safeParse(parsed);
  if (!envelope.success) {
    return {
      ok: false,
      error: new DecodeError(`Invalid message envelope: ${formatZodError(envelope.error)}`, recoverIds(parsed)),
    };
  }

  const { api, requestId, widgetId, action, data, response } = envelope.data;
  const ids = { requestId, widgetId };
  try {
    const decoded =
      api === "fromWidget"
        ? decodeFromWidget(action, data, response)
        : decodeToWidget(action, data, response);
    return { ok: true, message: { header: { requestId, widgetId }, action: decoded } };
  } catch (err) {
    if (err instanceof z.ZodError) {
      return {
        ok: false,
        error: new DecodeError(`Invalid ${api} ${action} message: ${formatZodError(err)}`, ids, {
          cause: err,
        }),
      };
    }
    if (err instanceof DecodeError) {
      return { ok: false, error: new DecodeError(err.message, ids) };
    }
    throw err;
  }
}
