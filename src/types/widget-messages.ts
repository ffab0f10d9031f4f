/**
 * In-memory model of every Widget API message the driver sends or receives.
 *
 * One variant per action, tagged first by `api` (who initiated the request)
 * and then by `action` (the wire action name), so a switch over a message is
 * checked for exhaustiveness when an action is added.
 * @module
 */

import type { z } from "zod";
import type {
  emptySchema,
  openIdResponseSchema,
  rawEventSchema,
  readEventsRequestSchema,
  readEventsResponseSchema,
  sendEventRequestSchema,
  sendEventResponseSchema,
  supportedApiVersionsResponseSchema,
} from "./widget-message-schema.js";
import type { Permissions } from "./permissions.js";

export type Empty = z.infer<typeof emptySchema>;
export type RawEvent = z.infer<typeof rawEventSchema>;
export type OpenIdResponse = z.infer<typeof openIdResponseSchema>;
export type SupportedApiVersionsResponse = z.infer<typeof supportedApiVersionsResponseSchema>;
export type SendEventRequest = z.infer<typeof sendEventRequestSchema>;
export type SendEventResponse = z.infer<typeof sendEventResponseSchema>;
export type ReadEventsRequest = z.infer<typeof readEventsRequestSchema>;
export type ReadEventsResponse = z.infer<typeof readEventsResponseSchema>;

export interface CapabilitiesResponse {
  capabilities: Permissions;
}

export interface CapabilitiesUpdate {
  requested: Permissions;
  approved: Permissions;
}

export interface ErrorBody {
  message: string;
}

export type ResponseBody<T> =
  | { kind: "success"; value: T }
  | { kind: "failure"; error: ErrorBody };

export interface Header {
  /** Correlation id, generated by the side that sends the request. */
  requestId: string;
  widgetId: string;
}

/** Requests the widget sends to us, and our replies to them. */
export type FromWidgetAction =
  | {
      api: "fromWidget";
      action: "supported_api_versions";
      data: Empty;
      response?: ResponseBody<SupportedApiVersionsResponse>;
    }
  | { api: "fromWidget"; action: "content_loaded"; data: Empty; response?: ResponseBody<Empty> }
  | {
      api: "fromWidget";
      action: "get_openid";
      data: Empty;
      response?: ResponseBody<OpenIdResponse>;
    }
  | {
      api: "fromWidget";
      action: "send_event";
      data: SendEventRequest;
      response?: ResponseBody<SendEventResponse>;
    }
  | {
      api: "fromWidget";
      action: "read_events";
      data: ReadEventsRequest;
      response?: ResponseBody<ReadEventsResponse>;
    };

/** Requests we send to the widget, and the widget's replies to them. */
export type ToWidgetAction =
  | {
      api: "toWidget";
      action: "capabilities";
      data: Empty;
      response?: ResponseBody<CapabilitiesResponse>;
    }
  | {
      api: "toWidget";
      action: "notify_capabilities";
      data: CapabilitiesUpdate;
      response?: ResponseBody<Empty>;
    }
  | {
      api: "toWidget";
      action: "openid_credentials";
      data: OpenIdResponse;
      response?: ResponseBody<Empty>;
    }
  | { api: "toWidget"; action: "send_event"; data: RawEvent; response?: ResponseBody<Empty> };

export type WidgetAction = FromWidgetAction | ToWidgetAction;

export type FromWidgetActionName = FromWidgetAction["action"];
export type ToWidgetActionName = ToWidgetAction["action"];

export interface WidgetMessage {
  header: Header;
  action: WidgetAction;
}

export function success<T>(value: T): { kind: "success"; value: T } {
  return { kind: "success", value };
}

export function failure(message: string): { kind: "failure"; error: ErrorBody } {
  return { kind: "failure", error: { message } };
}
