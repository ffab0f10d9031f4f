/**
 * Host-initiated requests. Each descriptor pairs the request we put on the
 * wire with a narrowing of the widget's reply to the response type we expect;
 * a reply of another kind yields `undefined` and fails the call.
 */

import type { Permissions } from "../types/permissions.js";
import type {
  CapabilitiesResponse,
  Empty,
  OpenIdResponse,
  RawEvent,
  ResponseBody,
  ToWidgetAction,
} from "../types/widget-messages.js";

type WithoutResponse<A> = A extends unknown ? Omit<A, "response"> : never;

/** A toWidget action as written by the host: no response yet. */
export type ToWidgetRequest = WithoutResponse<ToWidgetAction>;

export interface OutgoingRequest<R> {
  request: ToWidgetRequest;
  extractResponse(reply: ToWidgetAction): ResponseBody<R> | undefined;
}

export function capabilitiesRequest(): OutgoingRequest<CapabilitiesResponse> {
  return {
    request: { api: "toWidget", action: "capabilities", data: {} },
    extractResponse: (reply) => (reply.action === "capabilities" ? reply.response : undefined),
  };
}

export function capabilitiesUpdate(
  requested: Permissions,
  approved: Permissions,
): OutgoingRequest<Empty> {
  return {
    request: { api: "toWidget", action: "notify_capabilities", data: { requested, approved } },
    extractResponse: (reply) => (reply.action === "notify_capabilities" ? reply.response : undefined),
  };
}

export function openIdCredentialsUpdate(credentials: OpenIdResponse): OutgoingRequest<Empty> {
  return {
    request: { api: "toWidget", action: "openid_credentials", data: credentials },
    extractResponse: (reply) => (reply.action === "openid_credentials" ? reply.response : undefined),
  };
}

export function sendEventToWidget(event: RawEvent): OutgoingRequest<Empty> {
  return {
    request: { api: "toWidget", action: "send_event", data: event },
    extractResponse: (reply) => (reply.action === "send_event" ? reply.response : undefined),
  };
}
