import fc from "fast-check";
import type { EventFilter, Permissions } from "../../types/permissions.js";
import {
  failure,
  type ResponseBody,
  success,
  type WidgetAction,
  type WidgetMessage,
} from "../../types/widget-messages.js";
import type { FilterInput } from "../event-filter.js";

/** Identifier-ish strings: no `#`, no line breaks, never empty. */
export const arbToken = fc.stringMatching(/^[a-z][a-z0-9._-]{0,11}$/);

export const arbFilter: fc.Arbitrary<EventFilter> = fc.oneof(
  arbToken.map((eventType) => ({ kind: "message_like_with_type" as const, eventType })),
  arbToken.map((msgtype) => ({ kind: "room_message_with_msgtype" as const, msgtype })),
  arbToken.map((eventType) => ({ kind: "state_with_type" as const, eventType })),
  fc
    .tuple(arbToken, fc.stringMatching(/^[a-z0-9@:#._-]{0,12}$/))
    .map(([eventType, stateKey]) => ({
      kind: "state_with_type_and_state_key" as const,
      eventType,
      stateKey,
    })),
);

export const arbPermissions: fc.Arbitrary<Permissions> = fc.record({
  read: fc.array(arbFilter, { maxLength: 4 }),
  send: fc.array(arbFilter, { maxLength: 4 }),
  requiresClient: fc.boolean(),
});

export const arbFilterInput: fc.Arbitrary<FilterInput> = fc.record(
  {
    eventType: fc.oneof(arbToken, fc.constant("m.room.message"), fc.constant("m.room.topic")),
    stateKey: fc.oneof(fc.constant(""), arbToken),
    content: fc.record({ msgtype: fc.oneof(arbToken, fc.constant("m.text")) }, { requiredKeys: [] }),
  },
  { requiredKeys: ["eventType", "content"] },
);

const arbJsonScalar = fc.oneof(fc.string(), fc.integer(), fc.boolean());

/** Keys stay short so `__proto__` never comes up. */
const arbRecord = fc.dictionary(fc.stringMatching(/^[a-z_]{1,8}$/), arbJsonScalar, { maxKeys: 4 });

function arbResponse<T>(value: fc.Arbitrary<T>): fc.Arbitrary<ResponseBody<T> | undefined> {
  return fc.option(
    fc.oneof(
      value.map((v): ResponseBody<T> => success(v)),
      fc.string().map((message): ResponseBody<T> => failure(message)),
    ),
    { nil: undefined },
  );
}

const empty = fc.constant({});

const arbOpenId = fc.oneof(
  fc.constant({ state: "request" as const }),
  arbToken.map((id) => ({ state: "blocked" as const, original_request_id: id })),
  fc.record({
    state: fc.constant("allowed" as const),
    original_request_id: arbToken,
    access_token: fc.string(),
    expires_in: fc.nat(),
    matrix_server_name: arbToken,
    token_type: fc.constant("Bearer"),
  }),
);

export const arbAction: fc.Arbitrary<WidgetAction> = fc.oneof(
  fc.record({
    api: fc.constant("fromWidget" as const),
    action: fc.constant("supported_api_versions" as const),
    data: empty,
    response: arbResponse(fc.record({ supported_versions: fc.array(arbToken) })),
  }),
  fc.record({
    api: fc.constant("fromWidget" as const),
    action: fc.constant("content_loaded" as const),
    data: empty,
    response: arbResponse(empty),
  }),
  fc.record({
    api: fc.constant("fromWidget" as const),
    action: fc.constant("get_openid" as const),
    data: empty,
    response: arbResponse(arbOpenId),
  }),
  fc.record({
    api: fc.constant("fromWidget" as const),
    action: fc.constant("send_event" as const),
    data: fc.record(
      { type: arbToken, state_key: fc.string(), content: arbRecord },
      { requiredKeys: ["type", "content"] },
    ),
    response: arbResponse(fc.record({ room_id: arbToken, event_id: arbToken })),
  }),
  fc.record({
    api: fc.constant("fromWidget" as const),
    action: fc.constant("read_events" as const),
    data: fc.record(
      {
        type: arbToken,
        state_key: fc.oneof(fc.string(), fc.constant(true as const)),
        limit: fc.integer({ min: 1, max: 500 }),
      },
      { requiredKeys: ["type"] },
    ),
    response: arbResponse(fc.record({ events: fc.array(arbRecord, { maxLength: 3 }) })),
  }),
  fc.record({
    api: fc.constant("toWidget" as const),
    action: fc.constant("capabilities" as const),
    data: empty,
    response: arbResponse(fc.record({ capabilities: arbPermissions })),
  }),
  fc.record({
    api: fc.constant("toWidget" as const),
    action: fc.constant("notify_capabilities" as const),
    data: fc.record({ requested: arbPermissions, approved: arbPermissions }),
    response: arbResponse(empty),
  }),
  fc.record({
    api: fc.constant("toWidget" as const),
    action: fc.constant("openid_credentials" as const),
    data: arbOpenId,
    response: arbResponse(empty),
  }),
  fc.record({
    api: fc.constant("toWidget" as const),
    action: fc.constant("send_event" as const),
    data: arbRecord,
    response: arbResponse(empty),
  }),
);

export const arbMessage: fc.Arbitrary<WidgetMessage> = fc.record({
  header: fc.record({ requestId: arbToken, widgetId: fc.string() }),
  action: arbAction,
});
