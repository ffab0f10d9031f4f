import { z } from "zod";
import { parseCapabilities } from "../core/capabilities.js";

// ── Shared ──

export const emptySchema = z.object({});

export const errorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

export const rawEventSchema = z.record(z.unknown());

const permissionsSchema = z.array(z.string()).transform((caps) => parseCapabilities(caps));

export const openIdResponseSchema = z.discriminatedUnion("state", [
  z.object({ state: z.literal("request") }),
  z.object({ state: z.literal("blocked"), original_request_id: z.string() }),
  z.object({
    state: z.literal("allowed"),
    original_request_id: z.string(),
    access_token: z.string(),
    expires_in: z.number().int().nonnegative(),
    matrix_server_name: z.string(),
    token_type: z.string(),
  }),
]);

// ── fromWidget ──

export const supportedApiVersionsResponseSchema = z.object({
  supported_versions: z.array(z.string()),
});

export const sendEventRequestSchema = z.object({
  type: z.string().min(1),
  state_key: z.string().optional(),
  content: z.record(z.unknown()).default({}),
});

export const sendEventResponseSchema = z.object({
  room_id: z.string(),
  event_id: z.string(),
});

export const readEventsRequestSchema = z.object({
  type: z.string().min(1),
  /** A specific state key, or `true` for any state key. */
  state_key: z.union([z.string(), z.literal(true)]).optional(),
  limit: z.number().int().positive().optional(),
});

export const readEventsResponseSchema = z.object({
  events: z.array(rawEventSchema),
});

// ── toWidget ──

export const capabilitiesResponseSchema = z.object({
  capabilities: permissionsSchema,
});

export const capabilitiesUpdateSchema = z.object({
  requested: permissionsSchema,
  approved: permissionsSchema,
});

// ── Envelope ──

export const envelopeSchema = z.object({
  api: z.enum(["fromWidget", "toWidget"]),
  requestId: z.string().min(1),
  widgetId: z.string(),
  action: z.string(),
  data: z.unknown(),
  response: z.unknown().optional(),
});
