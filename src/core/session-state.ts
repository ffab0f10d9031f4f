/**
 * Session state: what the driver knows about one widget connection.
 *
 * `initialized` carries both what the widget asked for and what the host
 * granted; the granted set gates every read and send.
 *
 * @module
 */

import type { Permissions } from "../types/permissions.js";

export const SESSION_STATUSES = ["uninitialized", "negotiating", "initialized", "disconnected"] as const;

export type SessionStatus = (typeof SESSION_STATUSES)[number];

export type SessionState =
  | { status: "uninitialized" }
  | { status: "negotiating" }
  | { status: "initialized"; requested: Permissions; approved: Permissions }
  | { status: "disconnected" };

const ALLOWED_TRANSITIONS: Record<SessionStatus, ReadonlySet<SessionStatus>> = {
  uninitialized: new Set(["negotiating", "disconnected"]),
  // back to uninitialized when negotiation fails
  negotiating: new Set(["initialized", "uninitialized", "disconnected"]),
  // initialized → initialized is a host-initiated capability update
  initialized: new Set(["initialized", "disconnected"]),
  disconnected: new Set(),
};

export function isSessionTransitionAllowed(from: SessionStatus, to: SessionStatus): boolean {
  return ALLOWED_TRANSITIONS[from].has(to);
}
