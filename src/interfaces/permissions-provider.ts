import type { Permissions } from "../types/permissions.js";

/**
 * Host policy deciding which of a widget's requested capabilities to grant.
 * May prompt the user; the driver keeps serving other requests meanwhile.
 */
export interface PermissionsProvider {
  acquirePermissions(desired: Permissions): Promise<Permissions>;
}
