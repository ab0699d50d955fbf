/**
 * Role Types
 *
 * Three flat capabilities. There is no hierarchy: holding ADMIN does
 * not imply BUFFER or RESOLVE.
 */

import type { Address } from "./identifiers.js";

export type Role = "BUFFER" | "RESOLVE" | "ADMIN";

export const ROLES: readonly Role[] = ["BUFFER", "RESOLVE", "ADMIN"];

export interface RoleGrant {
  readonly role: Role;
  readonly account: Address;
  readonly granted: boolean;
}
