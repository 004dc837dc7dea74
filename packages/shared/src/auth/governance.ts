import { firstHeaderValue } from "./headers.js";

export const GOVERNANCE_ROLE_HEADER = "x-governance-role";

export type GovernanceRoleSet = Set<string>;

function normalizeRole(value: string): string {
  return value.trim().toLowerCase();
}

export function parseGovernanceRoleHeader(value: unknown): string | null {
  const raw = firstHeaderValue(value);
  return raw ? normalizeRole(raw) : null;
}

/**
 * Parses a comma separated role list such as `registry-admin,auditor`.
 * `*` admits any caller, an empty value falls back to `fallbackRoles`.
 */
export function parseGovernanceRoleSet(
  raw: string | undefined,
  fallbackRoles: string[],
): GovernanceRoleSet {
  const source = (raw || "").trim();
  if (!source) {
    return new Set(fallbackRoles.map(normalizeRole));
  }
  if (source === "*") {
    return new Set(["*"]);
  }
  return new Set(
    source
      .split(",")
      .map(normalizeRole)
      .filter((role) => role.length > 0),
  );
}

export function isGovernanceRoleAllowed(
  role: string | null,
  allowedRoles: GovernanceRoleSet,
): boolean {
  if (allowedRoles.has("*")) return true;
  if (!role) return false;
  return allowedRoles.has(role);
}
