import { canonicalize } from "json-canonicalize";

/**
 * Canonical JSON per RFC 8785 (JCS).
 * Event hashes and request signatures are computed over this form, so the
 * same record always hashes the same regardless of key order.
 */
export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}
