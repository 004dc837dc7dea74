import {
  GOVERNANCE_EVENT_TYPES,
  isGovernanceEventType,
  LedgerError,
  type EventTypeTag,
} from "@provenance/shared";
import type { LedgerContext } from "./context.js";
import { isValidEventType, LIMITS } from "./validation.js";

const GOVERNANCE_LABELS: Record<(typeof GOVERNANCE_EVENT_TYPES)[number], string> = {
  OWNERSHIP_TRANSFER: "Ownership transferred",
  ACCESS_GRANTED: "Write access granted",
  ACCESS_REVOKED: "Write access revoked",
  PRODUCT_DEACTIVATED: "Product deactivated",
  PRODUCT_REACTIVATED: "Product reactivated",
};

/**
 * Display labels for event tags. Purely descriptive: appends never consult
 * the catalog, so unknown tags stay valid.
 */
export function registerEventType(ctx: LedgerContext, tag: string, label: string): EventTypeTag {
  if (!isValidEventType(tag)) {
    throw new LedgerError("invalid_input", "Event type tag is invalid", [
      { field: "tag", message: "must match [A-Za-z0-9_-]{1,32}" },
    ]);
  }
  if (isGovernanceEventType(tag)) {
    throw new LedgerError("invalid_input", `'${tag}' is reserved`, [
      { field: "tag", message: "reserved for governance events" },
    ]);
  }
  const trimmed = label.trim();
  if (trimmed.length === 0 || trimmed.length > LIMITS.eventTypeLabel) {
    throw new LedgerError("invalid_input", "Event type label is invalid", [
      { field: "label", message: `must be 1 to ${LIMITS.eventTypeLabel} characters` },
    ]);
  }

  const registeredAt = ctx.now().toISOString();
  return ctx.store.transaction(() => {
    ctx.store.putEventType({ tag, label: trimmed, registeredAt });
    const stored = ctx.store.getEventType(tag);
    return {
      tag,
      label: trimmed,
      reserved: false,
      registeredAt: stored ? stored.registeredAt : registeredAt,
    };
  });
}

export function listEventTypes(ctx: LedgerContext): EventTypeTag[] {
  const reserved: EventTypeTag[] = GOVERNANCE_EVENT_TYPES.map((tag) => ({
    tag,
    label: GOVERNANCE_LABELS[tag],
    reserved: true,
    registeredAt: null,
  }));
  const registered: EventTypeTag[] = ctx.store.listEventTypes().map((entry) => ({
    tag: entry.tag,
    label: entry.label,
    reserved: false,
    registeredAt: entry.registeredAt,
  }));
  return [...reserved, ...registered];
}
