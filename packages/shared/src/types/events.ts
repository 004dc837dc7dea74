export const GOVERNANCE_EVENT_TYPES = [
  "OWNERSHIP_TRANSFER",
  "ACCESS_GRANTED",
  "ACCESS_REVOKED",
  "PRODUCT_DEACTIVATED",
  "PRODUCT_REACTIVATED",
] as const;

export type GovernanceEventType = (typeof GOVERNANCE_EVENT_TYPES)[number];

export function isGovernanceEventType(value: string): value is GovernanceEventType {
  return (GOVERNANCE_EVENT_TYPES as readonly string[]).includes(value);
}

/**
 * Each product keeps two append-only streams: custody events written by
 * actors, and governance events the ledger writes for ownership, access and
 * activity changes. Sequences are counted per stream.
 */
export const EVENT_STREAMS = ["custody", "governance"] as const;

export type EventStream = (typeof EVENT_STREAMS)[number];

export interface TrackingEventInput {
  eventType: string;
  location: string;
  metadata?: string;
  dataHash?: string;
  note?: string;
}

export interface TrackingEvent {
  productId: string;
  stream: EventStream;
  sequence: number;       // 0-based, contiguous per product and stream
  actor: string;
  eventType: string;
  location: string;
  metadata: string;       // opaque, never parsed by the ledger
  dataHash: string | null;
  note: string;
  timestamp: string;      // ISO date, ledger time
  previousHash: string;
  eventHash: string;
}

/** Half-open sequence range `[from, to)`. */
export interface EventRange {
  from?: number;
  to?: number;
}

export interface EventFilter {
  eventType?: string;
  location?: string;
  since?: string;
  until?: string;
}

export interface EventPage {
  productId: string;
  stream: EventStream;
  events: TrackingEvent[];
  totalCount: number;
  hasMore: boolean;
}

export interface EventTypeTag {
  tag: string;
  label: string;
  reserved: boolean;
  registeredAt: string | null;
}

export type ChainBreakReason = "sequence_gap" | "chain_break" | "hash_mismatch";

export interface ChainVerification {
  productId: string;
  stream: EventStream;
  valid: boolean;
  checked: number;
  breakpoint?: number;
  reason?: ChainBreakReason;
}
