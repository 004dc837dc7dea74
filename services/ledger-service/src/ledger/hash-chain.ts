import {
  canonicalJson,
  sha256Hex,
  ZERO_HASH_HEX,
  type ChainVerification,
  type EventStream,
  type TrackingEvent,
} from "@provenance/shared";
import type { EventHead } from "../storage/ledger-store.js";

export type UnhashedEvent = Omit<TrackingEvent, "eventHash">;

/** sha256 over the canonical JSON of every field except the hash itself. */
export function computeEventHash(event: UnhashedEvent): string {
  return sha256Hex(
    canonicalJson({
      productId: event.productId,
      stream: event.stream,
      sequence: event.sequence,
      actor: event.actor,
      eventType: event.eventType,
      location: event.location,
      metadata: event.metadata,
      dataHash: event.dataHash,
      note: event.note,
      timestamp: event.timestamp,
      previousHash: event.previousHash,
    }),
  );
}

export function sealEvent(event: UnhashedEvent): TrackingEvent {
  return { ...event, eventHash: computeEventHash(event) };
}

/**
 * Walks one stream of a product's history from sequence 0 and reports the first event whose
 * position, link or content hash does not line up. With `head`, the walk must
 * also end exactly at the stored head.
 */
export function verifyChain(
  productId: string,
  stream: EventStream,
  events: Iterable<TrackingEvent>,
  head?: EventHead,
): ChainVerification {
  let expectedSequence = 0;
  let previousHash = ZERO_HASH_HEX;

  for (const event of events) {
    if (event.sequence !== expectedSequence) {
      return { productId, stream, valid: false, checked: expectedSequence, breakpoint: expectedSequence, reason: "sequence_gap" };
    }
    if (event.previousHash !== previousHash) {
      return { productId, stream, valid: false, checked: expectedSequence, breakpoint: event.sequence, reason: "chain_break" };
    }
    if (computeEventHash(event) !== event.eventHash) {
      return { productId, stream, valid: false, checked: expectedSequence, breakpoint: event.sequence, reason: "hash_mismatch" };
    }
    previousHash = event.eventHash;
    expectedSequence += 1;
  }

  if (head && head.nextSequence !== expectedSequence) {
    return { productId, stream, valid: false, checked: expectedSequence, breakpoint: expectedSequence, reason: "sequence_gap" };
  }
  if (head && head.headHash !== previousHash) {
    const breakpoint = expectedSequence === 0 ? 0 : expectedSequence - 1;
    return { productId, stream, valid: false, checked: expectedSequence, breakpoint, reason: "chain_break" };
  }

  return { productId, stream, valid: true, checked: expectedSequence };
}
