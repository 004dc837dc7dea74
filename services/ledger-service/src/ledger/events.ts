import {
  LedgerError,
  type ChainVerification,
  type EventFilter,
  type EventPage,
  type EventRange,
  type EventStream,
  type TrackingEvent,
  type TrackingEventInput,
  type ValidationIssue,
} from "@provenance/shared";
import type { EventFilterParams, EventHead, LedgerStore } from "../storage/ledger-store.js";
import { authorize, checkWriteAccess, type CallAuthorizer } from "./authorization.js";
import type { LedgerContext } from "./context.js";
import { sealEvent, verifyChain } from "./hash-chain.js";
import { loadProduct } from "./registry.js";
import { validateEventInput } from "./validation.js";

export const MAX_PAGE_LIMIT = 500;

export interface EventDraft {
  eventType: string;
  location: string;
  metadata: string;
  dataHash: string | null;
  note: string;
}

export function toDraft(input: TrackingEventInput): EventDraft {
  return {
    eventType: input.eventType,
    location: input.location,
    metadata: input.metadata ?? "",
    dataHash: input.dataHash ?? null,
    note: input.note ?? "",
  };
}

function readHead(ctx: LedgerContext, productId: string, stream: EventStream): EventHead {
  loadProduct(ctx, productId);
  const head = ctx.store.getEventHead(productId, stream);
  if (!head) {
    throw new LedgerError("conflict", `${stream} history for '${productId}' is missing its head`);
  }
  return head;
}

/**
 * Appends drafts after the current head as one contiguous block. Must run
 * inside the caller's transaction: a failed insert or head update throws and
 * takes every earlier write of the operation with it.
 */
export function appendEvents(
  ctx: LedgerContext,
  productId: string,
  stream: EventStream,
  actor: string,
  drafts: EventDraft[],
): TrackingEvent[] {
  const head = readHead(ctx, productId, stream);
  const timestamp = ctx.now().toISOString();
  let sequence = head.nextSequence;
  let previousHash = head.headHash;

  const events = drafts.map((draft) => {
    const event = sealEvent({ productId, stream, sequence, actor, ...draft, timestamp, previousHash });
    sequence += 1;
    previousHash = event.eventHash;
    return event;
  });

  for (const event of events) {
    if (!ctx.store.insertEvent(event)) {
      throw new LedgerError("conflict", `Sequence ${event.sequence} of '${productId}' is already taken`);
    }
  }
  if (!ctx.store.advanceEventHead(productId, stream, head.nextSequence, { nextSequence: sequence, headHash: previousHash })) {
    throw new LedgerError("conflict", `Event head of '${productId}' moved concurrently`);
  }
  return events;
}

export function assertBatchSize(ctx: LedgerContext, count: number): void {
  if (count > ctx.policy.maxBatchSize) {
    throw new LedgerError(
      "batch_too_large",
      `Batch of ${count} events exceeds the limit of ${ctx.policy.maxBatchSize}`,
    );
  }
  if (count === 0) {
    throw new LedgerError("invalid_batch", "Batch must contain at least one event", [
      { field: "events", message: "must not be empty" },
    ]);
  }
}

export function addTrackingEvent(
  ctx: LedgerContext,
  call: CallAuthorizer,
  productId: string,
  actor: string,
  input: TrackingEventInput,
): TrackingEvent {
  return ctx.store.transaction(() => {
    const { product } = loadProduct(ctx, productId);
    authorize(ctx, call, actor);
    checkWriteAccess(product, actor);
    if (!product.active) {
      throw new LedgerError("product_inactive", `Product '${productId}' is inactive`);
    }

    const issues = validateEventInput(input, ctx.policy.maxMetadataBytes);
    if (issues.length > 0) {
      throw new LedgerError("invalid_input", "Tracking event is invalid", issues);
    }

    const [event] = appendEvents(ctx, productId, "custody", actor, [toDraft(input)]);
    ctx.logger.info({ productId, sequence: event.sequence, eventType: event.eventType }, "event appended");
    return event;
  });
}

/** All-or-nothing: every input is validated before the first write. */
export function addTrackingEventsBatch(
  ctx: LedgerContext,
  call: CallAuthorizer,
  productId: string,
  actor: string,
  inputs: TrackingEventInput[],
): TrackingEvent[] {
  assertBatchSize(ctx, inputs.length);

  return ctx.store.transaction(() => {
    const { product } = loadProduct(ctx, productId);
    authorize(ctx, call, actor);
    checkWriteAccess(product, actor);
    if (!product.active) {
      throw new LedgerError("product_inactive", `Product '${productId}' is inactive`);
    }

    const issues: ValidationIssue[] = inputs.flatMap((input, index) =>
      validateEventInput(input, ctx.policy.maxMetadataBytes, index),
    );
    if (issues.length > 0) {
      throw new LedgerError("invalid_batch", `Batch rejected: ${issues.length} invalid field(s)`, issues);
    }

    const events = appendEvents(ctx, productId, "custody", actor, inputs.map(toDraft));
    ctx.logger.info(
      { productId, firstSequence: events[0].sequence, count: events.length },
      "event batch appended",
    );
    return events;
  });
}

function isSequence(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

function isSequenceBound(value: number | undefined): boolean {
  return value === undefined || isSequence(value);
}

function* readChunks(
  store: LedgerStore,
  productId: string,
  stream: EventStream,
  from: number,
  to: number,
  chunkSize: number,
): Generator<TrackingEvent, void, undefined> {
  for (let start = from; start < to; start += chunkSize) {
    yield* store.listEvents(productId, stream, start, Math.min(start + chunkSize, to));
  }
}

/**
 * Lazy read of `[from, to)`, bounded by the head seen when the call is made.
 * Events appended afterwards are not included; calling again restarts.
 */
export function iterateTrackingEvents(
  ctx: LedgerContext,
  productId: string,
  range: EventRange = {},
  stream: EventStream = "custody",
): Generator<TrackingEvent, void, undefined> {
  if (!isSequenceBound(range.from) || !isSequenceBound(range.to)) {
    throw new LedgerError("invalid_input", "Range bounds must be non-negative integers");
  }
  const head = readHead(ctx, productId, stream);
  const from = range.from ?? 0;
  const to = Math.min(range.to ?? head.nextSequence, head.nextSequence);
  return readChunks(ctx.store, productId, stream, from, to, ctx.policy.readChunkSize);
}

export function getTrackingEvents(
  ctx: LedgerContext,
  productId: string,
  range: EventRange = {},
): TrackingEvent[] {
  return Array.from(iterateTrackingEvents(ctx, productId, range));
}

export function getGovernanceEvents(
  ctx: LedgerContext,
  productId: string,
  range: EventRange = {},
): TrackingEvent[] {
  return Array.from(iterateTrackingEvents(ctx, productId, range, "governance"));
}

export function getTrackingEvent(
  ctx: LedgerContext,
  productId: string,
  sequence: number,
  stream: EventStream = "custody",
): TrackingEvent {
  if (!isSequence(sequence)) {
    throw new LedgerError("invalid_input", "sequence must be a non-negative integer");
  }
  loadProduct(ctx, productId);
  const event = ctx.store.getEvent(productId, stream, sequence);
  if (!event) {
    throw new LedgerError("not_found", `Event ${sequence} of product '${productId}' does not exist`);
  }
  return event;
}

function toFilterParams(productId: string, filter: EventFilter): EventFilterParams {
  return {
    productId,
    stream: "custody",
    eventType: filter.eventType ?? null,
    location: filter.location ?? null,
    since: filter.since ?? null,
    until: filter.until ?? null,
  };
}

export function queryTrackingEvents(
  ctx: LedgerContext,
  productId: string,
  filter: EventFilter = {},
  offset = 0,
  limit = 50,
): EventPage {
  if (!isSequence(offset)) {
    throw new LedgerError("invalid_input", "offset must be a non-negative integer");
  }
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_LIMIT) {
    throw new LedgerError("invalid_input", `limit must be between 1 and ${MAX_PAGE_LIMIT}`);
  }
  loadProduct(ctx, productId);

  const params = toFilterParams(productId, filter);
  const totalCount = ctx.store.countEvents(params);
  const events = ctx.store.queryEvents({ ...params, offset, limit });
  return {
    productId,
    stream: "custody",
    events,
    totalCount,
    hasMore: offset + events.length < totalCount,
  };
}

/** Total comes from the head counter; per-type counts query the index. */
export function getEventCount(ctx: LedgerContext, productId: string, eventType?: string): number {
  const head = readHead(ctx, productId, "custody");
  if (eventType === undefined) return head.nextSequence;
  return ctx.store.countEvents(toFilterParams(productId, { eventType }));
}

export function verifyEventChain(
  ctx: LedgerContext,
  productId: string,
  stream: EventStream = "custody",
): ChainVerification {
  const head = readHead(ctx, productId, stream);
  const events = readChunks(ctx.store, productId, stream, 0, head.nextSequence, ctx.policy.readChunkSize);
  return verifyChain(productId, stream, events, head);
}
