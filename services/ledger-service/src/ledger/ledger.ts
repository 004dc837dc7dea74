import type {
  ChainVerification,
  EventFilter,
  EventPage,
  EventRange,
  EventStream,
  EventTypeTag,
  Product,
  RegisterProductInput,
  TrackingEvent,
  TrackingEventInput,
} from "@provenance/shared";
import type { CallAuthorizer } from "./authorization.js";
import { createLedgerContext, type LedgerContext, type LedgerContextOptions, type LedgerPolicy } from "./context.js";
import * as eventLedger from "./events.js";
import * as eventTypes from "./event-types.js";
import * as ownership from "./ownership.js";
import * as registry from "./registry.js";

/**
 * Entry points of the provenance ledger, bound to one injected store.
 * Every write runs as a single transaction: it commits whole or not at all.
 */
export class ProvenanceLedger {
  private readonly ctx: LedgerContext;

  constructor(options: LedgerContextOptions) {
    this.ctx = createLedgerContext(options);
  }

  get policy(): Readonly<LedgerPolicy> {
    return this.ctx.policy;
  }

  registerProduct(call: CallAuthorizer, input: RegisterProductInput): Product {
    return registry.registerProduct(this.ctx, call, input);
  }

  getProduct(productId: string): Product {
    return registry.getProduct(this.ctx, productId);
  }

  isAuthorized(productId: string, actor: string): boolean {
    return registry.isAuthorized(this.ctx, productId, actor);
  }

  addTrackingEvent(
    call: CallAuthorizer,
    productId: string,
    actor: string,
    input: TrackingEventInput,
  ): TrackingEvent {
    return eventLedger.addTrackingEvent(this.ctx, call, productId, actor, input);
  }

  addTrackingEventsBatch(
    call: CallAuthorizer,
    productId: string,
    actor: string,
    inputs: TrackingEventInput[],
  ): TrackingEvent[] {
    return eventLedger.addTrackingEventsBatch(this.ctx, call, productId, actor, inputs);
  }

  /** Fails fast with `batch_too_large` before any input is looked at. */
  assertBatchSize(count: number): void {
    eventLedger.assertBatchSize(this.ctx, count);
  }

  iterateTrackingEvents(productId: string, range?: EventRange): Generator<TrackingEvent, void, undefined> {
    return eventLedger.iterateTrackingEvents(this.ctx, productId, range);
  }

  getTrackingEvents(productId: string, range?: EventRange): TrackingEvent[] {
    return eventLedger.getTrackingEvents(this.ctx, productId, range);
  }

  getTrackingEvent(productId: string, sequence: number, stream?: EventStream): TrackingEvent {
    return eventLedger.getTrackingEvent(this.ctx, productId, sequence, stream);
  }

  getGovernanceEvents(productId: string, range?: EventRange): TrackingEvent[] {
    return eventLedger.getGovernanceEvents(this.ctx, productId, range);
  }

  queryTrackingEvents(productId: string, filter?: EventFilter, offset?: number, limit?: number): EventPage {
    return eventLedger.queryTrackingEvents(this.ctx, productId, filter, offset, limit);
  }

  getEventCount(productId: string, eventType?: string): number {
    return eventLedger.getEventCount(this.ctx, productId, eventType);
  }

  verifyEventChain(productId: string, stream?: EventStream): ChainVerification {
    return eventLedger.verifyEventChain(this.ctx, productId, stream);
  }

  transferOwnership(
    call: CallAuthorizer,
    productId: string,
    currentOwner: string,
    newOwner: string,
  ): ownership.GovernanceChange {
    return ownership.transferOwnership(this.ctx, call, productId, currentOwner, newOwner);
  }

  addAuthorizedActor(
    call: CallAuthorizer,
    productId: string,
    owner: string,
    actor: string,
  ): ownership.GovernanceChange {
    return ownership.addAuthorizedActor(this.ctx, call, productId, owner, actor);
  }

  removeAuthorizedActor(
    call: CallAuthorizer,
    productId: string,
    owner: string,
    actor: string,
  ): ownership.GovernanceChange {
    return ownership.removeAuthorizedActor(this.ctx, call, productId, owner, actor);
  }

  setProductActive(
    call: CallAuthorizer,
    productId: string,
    owner: string,
    active: boolean,
  ): ownership.GovernanceChange {
    return ownership.setProductActive(this.ctx, call, productId, owner, active);
  }

  registerEventType(tag: string, label: string): EventTypeTag {
    return eventTypes.registerEventType(this.ctx, tag, label);
  }

  listEventTypes(): EventTypeTag[] {
    return eventTypes.listEventTypes(this.ctx);
  }
}
