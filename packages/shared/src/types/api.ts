import type { ValidationIssue } from "../errors.js";
import type { Product, RegisterProductInput } from "./product.js";
import type {
  ChainVerification,
  EventPage,
  EventStream,
  EventTypeTag,
  TrackingEvent,
  TrackingEventInput,
} from "./events.js";

export interface ErrorResponse {
  error: string;
  message?: string;
  details?: ValidationIssue[];
}

export type RegisterProductRequest = RegisterProductInput;

export interface ProductResponse {
  product: Product;
}

export interface AddTrackingEventRequest extends TrackingEventInput {
  actor: string;
}

export interface TrackingEventResponse {
  event: TrackingEvent;
}

export type AddTrackingEventResponse = TrackingEventResponse;

export interface AddTrackingEventsBatchRequest {
  actor: string;
  events: TrackingEventInput[];
}

export interface AddTrackingEventsBatchResponse {
  productId: string;
  events: TrackingEvent[];
}

export interface GetTimelineResponse {
  productId: string;
  stream: EventStream;
  events: TrackingEvent[];
}

export type QueryEventsResponse = EventPage;

export interface EventCountResponse {
  productId: string;
  eventType?: string;
  count: number;
}

export type VerifyChainResponse = ChainVerification;

export interface IsAuthorizedResponse {
  productId: string;
  actor: string;
  authorized: boolean;
}

export interface TransferOwnershipRequest {
  currentOwner: string;
  newOwner: string;
}

export interface ChangeActorRequest {
  owner: string;
  actor: string;
}

export interface SetProductActiveRequest {
  owner: string;
  active: boolean;
}

export interface GovernanceChangeResponse {
  product: Product;
  changed: boolean;
  event?: TrackingEvent;
}

export interface RegisterEventTypeRequest {
  tag: string;
  label: string;
}

export interface EventTypeResponse {
  eventType: EventTypeTag;
}

export interface ListEventTypesResponse {
  eventTypes: EventTypeTag[];
}
