import { buildSignedRequestHeaders } from "../auth/request-signature.js";
import { GOVERNANCE_ROLE_HEADER } from "../auth/governance.js";
import { buildServiceAuthHeaders } from "../auth/service-auth.js";
import { isLedgerErrorCode, LedgerError, type ValidationIssue } from "../errors.js";
import type {
  AddTrackingEventResponse,
  AddTrackingEventsBatchResponse,
  EventCountResponse,
  EventTypeResponse,
  GetTimelineResponse,
  GovernanceChangeResponse,
  IsAuthorizedResponse,
  ListEventTypesResponse,
  ProductResponse,
  QueryEventsResponse,
  TrackingEventResponse,
  VerifyChainResponse,
} from "../types/api.js";
import type {
  EventFilter,
  EventRange,
  EventStream,
  EventTypeTag,
  TrackingEvent,
  TrackingEventInput,
} from "../types/events.js";
import type { Product, RegisterProductInput } from "../types/product.js";

const DEFAULT_TIMEOUT_MS = 5000;

export interface LedgerClientOptions {
  baseUrl: string;
  /** Hex Ed25519 private key the client signs write requests with. */
  privateKeyHex?: string;
  serviceAuthToken?: string;
  timeoutMs?: number;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function toLedgerError(status: number, body: unknown): Error {
  if (isObject(body) && isLedgerErrorCode(body.error)) {
    const message = typeof body.message === "string" ? body.message : body.error;
    const issues = Array.isArray(body.details) ? (body.details as ValidationIssue[]) : [];
    return new LedgerError(body.error, message, issues);
  }
  const code = isObject(body) && typeof body.error === "string" ? body.error : "unknown_error";
  return new Error(`ledger_service_error:${status}:${code}`);
}

/**
 * Thin `fetch` wrapper over the ledger service. Writes are signed with the
 * configured key; reads need no key.
 */
export class LedgerClient {
  private readonly baseUrl: string;
  private readonly privateKeyHex?: string;
  private readonly serviceAuthToken?: string;
  private readonly timeoutMs: number;

  constructor(options: LedgerClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.privateKeyHex = options.privateKeyHex;
    this.serviceAuthToken = options.serviceAuthToken;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async registerProduct(input: RegisterProductInput): Promise<Product> {
    const res = await this.write<ProductResponse>("/products", input);
    return res.product;
  }

  async getProduct(productId: string): Promise<Product> {
    const res = await this.read<ProductResponse>(`/products/${encodeURIComponent(productId)}`);
    return res.product;
  }

  async addTrackingEvent(
    productId: string,
    actor: string,
    input: TrackingEventInput,
  ): Promise<TrackingEvent> {
    const res = await this.write<AddTrackingEventResponse>(
      `/products/${encodeURIComponent(productId)}/events`,
      { actor, ...input },
    );
    return res.event;
  }

  async addTrackingEventsBatch(
    productId: string,
    actor: string,
    events: TrackingEventInput[],
  ): Promise<TrackingEvent[]> {
    const res = await this.write<AddTrackingEventsBatchResponse>(
      `/products/${encodeURIComponent(productId)}/events/batch`,
      { actor, events },
    );
    return res.events;
  }

  async getTrackingEvents(productId: string, range: EventRange = {}): Promise<TrackingEvent[]> {
    return this.readTimeline(`/products/${encodeURIComponent(productId)}/events`, range);
  }

  async getGovernanceEvents(productId: string, range: EventRange = {}): Promise<TrackingEvent[]> {
    return this.readTimeline(`/products/${encodeURIComponent(productId)}/governance`, range);
  }

  async getTrackingEvent(productId: string, sequence: number): Promise<TrackingEvent> {
    const res = await this.read<TrackingEventResponse>(
      `/products/${encodeURIComponent(productId)}/events/${sequence}`,
    );
    return res.event;
  }

  async getEventCount(productId: string, eventType?: string): Promise<number> {
    const suffix = eventType === undefined ? "" : `?eventType=${encodeURIComponent(eventType)}`;
    const res = await this.read<EventCountResponse>(
      `/products/${encodeURIComponent(productId)}/event-count${suffix}`,
    );
    return res.count;
  }

  async isAuthorized(productId: string, actor: string): Promise<boolean> {
    const res = await this.read<IsAuthorizedResponse>(
      `/products/${encodeURIComponent(productId)}/actors/${encodeURIComponent(actor)}`,
    );
    return res.authorized;
  }

  async queryTrackingEvents(
    productId: string,
    filter: EventFilter,
    offset = 0,
    limit = 50,
  ): Promise<QueryEventsResponse> {
    const query = new URLSearchParams({ offset: String(offset), limit: String(limit) });
    for (const [key, value] of Object.entries(filter)) {
      if (typeof value === "string") query.set(key, value);
    }
    return this.read<QueryEventsResponse>(
      `/products/${encodeURIComponent(productId)}/events/search?${query.toString()}`,
    );
  }

  async verifyEventChain(productId: string, stream: EventStream = "custody"): Promise<VerifyChainResponse> {
    return this.read<VerifyChainResponse>(
      `/products/${encodeURIComponent(productId)}/verify?stream=${stream}`,
    );
  }

  async transferOwnership(
    productId: string,
    currentOwner: string,
    newOwner: string,
  ): Promise<GovernanceChangeResponse> {
    return this.write<GovernanceChangeResponse>(
      `/products/${encodeURIComponent(productId)}/transfer`,
      { currentOwner, newOwner },
    );
  }

  async addAuthorizedActor(
    productId: string,
    owner: string,
    actor: string,
  ): Promise<GovernanceChangeResponse> {
    return this.write<GovernanceChangeResponse>(
      `/products/${encodeURIComponent(productId)}/actors`,
      { owner, actor },
    );
  }

  async removeAuthorizedActor(
    productId: string,
    owner: string,
    actor: string,
  ): Promise<GovernanceChangeResponse> {
    return this.write<GovernanceChangeResponse>(
      `/products/${encodeURIComponent(productId)}/actors/remove`,
      { owner, actor },
    );
  }

  async setProductActive(
    productId: string,
    owner: string,
    active: boolean,
  ): Promise<GovernanceChangeResponse> {
    return this.write<GovernanceChangeResponse>(
      `/products/${encodeURIComponent(productId)}/active`,
      { owner, active },
    );
  }

  async listEventTypes(): Promise<EventTypeTag[]> {
    const res = await this.read<ListEventTypesResponse>("/event-types");
    return res.eventTypes;
  }

  /** Needs a role the service admits for catalog changes. */
  async registerEventType(tag: string, label: string, governanceRole: string): Promise<EventTypeTag> {
    const res = await this.write<EventTypeResponse>(
      "/event-types",
      { tag, label },
      { [GOVERNANCE_ROLE_HEADER]: governanceRole },
    );
    return res.eventType;
  }

  private async readTimeline(path: string, range: EventRange): Promise<TrackingEvent[]> {
    const query = new URLSearchParams();
    if (range.from !== undefined) query.set("from", String(range.from));
    if (range.to !== undefined) query.set("to", String(range.to));
    const encoded = query.toString();
    const res = await this.read<GetTimelineResponse>(encoded ? `${path}?${encoded}` : path);
    return res.events;
  }

  private async read<T>(path: string): Promise<T> {
    const response = await fetch(`${this.baseUrl}${path}`, {
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    return this.parse<T>(response);
  }

  private async write<T>(path: string, body: unknown, extraHeaders: Record<string, string> = {}): Promise<T> {
    const json = JSON.stringify(body);
    // Sign what the server will parse, without undefined fields.
    const wireBody: unknown = JSON.parse(json);
    const signatureHeaders = this.privateKeyHex
      ? await buildSignedRequestHeaders({ method: "POST", path, body: wireBody }, this.privateKeyHex)
      : {};
    const response = await fetch(`${this.baseUrl}${path}`, {
      method: "POST",
      headers: {
        ...buildServiceAuthHeaders(this.serviceAuthToken),
        ...signatureHeaders,
        ...extraHeaders,
        "content-type": "application/json",
      },
      body: json,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    return this.parse<T>(response);
  }

  private async parse<T>(response: Response): Promise<T> {
    const text = await response.text();
    const body: unknown = text ? JSON.parse(text) : undefined;
    if (!response.ok) {
      throw toLedgerError(response.status, body);
    }
    return body as T;
  }
}
