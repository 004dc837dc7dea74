import Fastify, { type FastifyReply, type FastifyRequest } from "fastify";
import type { Logger } from "pino";
import {
  GOVERNANCE_ROLE_HEADER,
  isGovernanceRoleAllowed,
  isServiceAuthAuthorized,
  EVENT_STREAMS,
  LedgerError,
  parseGovernanceRoleHeader,
  SERVICE_AUTH_HEADER,
  verifySignedRequest,
  type AddTrackingEventRequest,
  type AddTrackingEventResponse,
  type AddTrackingEventsBatchResponse,
  type ChangeActorRequest,
  type ErrorResponse,
  type EventCountResponse,
  type EventStream,
  type EventFilter,
  type EventTypeResponse,
  type GetTimelineResponse,
  type IsAuthorizedResponse,
  type ListEventTypesResponse,
  type ProductResponse,
  type RegisterEventTypeRequest,
  type RegisterProductRequest,
  type SetProductActiveRequest,
  type TrackingEventInput,
  type TrackingEventResponse,
  type TransferOwnershipRequest,
} from "@provenance/shared";
import { loadConfig, type LedgerServiceConfig } from "./config.js";
import { signedRequest, UNSIGNED_CALL, type CallAuthorizer } from "./ledger/authorization.js";
import type { LedgerPolicy } from "./ledger/context.js";
import { ProvenanceLedger } from "./ledger/ledger.js";
import { createLogger } from "./logger.js";
import { buildOpenApiSpec } from "./openapi.js";
import { SqliteLedgerStore, type LedgerStore } from "./storage/ledger-store.js";

export interface BuildServerOptions {
  config?: LedgerServiceConfig;
  ledgerStore?: LedgerStore;
  dbPath?: string;
  serviceAuthToken?: string;
  policy?: Partial<LedgerPolicy>;
  signatureMaxSkewMs?: number;
  now?: () => Date;
  logger?: Logger;
}

interface ProductParams {
  productId: string;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isOptionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === "string";
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isObject(value) && Object.values(value).every((item) => typeof item === "string");
}

function parseRegisterRequest(body: unknown): RegisterProductRequest | null {
  if (!isObject(body)) return null;
  if (typeof body.id !== "string") return null;
  if (typeof body.name !== "string") return null;
  if (typeof body.origin !== "string") return null;
  if (!isNonEmptyString(body.owner)) return null;
  if (!isOptionalString(body.description) || !isOptionalString(body.category)) return null;
  if (body.tags !== undefined && !isStringArray(body.tags)) return null;
  if (body.certifications !== undefined && !isStringArray(body.certifications)) return null;
  if (body.mediaHashes !== undefined && !isStringArray(body.mediaHashes)) return null;
  if (body.custom !== undefined && !isStringRecord(body.custom)) return null;
  return {
    id: body.id,
    name: body.name,
    origin: body.origin,
    owner: body.owner,
    description: body.description,
    category: body.category,
    tags: body.tags,
    certifications: body.certifications,
    mediaHashes: body.mediaHashes,
    custom: body.custom,
  };
}

function parseEventInput(value: unknown): TrackingEventInput | null {
  if (!isObject(value)) return null;
  if (typeof value.eventType !== "string") return null;
  if (typeof value.location !== "string") return null;
  if (!isOptionalString(value.metadata) || !isOptionalString(value.note)) return null;
  if (!isOptionalString(value.dataHash)) return null;
  return {
    eventType: value.eventType,
    location: value.location,
    metadata: value.metadata,
    dataHash: value.dataHash,
    note: value.note,
  };
}

function parseAddEventRequest(body: unknown): AddTrackingEventRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.actor)) return null;
  const input = parseEventInput(body);
  return input ? { actor: body.actor, ...input } : null;
}

function parseTransferRequest(body: unknown): TransferOwnershipRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.currentOwner)) return null;
  if (typeof body.newOwner !== "string") return null;
  return { currentOwner: body.currentOwner, newOwner: body.newOwner };
}

function parseChangeActorRequest(body: unknown): ChangeActorRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.owner)) return null;
  if (typeof body.actor !== "string") return null;
  return { owner: body.owner, actor: body.actor };
}

function parseSetActiveRequest(body: unknown): SetProductActiveRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.owner)) return null;
  if (typeof body.active !== "boolean") return null;
  return { owner: body.owner, active: body.active };
}

function parseRegisterEventTypeRequest(body: unknown): RegisterEventTypeRequest | null {
  if (!isObject(body)) return null;
  if (typeof body.tag !== "string" || typeof body.label !== "string") return null;
  return { tag: body.tag, label: body.label };
}

/** Query values arrive as strings; repeated keys arrive as arrays and are refused. */
function parseCount(value: unknown): number | null | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string" || !/^\d+$/.test(value)) return null;
  const count = Number(value);
  return Number.isSafeInteger(count) ? count : null;
}

function parseStream(raw: unknown): EventStream | null {
  if (raw === undefined) return "custody";
  return EVENT_STREAMS.find((stream) => stream === raw) ?? null;
}

function parseTimestamp(value: unknown): string | null | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string" || Number.isNaN(Date.parse(value))) return null;
  return new Date(value).toISOString();
}

function invalidRequest(reply: FastifyReply, message: string) {
  const body: ErrorResponse = { error: "invalid_request", message };
  return reply.code(400).send(body);
}

export async function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger(config.logLevel);
  const app = Fastify({ logger });

  const ledgerStore = options.ledgerStore || new SqliteLedgerStore(options.dbPath || config.dbPath);
  const ownStore = !options.ledgerStore;
  const serviceAuthToken = options.serviceAuthToken ?? config.serviceAuthToken;
  const signatureMaxSkewMs = options.signatureMaxSkewMs ?? config.signatureMaxSkewMs;
  const now = options.now ?? (() => new Date());
  const ledger = new ProvenanceLedger({
    store: ledgerStore,
    policy: { ...config.policy, replayWindowMs: signatureMaxSkewMs, ...options.policy },
    now,
    logger: logger.child({ component: "ledger" }),
  });

  function requireServiceAuth(req: FastifyRequest, reply: FastifyReply): boolean {
    if (isServiceAuthAuthorized(req.headers[SERVICE_AUTH_HEADER], serviceAuthToken)) {
      return true;
    }
    const body: ErrorResponse = {
      error: "unauthorized_service",
      message: `Missing or invalid '${SERVICE_AUTH_HEADER}' header`,
    };
    reply.code(401).send(body);
    return false;
  }

  /**
   * The signature check is the environment's half of authorization: an
   * unsigned or badly signed request reaches the ledger as signed by nobody.
   * The request digest travels along as a nonce, so each signature commits
   * at most one write.
   */
  async function callerOf(req: FastifyRequest): Promise<CallAuthorizer> {
    const check = await verifySignedRequest(
      { method: req.method, path: req.url, body: req.body },
      req.headers,
      { now: now(), maxSkewMs: signatureMaxSkewMs },
    );
    if (!check.ok) {
      req.log.debug({ reason: check.reason }, "request signature not accepted");
      return UNSIGNED_CALL;
    }
    return signedRequest(check.signer, { digest: check.digest, signedAt: check.signedAt });
  }

  app.setErrorHandler((error, req, reply) => {
    if (error instanceof LedgerError) {
      req.log.info({ code: error.code }, error.message);
      const body: ErrorResponse = { error: error.code, message: error.message };
      if (error.issues.length > 0) body.details = error.issues;
      return reply.code(error.statusCode).send(body);
    }
    if (typeof error.statusCode === "number" && error.statusCode < 500) {
      const body: ErrorResponse = { error: "invalid_request", message: error.message };
      return reply.code(error.statusCode).send(body);
    }
    req.log.error(error);
    const body: ErrorResponse = { error: "internal_error" };
    return reply.code(500).send(body);
  });

  app.get("/health", async () => ({ ok: true, service: "ledger-service" }));
  app.get("/openapi.json", async () => buildOpenApiSpec(config.serviceBaseUrl));

  app.post("/products", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const parsed = parseRegisterRequest(req.body);
    if (!parsed) {
      return invalidRequest(reply, "Expected id, name, origin, owner and optional descriptive fields");
    }
    const product = ledger.registerProduct(await callerOf(req), parsed);
    const response: ProductResponse = { product };
    return reply.code(201).send(response);
  });

  app.get<{ Params: ProductParams }>("/products/:productId", async (req) => {
    const response: ProductResponse = { product: ledger.getProduct(req.params.productId) };
    return response;
  });

  app.post<{ Params: ProductParams }>("/products/:productId/events", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const parsed = parseAddEventRequest(req.body);
    if (!parsed) {
      return invalidRequest(reply, "Expected actor, eventType, location and optional metadata, dataHash, note");
    }
    const { actor, ...input } = parsed;
    const event = ledger.addTrackingEvent(await callerOf(req), req.params.productId, actor, input);
    const response: AddTrackingEventResponse = { event };
    return reply.code(201).send(response);
  });

  app.post<{ Params: ProductParams }>("/products/:productId/events/batch", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const body = req.body;
    if (!isObject(body) || !isNonEmptyString(body.actor) || !Array.isArray(body.events)) {
      return invalidRequest(reply, "Expected actor and an events array");
    }
    ledger.assertBatchSize(body.events.length);

    const inputs: TrackingEventInput[] = [];
    body.events.forEach((value: unknown, index: number) => {
      const input = parseEventInput(value);
      if (!input) {
        throw new LedgerError("invalid_batch", `Batch entry ${index} is malformed`, [
          { index, field: "event", message: "expected eventType and location strings" },
        ]);
      }
      inputs.push(input);
    });

    const events = ledger.addTrackingEventsBatch(await callerOf(req), req.params.productId, body.actor, inputs);
    const response: AddTrackingEventsBatchResponse = { productId: req.params.productId, events };
    return reply.code(201).send(response);
  });

  app.get<{ Params: ProductParams; Querystring: { from?: string; to?: string } }>(
    "/products/:productId/events",
    async (req, reply) => {
      const from = parseCount(req.query.from);
      const to = parseCount(req.query.to);
      if (from === null || to === null) {
        return invalidRequest(reply, "from and to must be non-negative integers");
      }
      const events = ledger.getTrackingEvents(req.params.productId, { from, to });
      const response: GetTimelineResponse = { productId: req.params.productId, stream: "custody", events };
      return response;
    },
  );

  app.get<{ Params: ProductParams; Querystring: { from?: string; to?: string } }>(
    "/products/:productId/governance",
    async (req, reply) => {
      const from = parseCount(req.query.from);
      const to = parseCount(req.query.to);
      if (from === null || to === null) {
        return invalidRequest(reply, "from and to must be non-negative integers");
      }
      const events = ledger.getGovernanceEvents(req.params.productId, { from, to });
      const response: GetTimelineResponse = { productId: req.params.productId, stream: "governance", events };
      return response;
    },
  );

  app.get<{
    Params: ProductParams;
    Querystring: {
      offset?: string;
      limit?: string;
      eventType?: string;
      location?: string;
      since?: string;
      until?: string;
    };
  }>("/products/:productId/events/search", async (req, reply) => {
    const offset = parseCount(req.query.offset);
    const limit = parseCount(req.query.limit);
    const since = parseTimestamp(req.query.since);
    const until = parseTimestamp(req.query.until);
    if (offset === null || limit === null || since === null || until === null) {
      return invalidRequest(reply, "offset/limit must be integers and since/until ISO dates");
    }
    if (!isOptionalString(req.query.eventType) || !isOptionalString(req.query.location)) {
      return invalidRequest(reply, "eventType and location may be given once");
    }
    const filter: EventFilter = {
      eventType: req.query.eventType,
      location: req.query.location,
      since,
      until,
    };
    return ledger.queryTrackingEvents(req.params.productId, filter, offset, limit);
  });

  app.get<{ Params: ProductParams & { sequence: string } }>(
    "/products/:productId/events/:sequence",
    async (req, reply) => {
      const sequence = parseCount(req.params.sequence);
      if (sequence === null || sequence === undefined) {
        return invalidRequest(reply, "sequence must be a non-negative integer");
      }
      const event = ledger.getTrackingEvent(req.params.productId, sequence);
      const response: TrackingEventResponse = { event };
      return response;
    },
  );

  app.get<{ Params: ProductParams; Querystring: { eventType?: string } }>(
    "/products/:productId/event-count",
    async (req, reply) => {
      if (!isOptionalString(req.query.eventType)) {
        return invalidRequest(reply, "eventType may be given once");
      }
      const count = ledger.getEventCount(req.params.productId, req.query.eventType);
      const response: EventCountResponse = {
        productId: req.params.productId,
        eventType: req.query.eventType,
        count,
      };
      return response;
    },
  );

  app.get<{ Params: ProductParams; Querystring: { stream?: string } }>(
    "/products/:productId/verify",
    async (req, reply) => {
      const stream = parseStream(req.query.stream);
      if (!stream) {
        return invalidRequest(reply, `stream must be one of ${EVENT_STREAMS.join(", ")}`);
      }
      return ledger.verifyEventChain(req.params.productId, stream);
    },
  );

  app.get<{ Params: ProductParams & { actor: string } }>(
    "/products/:productId/actors/:actor",
    async (req) => {
      const response: IsAuthorizedResponse = {
        productId: req.params.productId,
        actor: req.params.actor,
        authorized: ledger.isAuthorized(req.params.productId, req.params.actor),
      };
      return response;
    },
  );

  app.post<{ Params: ProductParams }>("/products/:productId/transfer", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const parsed = parseTransferRequest(req.body);
    if (!parsed) {
      return invalidRequest(reply, "Expected currentOwner and newOwner");
    }
    return ledger.transferOwnership(
      await callerOf(req),
      req.params.productId,
      parsed.currentOwner,
      parsed.newOwner,
    );
  });

  app.post<{ Params: ProductParams }>("/products/:productId/actors", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const parsed = parseChangeActorRequest(req.body);
    if (!parsed) {
      return invalidRequest(reply, "Expected owner and actor");
    }
    return ledger.addAuthorizedActor(await callerOf(req), req.params.productId, parsed.owner, parsed.actor);
  });

  app.post<{ Params: ProductParams }>("/products/:productId/actors/remove", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const parsed = parseChangeActorRequest(req.body);
    if (!parsed) {
      return invalidRequest(reply, "Expected owner and actor");
    }
    return ledger.removeAuthorizedActor(await callerOf(req), req.params.productId, parsed.owner, parsed.actor);
  });

  app.post<{ Params: ProductParams }>("/products/:productId/active", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const parsed = parseSetActiveRequest(req.body);
    if (!parsed) {
      return invalidRequest(reply, "Expected owner and boolean active");
    }
    return ledger.setProductActive(await callerOf(req), req.params.productId, parsed.owner, parsed.active);
  });

  app.get("/event-types", async () => {
    const response: ListEventTypesResponse = { eventTypes: ledger.listEventTypes() };
    return response;
  });

  app.post("/event-types", async (req, reply) => {
    if (!requireServiceAuth(req, reply)) return;
    const role = parseGovernanceRoleHeader(req.headers[GOVERNANCE_ROLE_HEADER]);
    if (!isGovernanceRoleAllowed(role, config.eventTypeAdminRoles)) {
      const body: ErrorResponse = {
        error: "forbidden_role",
        message: `'${GOVERNANCE_ROLE_HEADER}' does not allow event type registration`,
      };
      return reply.code(403).send(body);
    }
    const parsed = parseRegisterEventTypeRequest(req.body);
    if (!parsed) {
      return invalidRequest(reply, "Expected tag and label");
    }
    const response: EventTypeResponse = { eventType: ledger.registerEventType(parsed.tag, parsed.label) };
    return reply.code(201).send(response);
  });

  app.addHook("onClose", async () => {
    if (ownStore) {
      ledgerStore.close();
    }
  });

  return app;
}
