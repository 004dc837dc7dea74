import assert from "node:assert/strict";
import test from "node:test";
import {
  buildSignedRequestHeaders,
  publicKeyFromPrivateKeyHex,
  type AddTrackingEventsBatchResponse,
  type ErrorResponse,
  type EventCountResponse,
  type EventTypeResponse,
  type GetTimelineResponse,
  type GovernanceChangeResponse,
  type ListEventTypesResponse,
  type ProductResponse,
  type QueryEventsResponse,
  type TrackingEventResponse,
  type VerifyChainResponse,
} from "@provenance/shared";
import { loadConfig } from "../config.js";
import { buildServer } from "../server.js";

const OWNER_KEY = "11".repeat(32);
const ACTOR_KEY = "22".repeat(32);
const NOW = new Date("2026-03-01T08:00:00.000Z");

type App = Awaited<ReturnType<typeof buildServer>>;

async function createApp(env: Record<string, string> = {}): Promise<App> {
  return buildServer({
    config: loadConfig({ LEDGER_DB_PATH: ":memory:", LOG_LEVEL: "silent", ...env }),
    now: () => NOW,
  });
}

async function signedPost(
  app: App,
  url: string,
  payload: Record<string, unknown>,
  privateKeyHex: string,
  options: { signedAt?: Date; headers?: Record<string, string> } = {},
) {
  const signature = await buildSignedRequestHeaders(
    { method: "POST", path: url, body: payload },
    privateKeyHex,
    options.signedAt ?? NOW,
  );
  return app.inject({
    method: "POST",
    url,
    payload,
    headers: { ...signature, ...options.headers },
  });
}

async function registerProduct(app: App, owner: string) {
  return signedPost(
    app,
    "/products",
    { id: "PROD-1", name: "Organic Coffee Beans", origin: "Yirgacheffe, Ethiopia", owner },
    OWNER_KEY,
  );
}

test("serves health and the OpenAPI document", async () => {
  const app = await createApp();
  try {
    const health = await app.inject({ method: "GET", url: "/health" });
    assert.equal(health.statusCode, 200);
    assert.deepEqual(health.json(), { ok: true, service: "ledger-service" });

    const spec = await app.inject({ method: "GET", url: "/openapi.json" });
    assert.equal(spec.statusCode, 200);
    const body = spec.json() as { openapi: string; paths: Record<string, unknown> };
    assert.equal(body.openapi, "3.0.3");
    assert.ok("/products/{productId}/governance" in body.paths);
  } finally {
    await app.close();
  }
});

test("registers and reads a product signed by its owner", async () => {
  const app = await createApp();
  try {
    const owner = await publicKeyFromPrivateKeyHex(OWNER_KEY);
    const created = await registerProduct(app, owner);
    assert.equal(created.statusCode, 201);
    const { product } = created.json() as ProductResponse;
    assert.equal(product.owner, owner);
    assert.deepEqual(product.authorizedActors, [owner]);
    assert.equal(product.createdAt, NOW.toISOString());

    const read = await app.inject({ method: "GET", url: "/products/PROD-1" });
    assert.equal(read.statusCode, 200);
    assert.deepEqual((read.json() as ProductResponse).product, product);

    const missing = await app.inject({ method: "GET", url: "/products/PROD-9" });
    assert.equal(missing.statusCode, 404);
    assert.equal((missing.json() as ErrorResponse).error, "not_found");
  } finally {
    await app.close();
  }
});

test("unsigned, foreign and stale signatures are unauthenticated", async () => {
  const app = await createApp();
  try {
    const owner = await publicKeyFromPrivateKeyHex(OWNER_KEY);
    const payload = { id: "PROD-1", name: "Beans", origin: "Farm", owner };

    const unsigned = await app.inject({ method: "POST", url: "/products", payload });
    assert.equal(unsigned.statusCode, 401);
    assert.equal((unsigned.json() as ErrorResponse).error, "unauthenticated");

    const foreign = await signedPost(app, "/products", payload, ACTOR_KEY);
    assert.equal(foreign.statusCode, 401);

    const stale = await signedPost(app, "/products", payload, OWNER_KEY, {
      signedAt: new Date(NOW.getTime() - 10 * 60_000),
    });
    assert.equal(stale.statusCode, 401);

    const read = await app.inject({ method: "GET", url: "/products/PROD-1" });
    assert.equal(read.statusCode, 404);
  } finally {
    await app.close();
  }
});

test("malformed bodies are rejected before the ledger runs", async () => {
  const app = await createApp();
  try {
    const res = await app.inject({ method: "POST", url: "/products", payload: { id: "PROD-1" } });
    assert.equal(res.statusCode, 400);
    assert.equal((res.json() as ErrorResponse).error, "invalid_request");

    const invalid = await signedPost(
      app,
      "/products",
      { id: "", name: "Beans", origin: "Farm", owner: await publicKeyFromPrivateKeyHex(OWNER_KEY) },
      OWNER_KEY,
    );
    assert.equal(invalid.statusCode, 400);
    const body = invalid.json() as ErrorResponse;
    assert.equal(body.error, "invalid_input");
    assert.equal(body.details?.[0]?.field, "id");
  } finally {
    await app.close();
  }
});

test("custody history follows access grants over HTTP", async () => {
  const app = await createApp();
  try {
    const owner = await publicKeyFromPrivateKeyHex(OWNER_KEY);
    const actor = await publicKeyFromPrivateKeyHex(ACTOR_KEY);
    await registerProduct(app, owner);

    const harvest = await signedPost(
      app,
      "/products/PROD-1/events",
      { actor: owner, eventType: "HARVEST", location: "Farm" },
      OWNER_KEY,
    );
    assert.equal(harvest.statusCode, 201);
    assert.equal((harvest.json() as TrackingEventResponse).event.sequence, 0);

    const shippingPayload = { actor, eventType: "SHIPPING", location: "Port" };
    const denied = await signedPost(app, "/products/PROD-1/events", shippingPayload, ACTOR_KEY);
    assert.equal(denied.statusCode, 403);
    assert.equal((denied.json() as ErrorResponse).error, "unauthorized");

    const granted = await signedPost(app, "/products/PROD-1/actors", { owner, actor }, OWNER_KEY);
    assert.equal(granted.statusCode, 200);
    assert.equal((granted.json() as GovernanceChangeResponse).changed, true);

    const authorized = await app.inject({ method: "GET", url: `/products/PROD-1/actors/${actor}` });
    assert.deepEqual(authorized.json(), { productId: "PROD-1", actor, authorized: true });

    const shipping = await signedPost(app, "/products/PROD-1/events", shippingPayload, ACTOR_KEY, {
      signedAt: new Date(NOW.getTime() + 1000),
    });
    assert.equal(shipping.statusCode, 201);
    assert.equal((shipping.json() as TrackingEventResponse).event.sequence, 1);

    const history = (await app.inject({ method: "GET", url: "/products/PROD-1/events" })).json() as GetTimelineResponse;
    assert.equal(history.stream, "custody");
    assert.deepEqual(
      history.events.map((event) => [event.sequence, event.eventType]),
      [
        [0, "HARVEST"],
        [1, "SHIPPING"],
      ],
    );

    const ranged = (await app.inject({ method: "GET", url: "/products/PROD-1/events?from=1" })).json() as GetTimelineResponse;
    assert.deepEqual(ranged.events.map((event) => event.sequence), [1]);

    const single = await app.inject({ method: "GET", url: "/products/PROD-1/events/1" });
    assert.equal((single.json() as TrackingEventResponse).event.actor, actor);

    const governance = (await app.inject({ method: "GET", url: "/products/PROD-1/governance" })).json() as GetTimelineResponse;
    assert.deepEqual(governance.events.map((event) => event.eventType), ["ACCESS_GRANTED"]);

    const custodyChain = (await app.inject({ method: "GET", url: "/products/PROD-1/verify" })).json() as VerifyChainResponse;
    assert.deepEqual(custodyChain, { productId: "PROD-1", stream: "custody", valid: true, checked: 2 });
    const governanceChain = await app.inject({ method: "GET", url: "/products/PROD-1/verify?stream=governance" });
    assert.equal((governanceChain.json() as VerifyChainResponse).checked, 1);
    const badStream = await app.inject({ method: "GET", url: "/products/PROD-1/verify?stream=audit" });
    assert.equal(badStream.statusCode, 400);
  } finally {
    await app.close();
  }
});

test("a signed request cannot be replayed", async () => {
  const app = await createApp();
  try {
    const owner = await publicKeyFromPrivateKeyHex(OWNER_KEY);
    const actor = await publicKeyFromPrivateKeyHex(ACTOR_KEY);
    await registerProduct(app, owner);

    const replayedRegistration = await registerProduct(app, owner);
    assert.equal(replayedRegistration.statusCode, 409);
    assert.equal((replayedRegistration.json() as ErrorResponse).error, "duplicate_id");

    const grant = await signedPost(app, "/products/PROD-1/actors", { owner, actor }, OWNER_KEY);
    assert.equal(grant.statusCode, 200);

    const shippingPayload = { actor, eventType: "SHIPPING", location: "Port" };
    const shipping = await signedPost(app, "/products/PROD-1/events", shippingPayload, ACTOR_KEY);
    assert.equal(shipping.statusCode, 201);
    const replayedShipping = await signedPost(app, "/products/PROD-1/events", shippingPayload, ACTOR_KEY);
    assert.equal(replayedShipping.statusCode, 401);
    assert.deepEqual(replayedShipping.json(), {
      error: "unauthenticated",
      message: "Request signature was already used",
    });

    const revoke = await signedPost(app, "/products/PROD-1/actors/remove", { owner, actor }, OWNER_KEY);
    assert.equal(revoke.statusCode, 200);
    assert.equal((revoke.json() as GovernanceChangeResponse).changed, true);

    const replayedGrant = await signedPost(app, "/products/PROD-1/actors", { owner, actor }, OWNER_KEY);
    assert.equal(replayedGrant.statusCode, 401);
    assert.equal((replayedGrant.json() as ErrorResponse).error, "unauthenticated");

    const authorized = await app.inject({ method: "GET", url: `/products/PROD-1/actors/${actor}` });
    assert.deepEqual(authorized.json(), { productId: "PROD-1", actor, authorized: false });
    const count = (await app.inject({ method: "GET", url: "/products/PROD-1/event-count" })).json() as EventCountResponse;
    assert.equal(count.count, 1);
    const governance = (await app.inject({ method: "GET", url: "/products/PROD-1/governance" })).json() as GetTimelineResponse;
    assert.deepEqual(governance.events.map((event) => event.eventType), ["ACCESS_GRANTED", "ACCESS_REVOKED"]);

    const regrant = await signedPost(app, "/products/PROD-1/actors", { owner, actor }, OWNER_KEY, {
      signedAt: new Date(NOW.getTime() + 1000),
    });
    assert.equal(regrant.statusCode, 200);
    assert.equal((regrant.json() as GovernanceChangeResponse).changed, true);
  } finally {
    await app.close();
  }
});

test("numbers beyond the safe integer range are rejected", async () => {
  const app = await createApp();
  try {
    const owner = await publicKeyFromPrivateKeyHex(OWNER_KEY);
    await registerProduct(app, owner);

    for (const url of [
      "/products/PROD-1/events/search?offset=99999999999999999999",
      "/products/PROD-1/events/search?limit=99999999999999999999",
      "/products/PROD-1/events/99999999999999999999",
      "/products/PROD-1/events?from=99999999999999999999",
      "/products/PROD-1/events?to=9007199254740992",
    ]) {
      const res = await app.inject({ method: "GET", url });
      assert.equal(res.statusCode, 400, url);
      assert.equal((res.json() as ErrorResponse).error, "invalid_request", url);
    }

    const largestOffset = await app.inject({
      method: "GET",
      url: `/products/PROD-1/events/search?offset=${Number.MAX_SAFE_INTEGER}`,
    });
    assert.equal(largestOffset.statusCode, 200);
    assert.deepEqual((largestOffset.json() as QueryEventsResponse).events, []);
  } finally {
    await app.close();
  }
});

test("batches append atomically and respect the size cap", async () => {
  const app = await createApp();
  try {
    const owner = await publicKeyFromPrivateKeyHex(OWNER_KEY);
    await registerProduct(app, owner);

    const scans = (count: number) =>
      Array.from({ length: count }, (_, i) => ({ eventType: "SCAN", location: `Dock ${i}` }));

    const batch = await signedPost(app, "/products/PROD-1/events/batch", { actor: owner, events: scans(3) }, OWNER_KEY);
    assert.equal(batch.statusCode, 201);
    const appended = batch.json() as AddTrackingEventsBatchResponse;
    assert.deepEqual(appended.events.map((event) => event.sequence), [0, 1, 2]);

    const tooLarge = await signedPost(app, "/products/PROD-1/events/batch", { actor: owner, events: scans(101) }, OWNER_KEY);
    assert.equal(tooLarge.statusCode, 413);
    assert.equal((tooLarge.json() as ErrorResponse).error, "batch_too_large");

    const malformed = await signedPost(
      app,
      "/products/PROD-1/events/batch",
      { actor: owner, events: [{ eventType: "SCAN", location: "Dock" }, { eventType: "SCAN" }] },
      OWNER_KEY,
    );
    assert.equal(malformed.statusCode, 400);
    const malformedBody = malformed.json() as ErrorResponse;
    assert.equal(malformedBody.error, "invalid_batch");
    assert.equal(malformedBody.details?.[0]?.index, 1);

    const count = (await app.inject({ method: "GET", url: "/products/PROD-1/event-count" })).json() as EventCountResponse;
    assert.equal(count.count, 3);
  } finally {
    await app.close();
  }
});

test("search pages filtered events", async () => {
  const app = await createApp();
  try {
    const owner = await publicKeyFromPrivateKeyHex(OWNER_KEY);
    await registerProduct(app, owner);
    await signedPost(
      app,
      "/products/PROD-1/events/batch",
      {
        actor: owner,
        events: [
          { eventType: "HARVEST", location: "Farm" },
          { eventType: "SHIPPING", location: "Port" },
          { eventType: "HARVEST", location: "Farm" },
        ],
      },
      OWNER_KEY,
    );

    const page = await app.inject({
      method: "GET",
      url: "/products/PROD-1/events/search?eventType=HARVEST&limit=1",
    });
    assert.equal(page.statusCode, 200);
    const body = page.json() as QueryEventsResponse;
    assert.deepEqual(body.events.map((event) => event.sequence), [0]);
    assert.equal(body.totalCount, 2);
    assert.equal(body.hasMore, true);

    const count = await app.inject({ method: "GET", url: "/products/PROD-1/event-count?eventType=HARVEST" });
    assert.deepEqual(count.json(), { productId: "PROD-1", eventType: "HARVEST", count: 2 });

    const badSince = await app.inject({ method: "GET", url: "/products/PROD-1/events/search?since=someday" });
    assert.equal(badSince.statusCode, 400);
  } finally {
    await app.close();
  }
});

test("transfer over HTTP revokes the previous owner", async () => {
  const app = await createApp();
  try {
    const owner = await publicKeyFromPrivateKeyHex(OWNER_KEY);
    const buyer = await publicKeyFromPrivateKeyHex(ACTOR_KEY);
    await registerProduct(app, owner);

    const transfer = await signedPost(
      app,
      "/products/PROD-1/transfer",
      { currentOwner: owner, newOwner: buyer },
      OWNER_KEY,
    );
    assert.equal(transfer.statusCode, 200);
    const change = transfer.json() as GovernanceChangeResponse;
    assert.equal(change.product.owner, buyer);
    assert.deepEqual(change.product.authorizedActors, [buyer]);

    const stale = await signedPost(
      app,
      "/products/PROD-1/events",
      { actor: owner, eventType: "HARVEST", location: "Farm" },
      OWNER_KEY,
    );
    assert.equal(stale.statusCode, 403);

    const deactivate = await signedPost(app, "/products/PROD-1/active", { owner: buyer, active: false }, ACTOR_KEY);
    assert.equal(deactivate.statusCode, 200);
    const inactive = await signedPost(
      app,
      "/products/PROD-1/events",
      { actor: buyer, eventType: "HARVEST", location: "Farm" },
      ACTOR_KEY,
    );
    assert.equal(inactive.statusCode, 409);
    assert.equal((inactive.json() as ErrorResponse).error, "product_inactive");
  } finally {
    await app.close();
  }
});

test("write routes require the service token when one is configured", async () => {
  const app = await createApp({ SERVICE_AUTH_TOKEN: "test-secret" });
  try {
    const owner = await publicKeyFromPrivateKeyHex(OWNER_KEY);
    const payload = { id: "PROD-1", name: "Beans", origin: "Farm", owner };

    const missing = await signedPost(app, "/products", payload, OWNER_KEY);
    assert.equal(missing.statusCode, 401);
    assert.equal((missing.json() as ErrorResponse).error, "unauthorized_service");

    const allowed = await signedPost(app, "/products", payload, OWNER_KEY, {
      headers: { "x-service-token": "test-secret" },
    });
    assert.equal(allowed.statusCode, 201);

    const read = await app.inject({ method: "GET", url: "/products/PROD-1" });
    assert.equal(read.statusCode, 200);
  } finally {
    await app.close();
  }
});

test("event type registration needs a governance role", async () => {
  const app = await createApp();
  try {
    const payload = { tag: "HARVEST", label: " Harvest " };

    const forbidden = await app.inject({ method: "POST", url: "/event-types", payload });
    assert.equal(forbidden.statusCode, 403);
    assert.equal((forbidden.json() as ErrorResponse).error, "forbidden_role");

    const created = await app.inject({
      method: "POST",
      url: "/event-types",
      payload,
      headers: { "x-governance-role": "Registry-Admin" },
    });
    assert.equal(created.statusCode, 201);
    assert.deepEqual((created.json() as EventTypeResponse).eventType, {
      tag: "HARVEST",
      label: "Harvest",
      reserved: false,
      registeredAt: NOW.toISOString(),
    });

    const reserved = await app.inject({
      method: "POST",
      url: "/event-types",
      payload: { tag: "ACCESS_GRANTED", label: "Granted" },
      headers: { "x-governance-role": "registry-admin" },
    });
    assert.equal(reserved.statusCode, 400);

    const list = (await app.inject({ method: "GET", url: "/event-types" })).json() as ListEventTypesResponse;
    assert.equal(list.eventTypes.length, 6);
    assert.deepEqual(list.eventTypes[0], {
      tag: "OWNERSHIP_TRANSFER",
      label: "Ownership transferred",
      reserved: true,
      registeredAt: null,
    });
    assert.equal(list.eventTypes[5].tag, "HARVEST");
  } finally {
    await app.close();
  }
});
