import assert from "node:assert/strict";
import test from "node:test";
import { signedBy, UNSIGNED_CALL } from "../ledger/authorization.js";
import { captureLedgerError, createTestLedger, registerSample } from "./helpers.js";

const A = signedBy("A");
const B = signedBy("B");
const harvest = { eventType: "HARVEST", location: "Farm" };

test("transfer hands the product over and revokes the previous owner", (t) => {
  const { store, ledger } = createTestLedger();
  t.after(() => store.close());
  registerSample(ledger);

  const change = ledger.transferOwnership(A, "PROD-1", "A", "B");
  assert.equal(change.changed, true);
  assert.equal(change.product.owner, "B");
  assert.deepEqual(change.product.authorizedActors, ["B"]);
  assert.equal(change.event?.stream, "governance");
  assert.equal(change.event?.sequence, 0);
  assert.equal(change.event?.eventType, "OWNERSHIP_TRANSFER");
  assert.equal(change.event?.actor, "A");
  assert.equal(change.event?.metadata, '{"from":"A","to":"B"}');
  assert.deepEqual(ledger.getProduct("PROD-1"), change.product);

  assert.equal(captureLedgerError(() => ledger.addTrackingEvent(A, "PROD-1", "A", harvest)).code, "unauthorized");
  assert.equal(ledger.addTrackingEvent(B, "PROD-1", "B", harvest).sequence, 0);
  assert.equal(ledger.isAuthorized("PROD-1", "A"), false);
});

test("transfer keeps other listed actors", (t) => {
  const { store, ledger } = createTestLedger();
  t.after(() => store.close());
  registerSample(ledger);
  ledger.addAuthorizedActor(A, "PROD-1", "A", "C");

  const change = ledger.transferOwnership(A, "PROD-1", "A", "B");
  assert.deepEqual(change.product.authorizedActors, ["C", "B"]);
});

test("transfer needs the current owner's signature and a new identity", (t) => {
  const { store, ledger } = createTestLedger();
  t.after(() => store.close());
  registerSample(ledger);

  assert.equal(captureLedgerError(() => ledger.transferOwnership(B, "PROD-1", "A", "B")).code, "unauthenticated");
  assert.equal(captureLedgerError(() => ledger.transferOwnership(B, "PROD-1", "B", "C")).code, "unauthorized");
  assert.equal(captureLedgerError(() => ledger.transferOwnership(A, "PROD-1", "A", "A")).code, "invalid_input");
  assert.equal(captureLedgerError(() => ledger.transferOwnership(A, "PROD-1", "A", " ")).code, "invalid_input");
  assert.equal(captureLedgerError(() => ledger.transferOwnership(A, "PROD-9", "A", "B")).code, "not_found");

  assert.equal(ledger.getProduct("PROD-1").owner, "A");
  assert.deepEqual(ledger.getGovernanceEvents("PROD-1"), []);
});

test("granting and revoking take effect on the next call", (t) => {
  const { store, ledger } = createTestLedger();
  t.after(() => store.close());
  registerSample(ledger);

  ledger.addAuthorizedActor(A, "PROD-1", "A", "B");
  assert.equal(ledger.isAuthorized("PROD-1", "B"), true);
  assert.equal(ledger.addTrackingEvent(B, "PROD-1", "B", harvest).sequence, 0);

  const revoked = ledger.removeAuthorizedActor(A, "PROD-1", "A", "B");
  assert.equal(revoked.changed, true);
  assert.deepEqual(revoked.product.authorizedActors, ["A"]);
  assert.equal(revoked.event?.eventType, "ACCESS_REVOKED");
  assert.equal(revoked.event?.metadata, '{"actor":"B"}');
  assert.equal(ledger.isAuthorized("PROD-1", "B"), false);
  assert.equal(captureLedgerError(() => ledger.addTrackingEvent(B, "PROD-1", "B", harvest)).code, "unauthorized");
});

test("repeated grants and revokes are no-ops", (t) => {
  const { store, ledger } = createTestLedger();
  t.after(() => store.close());
  registerSample(ledger);

  assert.equal(ledger.addAuthorizedActor(A, "PROD-1", "A", "B").changed, true);
  const again = ledger.addAuthorizedActor(A, "PROD-1", "A", "B");
  assert.equal(again.changed, false);
  assert.equal(again.event, undefined);
  assert.deepEqual(again.product.authorizedActors, ["A", "B"]);

  assert.equal(ledger.removeAuthorizedActor(A, "PROD-1", "A", "C").changed, false);
  assert.deepEqual(ledger.getGovernanceEvents("PROD-1").map((event) => event.eventType), ["ACCESS_GRANTED"]);
});

test("owner keeps write access after leaving the actor list", (t) => {
  const { store, ledger } = createTestLedger();
  t.after(() => store.close());
  registerSample(ledger);

  const change = ledger.removeAuthorizedActor(A, "PROD-1", "A", "A");
  assert.deepEqual(change.product.authorizedActors, []);
  assert.equal(ledger.isAuthorized("PROD-1", "A"), true);
  assert.equal(ledger.addTrackingEvent(A, "PROD-1", "A", harvest).sequence, 0);
});

test("only the owner manages access", (t) => {
  const { store, ledger } = createTestLedger();
  t.after(() => store.close());
  registerSample(ledger);
  ledger.addAuthorizedActor(A, "PROD-1", "A", "B");

  assert.equal(captureLedgerError(() => ledger.addAuthorizedActor(B, "PROD-1", "B", "C")).code, "unauthorized");
  assert.equal(captureLedgerError(() => ledger.removeAuthorizedActor(B, "PROD-1", "B", "A")).code, "unauthorized");
  assert.equal(captureLedgerError(() => ledger.addAuthorizedActor(UNSIGNED_CALL, "PROD-1", "A", "C")).code, "unauthenticated");
  assert.equal(captureLedgerError(() => ledger.addAuthorizedActor(A, "PROD-1", "A", "")).code, "invalid_input");
  assert.equal(ledger.isAuthorized("PROD-1", "C"), false);
});

test("activity flag changes are recorded once", (t) => {
  const { store, ledger } = createTestLedger();
  t.after(() => store.close());
  registerSample(ledger);

  const off = ledger.setProductActive(A, "PROD-1", "A", false);
  assert.equal(off.changed, true);
  assert.equal(off.product.active, false);
  assert.equal(off.event?.eventType, "PRODUCT_DEACTIVATED");
  assert.equal(off.event?.metadata, '{"active":false}');

  assert.equal(ledger.setProductActive(A, "PROD-1", "A", false).changed, false);
  assert.equal(captureLedgerError(() => ledger.setProductActive(B, "PROD-1", "B", true)).code, "unauthorized");

  const on = ledger.setProductActive(A, "PROD-1", "A", true);
  assert.equal(on.event?.eventType, "PRODUCT_REACTIVATED");
  assert.equal(ledger.getProduct("PROD-1").active, true);
});

test("governance stream is hash-chained on its own", (t) => {
  const { store, ledger } = createTestLedger();
  t.after(() => store.close());
  registerSample(ledger);

  ledger.addTrackingEvent(A, "PROD-1", "A", harvest);
  ledger.addAuthorizedActor(A, "PROD-1", "A", "B");
  ledger.setProductActive(A, "PROD-1", "A", false);
  ledger.transferOwnership(A, "PROD-1", "A", "B");

  const governance = ledger.getGovernanceEvents("PROD-1");
  assert.deepEqual(
    governance.map((event) => [event.sequence, event.eventType]),
    [
      [0, "ACCESS_GRANTED"],
      [1, "PRODUCT_DEACTIVATED"],
      [2, "OWNERSHIP_TRANSFER"],
    ],
  );
  assert.equal(governance[1].previousHash, governance[0].eventHash);
  assert.deepEqual(ledger.verifyEventChain("PROD-1", "governance"), {
    productId: "PROD-1",
    stream: "governance",
    valid: true,
    checked: 3,
  });
  assert.equal(ledger.getTrackingEvent("PROD-1", 2, "governance").eventType, "OWNERSHIP_TRANSFER");
  assert.equal(ledger.getEventCount("PROD-1"), 1);
});
