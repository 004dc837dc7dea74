import assert from "node:assert/strict";
import { LedgerError, type Product } from "@provenance/shared";
import { signedBy } from "../ledger/authorization.js";
import type { LedgerPolicy } from "../ledger/context.js";
import { ProvenanceLedger } from "../ledger/ledger.js";
import { IN_MEMORY_DB_PATH, SqliteLedgerStore } from "../storage/ledger-store.js";

export const START_TIME = "2026-03-01T08:00:00.000Z";

export interface ManualClock {
  now: () => Date;
  set(iso: string): void;
}

export function manualClock(startIso = START_TIME): ManualClock {
  let current = new Date(startIso);
  return {
    now: () => new Date(current.getTime()),
    set(iso) {
      current = new Date(iso);
    },
  };
}

export function createTestLedger(policy: Partial<LedgerPolicy> = {}) {
  const store = new SqliteLedgerStore(IN_MEMORY_DB_PATH);
  const clock = manualClock();
  const ledger = new ProvenanceLedger({ store, policy, now: clock.now });
  return { store, clock, ledger };
}

export function registerSample(ledger: ProvenanceLedger, id = "PROD-1", owner = "A"): Product {
  return ledger.registerProduct(signedBy(owner), {
    id,
    name: "Organic Coffee Beans",
    origin: "Yirgacheffe, Ethiopia",
    owner,
  });
}

export function captureLedgerError(fn: () => unknown): LedgerError {
  try {
    fn();
  } catch (error) {
    if (error instanceof LedgerError) return error;
    throw error;
  }
  assert.fail("expected a LedgerError");
}
