import { pino, type Logger } from "pino";
import type { LedgerStore } from "../storage/ledger-store.js";

export interface LedgerPolicy {
  maxBatchSize: number;
  maxMetadataBytes: number;
  /** Rows fetched per step by the lazy event reader. */
  readChunkSize: number;
  /** How long a spent request nonce is remembered; match the signature skew. */
  replayWindowMs: number;
}

export const DEFAULT_LEDGER_POLICY: LedgerPolicy = {
  maxBatchSize: 100,
  maxMetadataBytes: 4096,
  readChunkSize: 100,
  replayWindowMs: 5 * 60 * 1000,
};

export interface LedgerContext {
  store: LedgerStore;
  policy: LedgerPolicy;
  now: () => Date;
  logger: Logger;
}

export interface LedgerContextOptions {
  store: LedgerStore;
  policy?: Partial<LedgerPolicy>;
  now?: () => Date;
  logger?: Logger;
}

export function createLedgerContext(options: LedgerContextOptions): LedgerContext {
  return {
    store: options.store,
    policy: { ...DEFAULT_LEDGER_POLICY, ...options.policy },
    now: options.now ?? (() => new Date()),
    logger: options.logger ?? pino({ level: "silent" }),
  };
}
