import {
  DEFAULT_SIGNATURE_MAX_SKEW_MS,
  parseGovernanceRoleSet,
  type GovernanceRoleSet,
} from "@provenance/shared";
import { DEFAULT_LEDGER_POLICY, type LedgerPolicy } from "./ledger/context.js";
import { isLogLevel, type LogLevel } from "./logger.js";

export const DEFAULT_PORT = 4110;
export const DEFAULT_DB_PATH = "data/ledger-service.db";
export const DEFAULT_EVENT_TYPE_ADMIN_ROLES = ["registry-admin"];

export interface LedgerServiceConfig {
  port: number;
  host: string;
  dbPath: string;
  serviceAuthToken?: string;
  serviceBaseUrl: string;
  policy: LedgerPolicy;
  signatureMaxSkewMs: number;
  eventTypeAdminRoles: GovernanceRoleSet;
  logLevel: LogLevel;
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`invalid_config:${name} must be a positive integer, got '${raw}'`);
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerServiceConfig {
  const port = readPositiveInt(env, "PORT", DEFAULT_PORT);
  const logLevel = (env.LOG_LEVEL || "info").trim().toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new Error(`invalid_config:LOG_LEVEL '${logLevel}' is not a pino level`);
  }

  const signatureMaxSkewMs = readPositiveInt(env, "SIGNATURE_MAX_SKEW_MS", DEFAULT_SIGNATURE_MAX_SKEW_MS);

  return {
    port,
    host: env.HOST || "0.0.0.0",
    dbPath: env.LEDGER_DB_PATH || DEFAULT_DB_PATH,
    serviceAuthToken: env.SERVICE_AUTH_TOKEN,
    serviceBaseUrl: env.SERVICE_BASE_URL || `http://127.0.0.1:${port}`,
    policy: {
      maxBatchSize: readPositiveInt(env, "LEDGER_MAX_BATCH_SIZE", DEFAULT_LEDGER_POLICY.maxBatchSize),
      maxMetadataBytes: readPositiveInt(env, "LEDGER_MAX_METADATA_BYTES", DEFAULT_LEDGER_POLICY.maxMetadataBytes),
      readChunkSize: readPositiveInt(env, "LEDGER_READ_CHUNK_SIZE", DEFAULT_LEDGER_POLICY.readChunkSize),
      replayWindowMs: signatureMaxSkewMs,
    },
    signatureMaxSkewMs,
    eventTypeAdminRoles: parseGovernanceRoleSet(env.EVENT_TYPE_ADMIN_ROLES, DEFAULT_EVENT_TYPE_ADMIN_ROLES),
    logLevel,
  };
}
