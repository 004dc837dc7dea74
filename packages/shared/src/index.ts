export * from "./crypto/canonicalize.js";
export * from "./crypto/hash.js";
export * from "./crypto/ed25519.js";
export * from "./auth/headers.js";
export * from "./auth/service-auth.js";
export * from "./auth/governance.js";
export * from "./auth/request-signature.js";
export * from "./errors.js";
export * from "./types/product.js";
export * from "./types/events.js";
export * from "./types/api.js";
export * from "./client/ledger-client.js";
