import { LedgerError, type Product } from "@provenance/shared";
import type { LedgerContext } from "./context.js";

export interface SignedCallNonce {
  digest: string;
  signedAt: string; // ISO date
}

/**
 * Capability handed in by the execution environment: which identities
 * cryptographically signed the current call. The core never checks
 * signatures itself. A call carrying a `nonce` is single-use.
 */
export interface CallAuthorizer {
  hasSigned(identity: string): boolean;
  nonce?: SignedCallNonce;
}

export function signedBy(...identities: string[]): CallAuthorizer {
  const signers = new Set(identities);
  return { hasSigned: (identity) => signers.has(identity) };
}

export function signedRequest(signer: string, nonce: SignedCallNonce): CallAuthorizer {
  return { hasSigned: (identity) => identity === signer, nonce };
}

export const UNSIGNED_CALL: CallAuthorizer = signedBy();

/**
 * Must run inside the write's transaction: the nonce is spent only if the
 * write commits.
 */
export function authorize(ctx: LedgerContext, call: CallAuthorizer, claimedIdentity: string): void {
  if (!call.hasSigned(claimedIdentity)) {
    throw new LedgerError("unauthenticated", `Call was not signed by '${claimedIdentity}'`);
  }
  if (!call.nonce) return;

  const horizon = new Date(ctx.now().getTime() - ctx.policy.replayWindowMs).toISOString();
  ctx.store.pruneRequestNonces(horizon);
  if (!ctx.store.consumeRequestNonce(call.nonce.digest, call.nonce.signedAt)) {
    throw new LedgerError("unauthenticated", "Request signature was already used");
  }
}

export function isOwner(product: Product, identity: string): boolean {
  return product.owner === identity;
}

/** Write rule for custody events: the owner, or a listed actor. */
export function canWrite(product: Product, identity: string): boolean {
  return isOwner(product, identity) || product.authorizedActors.includes(identity);
}

export function checkWriteAccess(product: Product, identity: string): void {
  if (!canWrite(product, identity)) {
    throw new LedgerError(
      "unauthorized",
      `'${identity}' may not append events to product '${product.id}'`,
    );
  }
}

export function checkOwner(product: Product, identity: string): void {
  if (!isOwner(product, identity)) {
    throw new LedgerError("unauthorized", `'${identity}' is not the owner of product '${product.id}'`);
  }
}
