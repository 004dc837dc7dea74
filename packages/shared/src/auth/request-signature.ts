import { canonicalJson } from "../crypto/canonicalize.js";
import { isKeyHex, publicKeyFromPrivateKeyHex, signHex, verifyHex } from "../crypto/ed25519.js";
import { sha256Hex } from "../crypto/hash.js";
import { firstHeaderValue } from "./headers.js";

export const SIGNER_HEADER = "x-ledger-signer";
export const SIGNATURE_HEADER = "x-ledger-signature";
export const SIGNED_AT_HEADER = "x-ledger-timestamp";

export const DEFAULT_SIGNATURE_MAX_SKEW_MS = 5 * 60 * 1000;

export interface SignableRequest {
  method: string;
  path: string;
  body: unknown;
}

export interface SignedRequestHeaders {
  [SIGNER_HEADER]: string;
  [SIGNATURE_HEADER]: string;
  [SIGNED_AT_HEADER]: string;
}

export type SignatureCheck =
  | { ok: true; signer: string; digest: string; signedAt: string }
  | { ok: false; reason: "missing_signature" | "malformed_signature" | "stale_signature" | "bad_signature" };

export interface VerifySignatureOptions {
  now?: Date;
  maxSkewMs?: number;
}

/** Digest that the caller signs: method, path, timestamp and body, canonicalized. */
export function requestDigest(request: SignableRequest, timestamp: string): string {
  return sha256Hex(
    canonicalJson({
      method: request.method.toUpperCase(),
      path: request.path,
      timestamp,
      body: request.body ?? null,
    }),
  );
}

export async function buildSignedRequestHeaders(
  request: SignableRequest,
  privateKeyHex: string,
  signedAt: Date = new Date(),
): Promise<SignedRequestHeaders> {
  const timestamp = signedAt.toISOString();
  const signer = await publicKeyFromPrivateKeyHex(privateKeyHex);
  const signature = await signHex(requestDigest(request, timestamp), privateKeyHex);
  return {
    [SIGNER_HEADER]: signer,
    [SIGNATURE_HEADER]: signature,
    [SIGNED_AT_HEADER]: timestamp,
  };
}

export async function verifySignedRequest(
  request: SignableRequest,
  headers: Record<string, unknown>,
  options: VerifySignatureOptions = {},
): Promise<SignatureCheck> {
  const signer = firstHeaderValue(headers[SIGNER_HEADER]);
  const signature = firstHeaderValue(headers[SIGNATURE_HEADER]);
  const timestamp = firstHeaderValue(headers[SIGNED_AT_HEADER]);
  if (!signer || !signature || !timestamp) {
    return { ok: false, reason: "missing_signature" };
  }

  const signedAtMs = Date.parse(timestamp);
  if (!isKeyHex(signer) || !/^[0-9a-f]{128}$/.test(signature) || Number.isNaN(signedAtMs)) {
    return { ok: false, reason: "malformed_signature" };
  }

  const now = options.now ?? new Date();
  const maxSkewMs = options.maxSkewMs ?? DEFAULT_SIGNATURE_MAX_SKEW_MS;
  if (Math.abs(now.getTime() - signedAtMs) > maxSkewMs) {
    return { ok: false, reason: "stale_signature" };
  }

  const digest = requestDigest(request, timestamp);
  let valid = false;
  try {
    valid = await verifyHex(digest, signature, signer);
  } catch {
    valid = false;
  }
  if (!valid) {
    return { ok: false, reason: "bad_signature" };
  }
  return { ok: true, signer, digest, signedAt: new Date(signedAtMs).toISOString() };
}
