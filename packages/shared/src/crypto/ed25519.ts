import * as ed from "@noble/ed25519";
import { hexToBytes, bytesToHex } from "@noble/hashes/utils";

export async function signHex(hashHex: string, privateKeyHex: string): Promise<string> {
  const sig = await ed.signAsync(hexToBytes(hashHex), hexToBytes(privateKeyHex));
  return bytesToHex(sig);
}

export async function verifyHex(hashHex: string, signatureHex: string, publicKeyHex: string): Promise<boolean> {
  return ed.verifyAsync(hexToBytes(signatureHex), hexToBytes(hashHex), hexToBytes(publicKeyHex));
}

export async function publicKeyFromPrivateKeyHex(privateKeyHex: string): Promise<string> {
  const publicKey = await ed.getPublicKeyAsync(hexToBytes(privateKeyHex));
  return bytesToHex(publicKey);
}

export function isKeyHex(value: unknown): value is string {
  return typeof value === "string" && /^[0-9a-f]{64}$/.test(value);
}
