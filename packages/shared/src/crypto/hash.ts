import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";

export const ZERO_HASH_HEX = "0".repeat(64);

export function sha256Hex(input: string): string {
  const bytes = utf8ToBytes(input);
  return bytesToHex(sha256(bytes));
}

export function isSha256Hex(value: unknown): value is string {
  return typeof value === "string" && /^[0-9a-f]{64}$/.test(value);
}
