import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";

export function sha256Hex(input: string): string {
  const bytes = utf8ToBytes(input);
  return bytesToHex(sha256(bytes));
}

/**
 * Content hash of a certificate file in the registry's wire form
 * (0x-prefixed, 32 bytes). Clients compute this before calling issue/verify.
 */
export function certificateContentHash(content: Uint8Array | string): string {
  const bytes = typeof content === "string" ? utf8ToBytes(content) : content;
  return `0x${bytesToHex(sha256(bytes))}`;
}
