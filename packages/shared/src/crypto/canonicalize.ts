import { canonicalize } from "json-canonicalize";
import { sha256Hex } from "./hash.js";

/**
 * Canonical JSON per RFC 8785 (JCS).
 * Canonicalize before hashing for stable outputs.
 */
export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}

export function canonicalHash(value: unknown): string {
  return sha256Hex(canonicalJson(value));
}
