import { ZeroAddress, ZeroHash, getAddress, isAddress, isHexString } from "ethers";

/** Checksummed form of `value`, or null when it is not a 20-byte address. */
export function normalizeAddress(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!/^0x[0-9a-fA-F]{40}$/.test(trimmed) || !isAddress(trimmed)) return null;
  return getAddress(trimmed);
}

export function isZeroAddress(address: string): boolean {
  return address === ZeroAddress;
}

/** Lowercase 0x-prefixed form of a 32-byte hash, or null when malformed. */
export function normalizeCertHash(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  const prefixed = trimmed.startsWith("0x") || trimmed.startsWith("0X")
    ? `0x${trimmed.slice(2)}`
    : `0x${trimmed}`;
  if (!isHexString(prefixed, 32)) return null;
  return prefixed.toLowerCase();
}

export function isZeroCertHash(certHash: string): boolean {
  return certHash === ZeroHash;
}
