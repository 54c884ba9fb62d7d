import { normalizeAddress } from "../crypto/identifiers.js";

export const SERVICE_AUTH_HEADER = "x-service-token";
export const CALLER_ADDRESS_HEADER = "x-caller-address";

/** Repeated headers arrive as arrays; the registry only honours the first string. */
function firstHeaderValue(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const first = value.find((item) => typeof item === "string");
    return typeof first === "string" ? first : null;
  }
  return null;
}

function configuredToken(token: string | undefined | null): string | null {
  const trimmed = token?.trim();
  return trimmed ? trimmed : null;
}

export function buildServiceAuthHeaders(
  token: string | undefined | null,
): Record<string, string> {
  const expected = configuredToken(token);
  return expected ? { [SERVICE_AUTH_HEADER]: expected } : {};
}

/**
 * An unset token disables the check. Any entry of a repeated header may
 * carry the token, since gateways append rather than replace it.
 */
export function isServiceAuthAuthorized(
  providedHeader: unknown,
  expectedToken: string | undefined | null,
): boolean {
  const expected = configuredToken(expectedToken);
  if (!expected) return true;
  const provided = Array.isArray(providedHeader) ? providedHeader : [providedHeader];
  return provided.includes(expected);
}

/** Checksummed caller address from `x-caller-address`, or null when absent or malformed. */
export function parseCallerHeader(value: unknown): string | null {
  return normalizeAddress(firstHeaderValue(value));
}
