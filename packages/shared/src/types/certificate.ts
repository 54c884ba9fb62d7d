export type CertificateStatus = "ACTIVE" | "REVOKED";

/** Public view of a registry entry. */
export interface CertificateRecord {
  certHash: string;         // 0x-prefixed 32-byte content hash, lowercase
  ipfsCid: string;          // off-chain pointer, stored as given
  issuedBy: string;         // checksummed issuer address
  issuedAt: number;         // unix seconds
  revoked: boolean;
}

export interface StoredCertificate {
  certId: string;
  certHash: string;
  ipfsCid: string;
  issuedBy: string;
  issuedAt: number;
  status: CertificateStatus;
}

export type VerificationOutcome =
  | "VALID"
  | "NOT_FOUND"
  | "REVOKED"
  | "HASH_MISMATCH"
  | "INVALID_INPUT";

export interface VerificationReport {
  valid: boolean;
  outcome: VerificationOutcome;
}

export function toCertificateRecord(stored: StoredCertificate): CertificateRecord {
  return {
    certHash: stored.certHash,
    ipfsCid: stored.ipfsCid,
    issuedBy: stored.issuedBy,
    issuedAt: stored.issuedAt,
    revoked: stored.status === "REVOKED",
  };
}
