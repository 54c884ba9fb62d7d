import type { FastifyBaseLogger } from "fastify";
import {
  type CertificateRecord,
  type RegistryEvent,
  type StoredRegistryEvent,
  type VerificationReport,
  canonicalHash,
  isZeroAddress,
  isZeroCertHash,
  normalizeAddress,
  normalizeCertHash,
  toCertificateRecord,
} from "@certreg/shared";
import { RegistryError } from "./errors.js";
import type { RegistryStore } from "./storage/registry-store.js";

export const DEFAULT_EVENT_PAGE_SIZE = 100;
export const MAX_EVENT_PAGE_SIZE = 500;

export type RegistryClock = () => number;
export type RegistryLogger = Pick<FastifyBaseLogger, "info">;

export interface CertificateRegistryOptions {
  store: RegistryStore;
  ownerAddress: string;
  clock?: RegistryClock;
  logger?: RegistryLogger;
}

export interface ListEventsOptions {
  after?: number;
  limit?: number;
}

function unixSecondsNow(): number {
  return Math.floor(Date.now() / 1000);
}

function isoFromUnixSeconds(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

/**
 * Issuer set and certificate records behind one owner.
 *
 * Every operation is synchronous and runs inside a single store transaction,
 * so operations are totally ordered and a failed precondition leaves no trace.
 * Mutations append their notification event in the same transaction.
 */
export class CertificateRegistry {
  private readonly store: RegistryStore;
  private readonly clock: RegistryClock;
  private readonly logger?: RegistryLogger;
  readonly owner: string;

  constructor(options: CertificateRegistryOptions) {
    const owner = normalizeAddress(options.ownerAddress);
    if (!owner || isZeroAddress(owner)) {
      throw new RegistryError(
        "INVALID_ARGUMENT",
        `Owner address '${options.ownerAddress}' is not a usable address`,
      );
    }

    this.store = options.store;
    this.clock = options.clock || unixSecondsNow;
    this.logger = options.logger;
    this.owner = owner;
    this.initialize();
  }

  private initialize(): void {
    const persistedOwner = this.store.transaction(() => this.store.getOwner());
    if (persistedOwner === null) {
      this.mutate((now) => {
        this.store.setOwner(this.owner);
        this.store.setIssuer(this.owner, true, now);
        return { type: "ISSUER_ADDED", occurredAt: isoFromUnixSeconds(now), account: this.owner };
      });
      return;
    }
    if (persistedOwner !== this.owner) {
      throw new RegistryError(
        "OWNER_MISMATCH",
        `Registry is owned by ${persistedOwner}, configured owner is ${this.owner}`,
      );
    }
  }

  private mutate(apply: (now: number) => RegistryEvent): StoredRegistryEvent {
    const stored = this.store.transaction(() => {
      const event = apply(this.clock());
      return this.store.appendEvent(event, canonicalHash(event));
    });
    this.logger?.info({ seq: stored.seq, type: stored.event.type }, "registry event committed");
    return stored;
  }

  private requireOwner(caller: string): string {
    const normalized = normalizeAddress(caller);
    if (normalized !== this.owner) {
      throw new RegistryError("UNAUTHORIZED", "Only the registry owner can manage issuers");
    }
    return normalized;
  }

  private requireAccount(address: string): string {
    const normalized = normalizeAddress(address);
    if (!normalized) {
      throw new RegistryError("INVALID_ARGUMENT", `'${address}' is not a valid address`);
    }
    return normalized;
  }

  issueCertificate(
    caller: string,
    certId: string,
    certHash: string,
    ipfsCid = "",
  ): StoredRegistryEvent {
    return this.mutate((now) => {
      const issuer = normalizeAddress(caller);
      if (!issuer || !this.store.isIssuer(issuer)) {
        throw new RegistryError("UNAUTHORIZED", "Caller is not an authorized issuer");
      }
      if (certId.length === 0) {
        throw new RegistryError("INVALID_ARGUMENT", "Certificate id must not be empty");
      }
      const hash = normalizeCertHash(certHash);
      if (!hash || isZeroCertHash(hash)) {
        throw new RegistryError("INVALID_ARGUMENT", "Certificate hash must be a non-zero 32-byte hex value");
      }
      if (this.store.getCertificate(certId)) {
        throw new RegistryError("ALREADY_EXISTS", `Certificate '${certId}' already exists`);
      }

      this.store.insertCertificate({
        certId,
        certHash: hash,
        ipfsCid,
        issuedBy: issuer,
        issuedAt: now,
        status: "ACTIVE",
      });

      return {
        type: "CERTIFICATE_ISSUED",
        occurredAt: isoFromUnixSeconds(now),
        certId,
        certHash: hash,
        ipfsCid,
        issuer,
      };
    });
  }

  /**
   * True only for an existing, unrevoked record whose hash matches.
   * Absence, revocation and mismatch are deliberately indistinguishable here;
   * see {@link inspectCertificate} for the reason.
   */
  verifyCertificate(certId: string, certHash: string): boolean {
    return this.inspectCertificate(certId, certHash).valid;
  }

  inspectCertificate(certId: string, certHash: string): VerificationReport {
    const hash = normalizeCertHash(certHash);
    if (certId.length === 0 || !hash) {
      return { valid: false, outcome: "INVALID_INPUT" };
    }

    const stored = this.store.transaction(() => this.store.getCertificate(certId));
    if (!stored) {
      return { valid: false, outcome: "NOT_FOUND" };
    }
    if (stored.certHash !== hash) {
      return { valid: false, outcome: "HASH_MISMATCH" };
    }
    if (stored.status === "REVOKED") {
      return { valid: false, outcome: "REVOKED" };
    }
    return { valid: true, outcome: "VALID" };
  }

  revokeCertificate(caller: string, certId: string): StoredRegistryEvent {
    return this.mutate((now) => {
      const stored = this.store.getCertificate(certId);
      if (!stored) {
        throw new RegistryError("NOT_FOUND", `Certificate '${certId}' does not exist`);
      }
      if (stored.status === "REVOKED") {
        throw new RegistryError("ALREADY_REVOKED", `Certificate '${certId}' is already revoked`);
      }
      const revoker = normalizeAddress(caller);
      if (!revoker || (revoker !== stored.issuedBy && revoker !== this.owner)) {
        throw new RegistryError(
          "UNAUTHORIZED",
          "Only the issuing principal or the registry owner can revoke",
        );
      }

      this.store.markRevoked(certId);
      return {
        type: "CERTIFICATE_REVOKED",
        occurredAt: isoFromUnixSeconds(now),
        certId,
        revoker,
      };
    });
  }

  addIssuer(caller: string, address: string): StoredRegistryEvent {
    return this.mutate((now) => {
      this.requireOwner(caller);
      const account = this.requireAccount(address);
      if (isZeroAddress(account)) {
        throw new RegistryError("INVALID_ARGUMENT", "The zero address cannot be an issuer");
      }

      this.store.setIssuer(account, true, now);
      return { type: "ISSUER_ADDED", occurredAt: isoFromUnixSeconds(now), account };
    });
  }

  removeIssuer(caller: string, address: string): StoredRegistryEvent {
    return this.mutate((now) => {
      this.requireOwner(caller);
      const account = this.requireAccount(address);

      this.store.setIssuer(account, false, now);
      return { type: "ISSUER_REMOVED", occurredAt: isoFromUnixSeconds(now), account };
    });
  }

  getCertificate(certId: string): CertificateRecord {
    const stored = this.store.transaction(() => this.store.getCertificate(certId));
    if (!stored) {
      throw new RegistryError("NOT_FOUND", `Certificate '${certId}' does not exist`);
    }
    return toCertificateRecord(stored);
  }

  isIssuer(address: string): boolean {
    const account = normalizeAddress(address);
    if (!account) return false;
    return this.store.transaction(() => this.store.isIssuer(account));
  }

  getOwner(): string {
    return this.owner;
  }

  listEvents(options: ListEventsOptions = {}): StoredRegistryEvent[] {
    const after = Math.max(0, Math.floor(options.after ?? 0));
    const limit = Math.min(
      MAX_EVENT_PAGE_SIZE,
      Math.max(1, Math.floor(options.limit ?? DEFAULT_EVENT_PAGE_SIZE)),
    );
    return this.store.transaction(() => this.store.listEvents(after, limit));
  }
}
