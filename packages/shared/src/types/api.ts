import type { CertificateRecord, VerificationOutcome } from "./certificate.js";
import type { StoredRegistryEvent } from "./events.js";

export interface IssueCertificateRequest {
  certId: string;
  certHash: string;
  ipfsCid?: string;
}

export interface RegistryMutationResponse {
  event: StoredRegistryEvent;
  indexerStatus: "PUBLISHED" | "SKIPPED" | "FAILED";
}

export interface VerifyCertificateRequest {
  certId: string;
  certHash: string;
}

export interface VerifyCertificateResponse {
  certId: string;
  valid: boolean;
}

export interface InspectCertificateResponse {
  certId: string;
  valid: boolean;
  outcome: VerificationOutcome;
}

export interface GetCertificateResponse {
  certId: string;
  certificate: CertificateRecord;
}

export interface AddIssuerRequest {
  address: string;
}

export interface GetIssuerResponse {
  address: string;
  authorized: boolean;
}

export interface GetRegistryResponse {
  owner: string;
}

export interface ListRegistryEventsResponse {
  events: StoredRegistryEvent[];
}
