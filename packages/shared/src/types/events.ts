export type RegistryEventType =
  | "ISSUER_ADDED"
  | "ISSUER_REMOVED"
  | "CERTIFICATE_ISSUED"
  | "CERTIFICATE_REVOKED";

export interface RegistryEventBase {
  type: RegistryEventType;
  occurredAt: string;   // ISO date
}

export interface IssuerAddedEvent extends RegistryEventBase {
  type: "ISSUER_ADDED";
  account: string;
}

export interface IssuerRemovedEvent extends RegistryEventBase {
  type: "ISSUER_REMOVED";
  account: string;
}

export interface CertificateIssuedEvent extends RegistryEventBase {
  type: "CERTIFICATE_ISSUED";
  certId: string;
  certHash: string;
  ipfsCid: string;
  issuer: string;
}

export interface CertificateRevokedEvent extends RegistryEventBase {
  type: "CERTIFICATE_REVOKED";
  certId: string;
  revoker: string;
}

export type RegistryEvent =
  | IssuerAddedEvent
  | IssuerRemovedEvent
  | CertificateIssuedEvent
  | CertificateRevokedEvent;

export interface StoredRegistryEvent {
  seq: number;
  eventHash: string;    // sha256Hex(canonicalJson(event))
  event: RegistryEvent;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

export function isRegistryEvent(value: unknown): value is RegistryEvent {
  if (!isObject(value)) return false;
  if (!isString(value.occurredAt)) return false;

  if (value.type === "ISSUER_ADDED" || value.type === "ISSUER_REMOVED") {
    return isString(value.account);
  }
  if (value.type === "CERTIFICATE_ISSUED") {
    return (
      isString(value.certId) &&
      isString(value.certHash) &&
      isString(value.ipfsCid) &&
      isString(value.issuer)
    );
  }
  if (value.type === "CERTIFICATE_REVOKED") {
    return isString(value.certId) && isString(value.revoker);
  }

  return false;
}
