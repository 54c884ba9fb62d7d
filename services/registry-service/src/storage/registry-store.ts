import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import {
  type CertificateStatus,
  type RegistryEvent,
  type StoredCertificate,
  type StoredRegistryEvent,
  isRegistryEvent,
} from "@certreg/shared";

export interface RegistryStore {
  /** Runs `fn` as one all-or-nothing unit over the whole registry. */
  transaction<T>(fn: () => T): T;
  getOwner(): string | null;
  setOwner(owner: string): void;
  getCertificate(certId: string): StoredCertificate | null;
  insertCertificate(certificate: StoredCertificate): void;
  markRevoked(certId: string): void;
  isIssuer(address: string): boolean;
  setIssuer(address: string, authorized: boolean, updatedAt: number): void;
  appendEvent(event: RegistryEvent, eventHash: string): StoredRegistryEvent;
  listEvents(after: number, limit: number): StoredRegistryEvent[];
  close(): void;
}

interface CertificateRow {
  cert_id: string;
  cert_hash: string;
  ipfs_cid: string;
  issued_by: string;
  issued_at: number;
  status: string;
}

interface IssuerRow {
  authorized: number;
}

interface MetaRow {
  value: string;
}

interface EventRow {
  seq: number;
  event_hash: string;
  event_json: string;
}

function isCertificateStatus(value: string): value is CertificateStatus {
  return value === "ACTIVE" || value === "REVOKED";
}

function toStoredCertificate(row: CertificateRow): StoredCertificate {
  if (!isCertificateStatus(row.status)) {
    throw new Error(`Unknown certificate status '${row.status}' for '${row.cert_id}'`);
  }
  return {
    certId: row.cert_id,
    certHash: row.cert_hash,
    ipfsCid: row.ipfs_cid,
    issuedBy: row.issued_by,
    issuedAt: row.issued_at,
    status: row.status,
  };
}

function toStoredEvent(row: EventRow): StoredRegistryEvent {
  const event: unknown = JSON.parse(row.event_json);
  if (!isRegistryEvent(event)) {
    throw new Error(`Malformed registry event at seq ${row.seq}`);
  }
  return { seq: row.seq, eventHash: row.event_hash, event };
}

export class SqliteRegistryStore implements RegistryStore {
  private readonly db: Database.Database;
  private readonly getMetaStmt: Database.Statement<[string], MetaRow>;
  private readonly insertMetaStmt: Database.Statement<[string, string]>;
  private readonly getCertStmt: Database.Statement<[string], CertificateRow>;
  private readonly insertCertStmt: Database.Statement<[string, string, string, string, number, string]>;
  private readonly revokeCertStmt: Database.Statement<[string]>;
  private readonly getIssuerStmt: Database.Statement<[string], IssuerRow>;
  private readonly upsertIssuerStmt: Database.Statement<[string, number, number]>;
  private readonly insertEventStmt: Database.Statement<[string, string, string]>;
  private readonly listEventsStmt: Database.Statement<[number, number], EventRow>;

  constructor(dbPath: string) {
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS registry_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS issuers (
        address TEXT PRIMARY KEY,
        authorized INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );
      CREATE TABLE IF NOT EXISTS certificates (
        cert_id TEXT PRIMARY KEY,
        cert_hash TEXT NOT NULL,
        ipfs_cid TEXT NOT NULL,
        issued_by TEXT NOT NULL,
        issued_at INTEGER NOT NULL,
        status TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS registry_events (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        type TEXT NOT NULL,
        event_hash TEXT NOT NULL,
        event_json TEXT NOT NULL
      );
    `);

    this.getMetaStmt = this.db.prepare<[string], MetaRow>(`
      SELECT value
      FROM registry_meta
      WHERE key = ?
      LIMIT 1
    `);

    this.insertMetaStmt = this.db.prepare<[string, string]>(`
      INSERT INTO registry_meta (key, value)
      VALUES (?, ?)
    `);

    this.getCertStmt = this.db.prepare<[string], CertificateRow>(`
      SELECT cert_id, cert_hash, ipfs_cid, issued_by, issued_at, status
      FROM certificates
      WHERE cert_id = ?
      LIMIT 1
    `);

    this.insertCertStmt = this.db.prepare<[string, string, string, string, number, string]>(`
      INSERT INTO certificates (cert_id, cert_hash, ipfs_cid, issued_by, issued_at, status)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    this.revokeCertStmt = this.db.prepare<[string]>(`
      UPDATE certificates
      SET status = 'REVOKED'
      WHERE cert_id = ? AND status = 'ACTIVE'
    `);

    this.getIssuerStmt = this.db.prepare<[string], IssuerRow>(`
      SELECT authorized
      FROM issuers
      WHERE address = ?
      LIMIT 1
    `);

    this.upsertIssuerStmt = this.db.prepare<[string, number, number]>(`
      INSERT INTO issuers (address, authorized, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(address) DO UPDATE SET
        authorized = excluded.authorized,
        updated_at = excluded.updated_at
    `);

    this.insertEventStmt = this.db.prepare<[string, string, string]>(`
      INSERT INTO registry_events (type, event_hash, event_json)
      VALUES (?, ?, ?)
    `);

    this.listEventsStmt = this.db.prepare<[number, number], EventRow>(`
      SELECT seq, event_hash, event_json
      FROM registry_events
      WHERE seq > ?
      ORDER BY seq ASC
      LIMIT ?
    `);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  getOwner(): string | null {
    const row = this.getMetaStmt.get("owner");
    return row ? row.value : null;
  }

  setOwner(owner: string): void {
    this.insertMetaStmt.run("owner", owner);
  }

  getCertificate(certId: string): StoredCertificate | null {
    const row = this.getCertStmt.get(certId);
    if (!row) return null;
    return toStoredCertificate(row);
  }

  insertCertificate(certificate: StoredCertificate): void {
    this.insertCertStmt.run(
      certificate.certId,
      certificate.certHash,
      certificate.ipfsCid,
      certificate.issuedBy,
      certificate.issuedAt,
      certificate.status,
    );
  }

  markRevoked(certId: string): void {
    this.revokeCertStmt.run(certId);
  }

  isIssuer(address: string): boolean {
    const row = this.getIssuerStmt.get(address);
    return !!row && row.authorized === 1;
  }

  setIssuer(address: string, authorized: boolean, updatedAt: number): void {
    this.upsertIssuerStmt.run(address, authorized ? 1 : 0, updatedAt);
  }

  appendEvent(event: RegistryEvent, eventHash: string): StoredRegistryEvent {
    const info = this.insertEventStmt.run(event.type, eventHash, JSON.stringify(event));
    return { seq: Number(info.lastInsertRowid), eventHash, event };
  }

  listEvents(after: number, limit: number): StoredRegistryEvent[] {
    return this.listEventsStmt.all(after, limit).map(toStoredEvent);
  }

  close(): void {
    this.db.close();
  }
}
