import Fastify, { type FastifyBaseLogger } from "fastify";
import {
  type AddIssuerRequest,
  CALLER_ADDRESS_HEADER,
  type GetCertificateResponse,
  type GetIssuerResponse,
  type GetRegistryResponse,
  type InspectCertificateResponse,
  type IssueCertificateRequest,
  isServiceAuthAuthorized,
  type ListRegistryEventsResponse,
  normalizeAddress,
  parseCallerHeader,
  type RegistryMutationResponse,
  SERVICE_AUTH_HEADER,
  type StoredRegistryEvent,
  type VerifyCertificateRequest,
  type VerifyCertificateResponse,
} from "@certreg/shared";
import { httpErrorFor, isRegistryError } from "./errors.js";
import { tryPublishRegistryEvent } from "./indexer.js";
import { buildOpenApiSpec } from "./openapi.js";
import { CertificateRegistry, type RegistryClock } from "./registry.js";
import { type RegistryStore, SqliteRegistryStore } from "./storage/registry-store.js";

const DEFAULT_DB_PATH = "data/registry-service.db";

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function parseIssueRequest(body: unknown): IssueCertificateRequest | null {
  if (!isObject(body)) return null;
  if (typeof body.certId !== "string") return null;
  if (typeof body.certHash !== "string") return null;
  if (body.ipfsCid !== undefined && typeof body.ipfsCid !== "string") return null;
  return {
    certId: body.certId,
    certHash: body.certHash,
    ipfsCid: body.ipfsCid,
  };
}

function parseVerifyRequest(body: unknown): VerifyCertificateRequest | null {
  if (!isObject(body)) return null;
  if (typeof body.certId !== "string") return null;
  if (typeof body.certHash !== "string") return null;
  return {
    certId: body.certId,
    certHash: body.certHash,
  };
}

function parseAddIssuerRequest(body: unknown): AddIssuerRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.address)) return null;
  return { address: body.address };
}

function parseOptionalCount(value: string | undefined): number | null | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) return null;
  return Number(value);
}

interface BuildServerOptions {
  registryStore?: RegistryStore;
  dbPath?: string;
  ownerAddress?: string;
  serviceAuthToken?: string;
  indexerUrl?: string;
  serviceBaseUrl?: string;
  clock?: RegistryClock;
  logger?: boolean;
}

interface ReplyLike {
  code: (statusCode: number) => { send: (payload: unknown) => unknown };
}

type RequestHeaders = Record<string, string | string[] | undefined>;

function sendRegistryError(reply: ReplyLike, error: unknown) {
  if (!isRegistryError(error)) {
    throw error;
  }
  const mapping = httpErrorFor(error);
  return reply.code(mapping.statusCode).send({
    error: mapping.error,
    message: error.message,
  });
}

export async function buildServer(options: BuildServerOptions = {}) {
  const ownerAddress = options.ownerAddress ?? process.env.REGISTRY_OWNER_ADDRESS;
  if (!ownerAddress) {
    throw new Error(
      "REGISTRY_OWNER_ADDRESS is required (or pass ownerAddress in buildServer options)",
    );
  }

  const app = Fastify({ logger: options.logger ?? true });
  const registryStore =
    options.registryStore ||
    new SqliteRegistryStore(options.dbPath || process.env.REGISTRY_DB_PATH || DEFAULT_DB_PATH);
  const ownStore = !options.registryStore;

  let registry: CertificateRegistry;
  try {
    registry = new CertificateRegistry({
      store: registryStore,
      ownerAddress,
      clock: options.clock,
      logger: app.log,
    });
  } catch (error) {
    if (ownStore) {
      registryStore.close();
    }
    throw error;
  }

  const serviceAuthToken = options.serviceAuthToken ?? process.env.SERVICE_AUTH_TOKEN;
  const indexerUrl = options.indexerUrl ?? process.env.INDEXER_URL;
  const serviceBaseUrl =
    options.serviceBaseUrl ||
    process.env.SERVICE_BASE_URL ||
    `http://127.0.0.1:${process.env.PORT || 4110}`;

  function requireServiceAuth(headers: RequestHeaders, reply: ReplyLike): boolean {
    if (isServiceAuthAuthorized(headers[SERVICE_AUTH_HEADER], serviceAuthToken)) {
      return true;
    }
    reply.code(401).send({
      error: "unauthorized_service",
      message: `Missing or invalid '${SERVICE_AUTH_HEADER}' header`,
    });
    return false;
  }

  function requireCaller(headers: RequestHeaders, reply: ReplyLike): string | null {
    const caller = parseCallerHeader(headers[CALLER_ADDRESS_HEADER]);
    if (caller) {
      return caller;
    }
    reply.code(401).send({
      error: "missing_caller",
      message: `Missing or invalid '${CALLER_ADDRESS_HEADER}' header`,
    });
    return null;
  }

  async function mutationResponse(
    log: FastifyBaseLogger,
    record: StoredRegistryEvent,
  ): Promise<RegistryMutationResponse> {
    const indexerStatus = await tryPublishRegistryEvent(
      indexerUrl,
      record,
      serviceAuthToken,
      log,
    );
    return { event: record, indexerStatus };
  }

  app.get("/health", async () => ({ ok: true, service: "registry-service" }));
  app.get("/openapi.json", async () => buildOpenApiSpec(serviceBaseUrl));

  app.get("/registry", async () => {
    const response: GetRegistryResponse = { owner: registry.getOwner() };
    return response;
  });

  app.post("/certificates/issue", async (req, reply) => {
    if (!requireServiceAuth(req.headers, reply)) return;
    const caller = requireCaller(req.headers, reply);
    if (!caller) return;

    const parsed = parseIssueRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected certId, certHash and optional ipfsCid strings",
      });
    }

    let record: StoredRegistryEvent;
    try {
      record = registry.issueCertificate(caller, parsed.certId, parsed.certHash, parsed.ipfsCid);
    } catch (error) {
      return sendRegistryError(reply, error);
    }

    return reply.code(201).send(await mutationResponse(req.log, record));
  });

  app.post("/certificates/verify", async (req, reply) => {
    const parsed = parseVerifyRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected certId and certHash strings",
      });
    }

    const response: VerifyCertificateResponse = {
      certId: parsed.certId,
      valid: registry.verifyCertificate(parsed.certId, parsed.certHash),
    };
    return response;
  });

  // Diagnostic variant: unlike /certificates/verify it tells callers why a
  // certificate failed verification.
  app.post("/certificates/verify/diagnostic", async (req, reply) => {
    const parsed = parseVerifyRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected certId and certHash strings",
      });
    }

    const report = registry.inspectCertificate(parsed.certId, parsed.certHash);
    const response: InspectCertificateResponse = {
      certId: parsed.certId,
      valid: report.valid,
      outcome: report.outcome,
    };
    return response;
  });

  app.post<{ Params: { certId: string } }>("/certificates/:certId/revoke", async (req, reply) => {
    if (!requireServiceAuth(req.headers, reply)) return;
    const caller = requireCaller(req.headers, reply);
    if (!caller) return;

    let record: StoredRegistryEvent;
    try {
      record = registry.revokeCertificate(caller, req.params.certId);
    } catch (error) {
      return sendRegistryError(reply, error);
    }

    return mutationResponse(req.log, record);
  });

  app.get<{ Params: { certId: string } }>("/certificates/:certId", async (req, reply) => {
    if (req.params.certId.length === 0) {
      return reply.code(400).send({ error: "invalid_cert_id" });
    }

    try {
      const response: GetCertificateResponse = {
        certId: req.params.certId,
        certificate: registry.getCertificate(req.params.certId),
      };
      return response;
    } catch (error) {
      return sendRegistryError(reply, error);
    }
  });

  app.post("/issuers", async (req, reply) => {
    if (!requireServiceAuth(req.headers, reply)) return;
    const caller = requireCaller(req.headers, reply);
    if (!caller) return;

    const parsed = parseAddIssuerRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected address",
      });
    }

    let record: StoredRegistryEvent;
    try {
      record = registry.addIssuer(caller, parsed.address);
    } catch (error) {
      return sendRegistryError(reply, error);
    }

    return reply.code(201).send(await mutationResponse(req.log, record));
  });

  app.delete<{ Params: { address: string } }>("/issuers/:address", async (req, reply) => {
    if (!requireServiceAuth(req.headers, reply)) return;
    const caller = requireCaller(req.headers, reply);
    if (!caller) return;

    let record: StoredRegistryEvent;
    try {
      record = registry.removeIssuer(caller, req.params.address);
    } catch (error) {
      return sendRegistryError(reply, error);
    }

    return mutationResponse(req.log, record);
  });

  app.get<{ Params: { address: string } }>("/issuers/:address", async (req) => {
    const response: GetIssuerResponse = {
      address: normalizeAddress(req.params.address) ?? req.params.address,
      authorized: registry.isIssuer(req.params.address),
    };
    return response;
  });

  app.get<{ Querystring: { after?: string; limit?: string } }>("/events", async (req, reply) => {
    const after = parseOptionalCount(req.query.after);
    const limit = parseOptionalCount(req.query.limit);
    if (after === null || limit === null) {
      return reply.code(400).send({
        error: "invalid_query",
        message: "after and limit must be non-negative integers",
      });
    }

    const response: ListRegistryEventsResponse = {
      events: registry.listEvents({ after, limit }),
    };
    return response;
  });

  app.addHook("onClose", async () => {
    if (ownStore) {
      registryStore.close();
    }
  });

  return app;
}
