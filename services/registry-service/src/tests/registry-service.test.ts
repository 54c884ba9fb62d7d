import assert from "node:assert/strict";
import { mkdtempSync, rmSync } from "node:fs";
import { createServer } from "node:http";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";
import { buildServer } from "../server.js";

const OWNER = "0x1111111111111111111111111111111111111111";
const ISSUER = "0x2222222222222222222222222222222222222222";
const OTHER_ISSUER = "0x3333333333333333333333333333333333333333";
const H1 = `0x${"ab".repeat(32)}`;
const H2 = `0x${"cd".repeat(32)}`;
const NOW = 1700000000;

function createTempDbPath() {
  const dir = mkdtempSync(join(tmpdir(), "certreg-registry-service-"));
  return {
    dir,
    dbPath: join(dir, "registry.db"),
  };
}

function buildTestServer(dbPath: string, extra: Parameters<typeof buildServer>[0] = {}) {
  return buildServer({
    dbPath,
    ownerAddress: OWNER,
    clock: () => NOW,
    logger: false,
    ...extra,
  });
}

function as(caller: string) {
  return { "x-caller-address": caller };
}

test("health endpoint is available", async () => {
  const temp = createTempDbPath();
  const app = await buildTestServer(temp.dbPath);
  try {
    const res = await app.inject({ method: "GET", url: "/health" });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), { ok: true, service: "registry-service" });

    const registryRes = await app.inject({ method: "GET", url: "/registry" });
    assert.deepEqual(registryRes.json(), { owner: OWNER });
  } finally {
    await app.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("issue, fetch and verify a certificate", async () => {
  const temp = createTempDbPath();
  const app = await buildTestServer(temp.dbPath);
  try {
    const issueRes = await app.inject({
      method: "POST",
      url: "/certificates/issue",
      headers: as(OWNER),
      payload: { certId: "A-1", certHash: H1, ipfsCid: "bafy-a1" },
    });
    assert.equal(issueRes.statusCode, 201);
    const issueBody = issueRes.json() as {
      event: { seq: number; event: { type: string; issuer: string } };
      indexerStatus: string;
    };
    assert.equal(issueBody.event.seq, 2);
    assert.equal(issueBody.event.event.type, "CERTIFICATE_ISSUED");
    assert.equal(issueBody.event.event.issuer, OWNER);
    assert.equal(issueBody.indexerStatus, "SKIPPED");

    const getRes = await app.inject({ method: "GET", url: "/certificates/A-1" });
    assert.equal(getRes.statusCode, 200);
    assert.deepEqual(getRes.json(), {
      certId: "A-1",
      certificate: {
        certHash: H1,
        ipfsCid: "bafy-a1",
        issuedBy: OWNER,
        issuedAt: NOW,
        revoked: false,
      },
    });

    const verifyRes = await app.inject({
      method: "POST",
      url: "/certificates/verify",
      payload: { certId: "A-1", certHash: H1 },
    });
    assert.equal(verifyRes.statusCode, 200);
    assert.deepEqual(verifyRes.json(), { certId: "A-1", valid: true });

    const mismatchRes = await app.inject({
      method: "POST",
      url: "/certificates/verify",
      payload: { certId: "A-1", certHash: H2 },
    });
    assert.deepEqual(mismatchRes.json(), { certId: "A-1", valid: false });
  } finally {
    await app.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("mutations require a caller address", async () => {
  const temp = createTempDbPath();
  const app = await buildTestServer(temp.dbPath);
  try {
    const missingRes = await app.inject({
      method: "POST",
      url: "/certificates/issue",
      payload: { certId: "A-1", certHash: H1 },
    });
    assert.equal(missingRes.statusCode, 401);
    assert.equal((missingRes.json() as { error: string }).error, "missing_caller");

    const malformedRes = await app.inject({
      method: "POST",
      url: "/issuers",
      headers: as("owner"),
      payload: { address: ISSUER },
    });
    assert.equal(malformedRes.statusCode, 401);

    const paddedCallerRes = await app.inject({
      method: "POST",
      url: "/issuers",
      headers: as(` ${OWNER} `),
      payload: { address: ISSUER },
    });
    assert.equal(paddedCallerRes.statusCode, 201);
  } finally {
    await app.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("service token is enforced on mutations when configured", async () => {
  const temp = createTempDbPath();
  const app = await buildTestServer(temp.dbPath, { serviceAuthToken: "test-secret" });
  try {
    const deniedRes = await app.inject({
      method: "POST",
      url: "/issuers",
      headers: as(OWNER),
      payload: { address: ISSUER },
    });
    assert.equal(deniedRes.statusCode, 401);
    assert.equal((deniedRes.json() as { error: string }).error, "unauthorized_service");

    const allowedRes = await app.inject({
      method: "POST",
      url: "/issuers",
      headers: { ...as(OWNER), "x-service-token": "test-secret" },
      payload: { address: ISSUER },
    });
    assert.equal(allowedRes.statusCode, 201);

    const readRes = await app.inject({
      method: "POST",
      url: "/certificates/verify",
      payload: { certId: "A-1", certHash: H1 },
    });
    assert.equal(readRes.statusCode, 200);
  } finally {
    await app.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("maps registry failures to HTTP errors", async () => {
  const temp = createTempDbPath();
  const app = await buildTestServer(temp.dbPath);
  try {
    const unauthorizedRes = await app.inject({
      method: "POST",
      url: "/certificates/issue",
      headers: as(ISSUER),
      payload: { certId: "A-1", certHash: H1 },
    });
    assert.equal(unauthorizedRes.statusCode, 403);
    assert.equal((unauthorizedRes.json() as { error: string }).error, "unauthorized");

    const zeroHashRes = await app.inject({
      method: "POST",
      url: "/certificates/issue",
      headers: as(OWNER),
      payload: { certId: "A-1", certHash: `0x${"00".repeat(32)}` },
    });
    assert.equal(zeroHashRes.statusCode, 400);
    assert.equal((zeroHashRes.json() as { error: string }).error, "invalid_argument");

    const badBodyRes = await app.inject({
      method: "POST",
      url: "/certificates/issue",
      headers: as(OWNER),
      payload: { certId: 7, certHash: H1 },
    });
    assert.equal(badBodyRes.statusCode, 400);
    assert.equal((badBodyRes.json() as { error: string }).error, "invalid_request");

    await app.inject({
      method: "POST",
      url: "/certificates/issue",
      headers: as(OWNER),
      payload: { certId: "A-1", certHash: H1 },
    });
    const duplicateRes = await app.inject({
      method: "POST",
      url: "/certificates/issue",
      headers: as(OWNER),
      payload: { certId: "A-1", certHash: H2 },
    });
    assert.equal(duplicateRes.statusCode, 409);
    assert.equal((duplicateRes.json() as { error: string }).error, "certificate_exists");

    const blankRes = await app.inject({ method: "GET", url: "/certificates/%20" });
    assert.equal(blankRes.statusCode, 404);
    assert.equal((blankRes.json() as { error: string }).error, "certificate_not_found");

    const missingRes = await app.inject({ method: "GET", url: "/certificates/NOPE" });
    assert.equal(missingRes.statusCode, 404);
    assert.equal((missingRes.json() as { error: string }).error, "certificate_not_found");

    const revokeMissingRes = await app.inject({
      method: "POST",
      url: "/certificates/NOPE/revoke",
      headers: as(OWNER),
    });
    assert.equal(revokeMissingRes.statusCode, 404);
  } finally {
    await app.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("owner override revokes another issuer's certificate", async () => {
  const temp = createTempDbPath();
  const app = await buildTestServer(temp.dbPath);
  try {
    for (const address of [ISSUER, OTHER_ISSUER]) {
      const addRes = await app.inject({
        method: "POST",
        url: "/issuers",
        headers: as(OWNER),
        payload: { address },
      });
      assert.equal(addRes.statusCode, 201);
    }

    const issueRes = await app.inject({
      method: "POST",
      url: "/certificates/issue",
      headers: as(ISSUER),
      payload: { certId: "B-2", certHash: H2 },
    });
    assert.equal(issueRes.statusCode, 201);

    const thirdPartyRes = await app.inject({
      method: "POST",
      url: "/certificates/B-2/revoke",
      headers: as(OTHER_ISSUER),
    });
    assert.equal(thirdPartyRes.statusCode, 403);

    const ownerRes = await app.inject({
      method: "POST",
      url: "/certificates/B-2/revoke",
      headers: as(OWNER),
    });
    assert.equal(ownerRes.statusCode, 200);
    const ownerBody = ownerRes.json() as {
      event: { event: { type: string; certId: string; revoker: string } };
    };
    assert.deepEqual(
      [ownerBody.event.event.type, ownerBody.event.event.certId, ownerBody.event.event.revoker],
      ["CERTIFICATE_REVOKED", "B-2", OWNER],
    );

    const againRes = await app.inject({
      method: "POST",
      url: "/certificates/B-2/revoke",
      headers: as(ISSUER),
    });
    assert.equal(againRes.statusCode, 409);
    assert.equal((againRes.json() as { error: string }).error, "already_revoked");

    const diagnosticRes = await app.inject({
      method: "POST",
      url: "/certificates/verify/diagnostic",
      payload: { certId: "B-2", certHash: H2 },
    });
    assert.deepEqual(diagnosticRes.json(), { certId: "B-2", valid: false, outcome: "REVOKED" });
  } finally {
    await app.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("adds, reads and removes issuers", async () => {
  const temp = createTempDbPath();
  const app = await buildTestServer(temp.dbPath);
  try {
    const zeroRes = await app.inject({
      method: "POST",
      url: "/issuers",
      headers: as(OWNER),
      payload: { address: "0x0000000000000000000000000000000000000000" },
    });
    assert.equal(zeroRes.statusCode, 400);
    assert.equal((zeroRes.json() as { error: string }).error, "invalid_argument");

    const notOwnerRes = await app.inject({
      method: "POST",
      url: "/issuers",
      headers: as(ISSUER),
      payload: { address: ISSUER },
    });
    assert.equal(notOwnerRes.statusCode, 403);

    await app.inject({
      method: "POST",
      url: "/issuers",
      headers: as(OWNER),
      payload: { address: ISSUER },
    });
    const readRes = await app.inject({ method: "GET", url: `/issuers/${ISSUER}` });
    assert.deepEqual(readRes.json(), { address: ISSUER, authorized: true });

    const removeRes = await app.inject({
      method: "DELETE",
      url: `/issuers/${ISSUER}`,
      headers: as(OWNER),
    });
    assert.equal(removeRes.statusCode, 200);
    const removeBody = removeRes.json() as { event: { event: { type: string; account: string } } };
    assert.equal(removeBody.event.event.type, "ISSUER_REMOVED");
    assert.equal(removeBody.event.event.account, ISSUER);

    const afterRes = await app.inject({ method: "GET", url: `/issuers/${ISSUER}` });
    assert.deepEqual(afterRes.json(), { address: ISSUER, authorized: false });
  } finally {
    await app.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("lists the notification log", async () => {
  const temp = createTempDbPath();
  const app = await buildTestServer(temp.dbPath);
  try {
    await app.inject({
      method: "POST",
      url: "/certificates/issue",
      headers: as(OWNER),
      payload: { certId: "A-1", certHash: H1 },
    });
    await app.inject({
      method: "POST",
      url: "/certificates/A-1/revoke",
      headers: as(OWNER),
    });

    const res = await app.inject({ method: "GET", url: "/events?after=1&limit=10" });
    assert.equal(res.statusCode, 200);
    const body = res.json() as { events: Array<{ seq: number; event: { type: string } }> };
    assert.deepEqual(
      body.events.map((record) => [record.seq, record.event.type]),
      [
        [2, "CERTIFICATE_ISSUED"],
        [3, "CERTIFICATE_REVOKED"],
      ],
    );

    const badRes = await app.inject({ method: "GET", url: "/events?after=-1" });
    assert.equal(badRes.statusCode, 400);
    assert.equal((badRes.json() as { error: string }).error, "invalid_query");
  } finally {
    await app.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("serves OpenAPI document", async () => {
  const temp = createTempDbPath();
  const app = await buildTestServer(temp.dbPath);
  try {
    const res = await app.inject({ method: "GET", url: "/openapi.json" });
    assert.equal(res.statusCode, 200);
    const body = res.json() as { openapi: string; paths: Record<string, unknown> };
    assert.equal(body.openapi, "3.0.3");
    assert.equal(typeof body.paths["/certificates/issue"], "object");
    assert.equal(typeof body.paths["/issuers/{address}"], "object");
  } finally {
    await app.close();
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("persists state across restart and refuses a different owner", async () => {
  const temp = createTempDbPath();
  const app1 = await buildTestServer(temp.dbPath);
  try {
    const issueRes = await app1.inject({
      method: "POST",
      url: "/certificates/issue",
      headers: as(OWNER),
      payload: { certId: "P-1", certHash: H1 },
    });
    assert.equal(issueRes.statusCode, 201);
  } finally {
    await app1.close();
  }

  try {
    await assert.rejects(
      buildTestServer(temp.dbPath, { ownerAddress: ISSUER }),
      (error: unknown) => error instanceof Error && error.name === "RegistryError",
    );

    const app2 = await buildTestServer(temp.dbPath);
    try {
      const verifyRes = await app2.inject({
        method: "POST",
        url: "/certificates/verify",
        payload: { certId: "P-1", certHash: H1 },
      });
      assert.deepEqual(verifyRes.json(), { certId: "P-1", valid: true });
    } finally {
      await app2.close();
    }
  } finally {
    rmSync(temp.dir, { recursive: true, force: true });
  }
});

test("requires an owner address", async () => {
  const previous = process.env.REGISTRY_OWNER_ADDRESS;
  delete process.env.REGISTRY_OWNER_ADDRESS;
  try {
    await assert.rejects(buildServer({ logger: false }), /REGISTRY_OWNER_ADDRESS is required/);
  } finally {
    if (previous !== undefined) {
      process.env.REGISTRY_OWNER_ADDRESS = previous;
    }
  }
});

test("publishes committed events to the indexer", async () => {
  const temp = createTempDbPath();
  const received: Array<{ token: unknown; body: { seq: number; event: { type: string } } }> = [];
  const indexerMock = createServer((req, res) => {
    if (req.method === "POST" && req.url === "/ingest/registry-event") {
      let body = "";
      req.on("data", (chunk) => {
        body += String(chunk);
      });
      req.on("end", () => {
        received.push({
          token: req.headers["x-service-token"],
          body: JSON.parse(body) as { seq: number; event: { type: string } },
        });
        res.statusCode = received.length === 1 ? 202 : 500;
        res.end();
      });
      return;
    }
    res.statusCode = 404;
    res.end();
  });

  await new Promise<void>((resolve) => indexerMock.listen(0, "127.0.0.1", resolve));
  const address = indexerMock.address();
  const port = typeof address === "object" && address ? address.port : 0;
  const app = await buildTestServer(temp.dbPath, {
    indexerUrl: `http://127.0.0.1:${port}/`,
    serviceAuthToken: "test-secret",
  });

  try {
    const headers = { ...as(OWNER), "x-service-token": "test-secret" };
    const addRes = await app.inject({
      method: "POST",
      url: "/issuers",
      headers,
      payload: { address: ISSUER },
    });
    assert.equal(addRes.statusCode, 201);
    assert.equal((addRes.json() as { indexerStatus: string }).indexerStatus, "PUBLISHED");

    const issueRes = await app.inject({
      method: "POST",
      url: "/certificates/issue",
      headers,
      payload: { certId: "I-1", certHash: H1 },
    });
    assert.equal(issueRes.statusCode, 201);
    assert.equal((issueRes.json() as { indexerStatus: string }).indexerStatus, "FAILED");

    assert.equal(received.length, 2);
    assert.equal(received[0].token, "test-secret");
    assert.equal(received[0].body.seq, 2);
    assert.equal(received[0].body.event.type, "ISSUER_ADDED");
    assert.equal(received[1].body.event.type, "CERTIFICATE_ISSUED");

    const getRes = await app.inject({ method: "GET", url: "/certificates/I-1" });
    assert.equal(getRes.statusCode, 200);
  } finally {
    await app.close();
    await new Promise<void>((resolve, reject) =>
      indexerMock.close((err) => (err ? reject(err) : resolve())),
    );
    rmSync(temp.dir, { recursive: true, force: true });
  }
});
