const certIdParameter = {
  in: "path",
  name: "certId",
  required: true,
  schema: { type: "string" },
};

const addressParameter = {
  in: "path",
  name: "address",
  required: true,
  schema: { type: "string", pattern: "^0x[0-9a-fA-F]{40}$" },
};

const callerHeaderParameter = {
  in: "header",
  name: "x-caller-address",
  required: true,
  schema: { type: "string", pattern: "^0x[0-9a-fA-F]{40}$" },
};

export function buildOpenApiSpec(serviceBaseUrl: string) {
  return {
    openapi: "3.0.3",
    info: {
      title: "Certificate Registry API",
      version: "1.0.0",
      description: "Issue, verify and revoke certificates; manage the issuer set.",
    },
    servers: [{ url: serviceBaseUrl }],
    paths: {
      "/health": {
        get: {
          summary: "Health check",
          responses: {
            "200": { description: "Service healthy" },
          },
        },
      },
      "/registry": {
        get: {
          summary: "Registry owner",
          responses: {
            "200": { description: "Owner address" },
          },
        },
      },
      "/certificates/issue": {
        post: {
          summary: "Issue a certificate (authorized issuers only)",
          parameters: [callerHeaderParameter],
          responses: {
            "201": { description: "Certificate issued" },
            "400": { description: "Invalid request or argument" },
            "401": { description: "Missing caller or service token" },
            "403": { description: "Caller is not an authorized issuer" },
            "409": { description: "Certificate id already used" },
          },
        },
      },
      "/certificates/verify": {
        post: {
          summary: "Check that a certificate exists, is active and matches a hash",
          responses: {
            "200": { description: "Boolean verification result" },
            "400": { description: "Invalid request" },
          },
        },
      },
      "/certificates/verify/diagnostic": {
        post: {
          summary: "Verification result with the reason a certificate failed",
          responses: {
            "200": { description: "Verification report" },
            "400": { description: "Invalid request" },
          },
        },
      },
      "/certificates/{certId}": {
        get: {
          summary: "Get certificate record by ID",
          parameters: [certIdParameter],
          responses: {
            "200": { description: "Certificate found" },
            "404": { description: "Certificate not found" },
          },
        },
      },
      "/certificates/{certId}/revoke": {
        post: {
          summary: "Revoke a certificate (original issuer or owner)",
          parameters: [certIdParameter, callerHeaderParameter],
          responses: {
            "200": { description: "Certificate revoked" },
            "401": { description: "Missing caller or service token" },
            "403": { description: "Caller may not revoke this certificate" },
            "404": { description: "Certificate not found" },
            "409": { description: "Certificate already revoked" },
          },
        },
      },
      "/issuers": {
        post: {
          summary: "Authorize an issuer (owner only)",
          parameters: [callerHeaderParameter],
          responses: {
            "201": { description: "Issuer added" },
            "400": { description: "Invalid or zero address" },
            "401": { description: "Missing caller or service token" },
            "403": { description: "Caller is not the owner" },
          },
        },
      },
      "/issuers/{address}": {
        get: {
          summary: "Issuer authorization flag",
          parameters: [addressParameter],
          responses: {
            "200": { description: "Authorization flag" },
          },
        },
        delete: {
          summary: "Deauthorize an issuer (owner only)",
          parameters: [addressParameter, callerHeaderParameter],
          responses: {
            "200": { description: "Issuer removed" },
            "400": { description: "Invalid address" },
            "401": { description: "Missing caller or service token" },
            "403": { description: "Caller is not the owner" },
          },
        },
      },
      "/events": {
        get: {
          summary: "Registry notification log in sequence order",
          parameters: [
            { in: "query", name: "after", required: false, schema: { type: "integer", minimum: 0 } },
            { in: "query", name: "limit", required: false, schema: { type: "integer", minimum: 1, maximum: 500 } },
          ],
          responses: {
            "200": { description: "Events after the given sequence number" },
            "400": { description: "Invalid query" },
          },
        },
      },
    },
  };
}
