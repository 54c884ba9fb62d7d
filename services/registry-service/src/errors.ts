export type RegistryErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_ARGUMENT"
  | "ALREADY_EXISTS"
  | "NOT_FOUND"
  | "ALREADY_REVOKED"
  | "OWNER_MISMATCH";

export class RegistryError extends Error {
  readonly code: RegistryErrorCode;

  constructor(code: RegistryErrorCode, message: string) {
    super(message);
    this.name = "RegistryError";
    this.code = code;
  }
}

export function isRegistryError(error: unknown): error is RegistryError {
  return error instanceof RegistryError;
}

interface HttpErrorMapping {
  statusCode: number;
  error: string;
}

const HTTP_ERROR_MAPPINGS: Record<RegistryErrorCode, HttpErrorMapping> = {
  UNAUTHORIZED: { statusCode: 403, error: "unauthorized" },
  INVALID_ARGUMENT: { statusCode: 400, error: "invalid_argument" },
  ALREADY_EXISTS: { statusCode: 409, error: "certificate_exists" },
  NOT_FOUND: { statusCode: 404, error: "certificate_not_found" },
  ALREADY_REVOKED: { statusCode: 409, error: "already_revoked" },
  // Only raised at startup, never from a route.
  OWNER_MISMATCH: { statusCode: 500, error: "owner_mismatch" },
};

export function httpErrorFor(error: RegistryError): HttpErrorMapping {
  return HTTP_ERROR_MAPPINGS[error.code];
}
