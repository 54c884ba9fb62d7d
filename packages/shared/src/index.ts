export * from "./crypto/canonicalize.js";
export * from "./crypto/hash.js";
export * from "./crypto/identifiers.js";
export * from "./auth/service-auth.js";
export * from "./types/certificate.js";
export * from "./types/events.js";
export * from "./types/api.js";
