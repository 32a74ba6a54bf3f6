import jwt from "jsonwebtoken";
import { ANONYMOUS, type AuthConfig, type Identity } from "@didscan/shared";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Token from an Authorization header value, with or without the "Bearer " scheme */
export function extractToken(header: string | undefined): string | null {
  if (!header) return null;
  const trimmed = header.trim();
  const token = /^bearer\s+/i.test(trimmed) ? trimmed.replace(/^bearer\s+/i, "") : trimmed;
  return token.length > 0 ? token : null;
}

/**
 * Resolves the caller's identity from a bearer token.
 *
 * The token must be HS256-signed by one of the configured keys (tried in
 * order) and issued by a trusted issuer; the DID is read from `data.did`
 * or a top-level `did` claim. Every failure degrades to anonymous.
 */
export class IdentityGate {
  constructor(private readonly auth: AuthConfig) {}

  identify(authorization: string | undefined): Identity {
    const token = extractToken(authorization);
    if (!token) return ANONYMOUS;

    if (this.auth.validatorKeys.length === 0) {
      console.warn("[Auth] No validator keys configured, treating caller as anonymous");
      return ANONYMOUS;
    }

    const payload = this.verify(token);
    if (payload === null) return ANONYMOUS;

    if (typeof payload.iss !== "string" || !this.auth.trustedIssuers.includes(payload.iss)) {
      console.warn(`[Auth] Untrusted token issuer: ${String(payload.iss)}`);
      return ANONYMOUS;
    }

    const data = payload.data;
    const did = isRecord(data) && typeof data.did === "string" ? data.did : payload.did;
    if (typeof did !== "string" || did.length === 0) {
      console.warn("[Auth] Token carries no DID claim");
      return ANONYMOUS;
    }

    return { kind: "authenticated", did };
  }

  private verify(token: string): Record<string, unknown> | null {
    for (const key of this.auth.validatorKeys) {
      try {
        const decoded: unknown = jwt.verify(token, key, { algorithms: ["HS256"] });
        if (!isRecord(decoded)) {
          console.warn("[Auth] Token payload is not a JSON object");
          return null;
        }
        return decoded;
      } catch (err) {
        if (err instanceof jwt.TokenExpiredError) {
          console.warn(`[Auth] Token expired at ${err.expiredAt.toISOString()}`);
          return null;
        }
        if (err instanceof jwt.JsonWebTokenError && err.message === "invalid signature") {
          continue;
        }
        const message = err instanceof Error ? err.message : String(err);
        console.warn(`[Auth] Rejected token: ${message}`);
        return null;
      }
    }
    console.warn("[Auth] Token not signed by any configured validator key");
    return null;
  }
}
