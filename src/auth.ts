import crypto from "node:crypto";

export interface ConnectCredentials {
  /** Raw `Authorization` header, if any. */
  authorization?: string | null;
  /** Legacy `?secret=` query parameter. */
  secretParam?: string | null;
  /** `?bot=` query parameter. */
  identity?: string | null;
}

export type ConnectDecision =
  | { ok: true; identity: string }
  | { ok: false; status: 400 | 403; error: string };

/** Bearer token first, then the legacy query parameter. */
export function extractSecret(
  authorization: string | null | undefined,
  secretParam: string | null | undefined,
): string {
  if (authorization?.startsWith("Bearer ")) {
    return authorization.slice("Bearer ".length);
  }
  return secretParam ?? "";
}

export function secretsMatch(presented: string, expected: string): boolean {
  const a = crypto.createHash("sha256").update(presented).digest();
  const b = crypto.createHash("sha256").update(expected).digest();
  return crypto.timingSafeEqual(a, b) && presented.length === expected.length;
}

/**
 * Admission check for an agent control connection. Runs before the upgrade;
 * a rejected agent is never registered. With no secret configured every
 * attempt is refused.
 */
export function authorizeConnect(
  creds: ConnectCredentials,
  configuredSecret: string,
): ConnectDecision {
  if (!configuredSecret) {
    return { ok: false, status: 403, error: "Server misconfigured: no secret set" };
  }

  const secret = extractSecret(creds.authorization, creds.secretParam);
  if (!secret || !secretsMatch(secret, configuredSecret)) {
    return { ok: false, status: 403, error: "Invalid secret" };
  }

  const identity = creds.identity?.trim() ?? "";
  if (!identity) {
    return { ok: false, status: 400, error: "Missing 'bot' query parameter" };
  }

  return { ok: true, identity };
}

/** Same secret rules for the upload and admin endpoints. */
export function isAuthorized(
  authorization: string | null | undefined,
  secretParam: string | null | undefined,
  configuredSecret: string,
): boolean {
  if (!configuredSecret) return false;
  const secret = extractSecret(authorization, secretParam);
  return secret !== "" && secretsMatch(secret, configuredSecret);
}
