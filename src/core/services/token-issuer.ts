import { randomUUID } from "node:crypto";
import { canonicalStringify } from "../../lib/canonical-json.js";
import { encodeBase64Url, hmacSha256Base64Url } from "../../lib/encoding.js";
import { TokenIssueError } from "../errors.js";
import { DEFAULT_ADMIN_PERMISSIONS, DEFAULT_ADMIN_ROLES } from "../permissions.js";
import type { AdminClaims, IssuedToken, JwtHeader } from "../types/token.js";

export const TOKEN_ISSUER = "stateset-auth";
export const TOKEN_AUDIENCE = "stateset-api";

// One hundred years; keeps exp a safe integer well inside the Date range.
export const MAX_LIFETIME_SECONDS = 3_155_760_000;

const LOCAL_ADMIN_NAME = "Local Admin";
const LOCAL_ADMIN_EMAIL = "admin@example.com";

export interface TokenIssuerOptions {
  secret: string;
  createId?: (() => string) | undefined;
}

export interface IssueTokenInput {
  lifetimeSeconds: number;
  now?: Date | undefined;
}

export class TokenIssuer {
  private readonly secret: string;
  private readonly createId: () => string;

  constructor(options: TokenIssuerOptions) {
    if (options.secret.length === 0) {
      throw new TokenIssueError({ code: "secret_empty", message: "Cannot sign tokens with an empty secret." });
    }
    this.secret = options.secret;
    this.createId = options.createId ?? randomUUID;
  }

  issue(input: IssueTokenInput): IssuedToken {
    const { lifetimeSeconds } = input;
    if (!Number.isSafeInteger(lifetimeSeconds) || lifetimeSeconds <= 0 || lifetimeSeconds > MAX_LIFETIME_SECONDS) {
      throw new TokenIssueError({
        code: "lifetime_invalid",
        message: `Token lifetime must be a positive integer number of seconds up to ${MAX_LIFETIME_SECONDS}, got ${lifetimeSeconds}.`
      });
    }

    const nowSeconds = Math.floor((input.now ?? new Date()).getTime() / 1000);
    const exp = nowSeconds + lifetimeSeconds;
    const header: JwtHeader = { alg: "HS256", typ: "JWT" };
    const claims: AdminClaims = {
      sub: this.createId(),
      name: LOCAL_ADMIN_NAME,
      email: LOCAL_ADMIN_EMAIL,
      roles: [...DEFAULT_ADMIN_ROLES],
      permissions: [...DEFAULT_ADMIN_PERMISSIONS],
      tenant_id: null,
      jti: this.createId(),
      iat: nowSeconds,
      exp,
      nbf: nowSeconds,
      iss: TOKEN_ISSUER,
      aud: TOKEN_AUDIENCE,
      scope: null
    };

    const headerSegment = encodeBase64Url(canonicalStringify(header));
    const payloadSegment = encodeBase64Url(canonicalStringify(claims));
    const signingInput = `${headerSegment}.${payloadSegment}`;
    const signature = hmacSha256Base64Url(this.secret, signingInput);

    return {
      token: `${signingInput}.${signature}`,
      header,
      claims,
      lifetimeSeconds,
      expiresAt: new Date(exp * 1000).toISOString()
    };
  }
}
