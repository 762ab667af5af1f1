// Type aliases rather than interfaces so both satisfy CanonicalValue's index signature.

export type JwtHeader = {
  alg: "HS256";
  typ: "JWT";
};

export type AdminClaims = {
  sub: string;
  name: string;
  email: string;
  roles: string[];
  permissions: string[];
  tenant_id: string | null;
  jti: string;
  iat: number;
  exp: number;
  nbf: number;
  iss: string;
  aud: string;
  scope: string | null;
};

export interface IssuedToken {
  token: string;
  header: JwtHeader;
  claims: AdminClaims;
  lifetimeSeconds: number;
  expiresAt: string;
}
