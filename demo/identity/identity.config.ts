export const IDENTITY_CONFIG = Symbol('IDENTITY_CONFIG');

/**
 * Bearer token verification settings. `secret` verifies HS256 tokens,
 * `jwksUri` verifies RS256 tokens against the issuer's key set; the secret
 * wins when both are set.
 */
export interface IdentityConfig {
  secret?: string;
  jwksUri?: string;
  issuer?: string;
  audience?: string;
}
