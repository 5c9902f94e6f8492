/**
 * Tollgate JWT Types
 */

export interface AccessTokenClaims {
  sub: string; // principal id
  iss: string; // issuer tag
  jti: string; // unique per issued token
  iat: number; // issued at timestamp
  exp: number; // expiration timestamp
}
