/**
 * External identity providers.
 *
 * A provider is identified by its issuer URL and verifies subject tokens
 * against the JSON Web Key Set it publishes. The registry takes nothing from
 * these tokens except who the subject is and which registry scopes the
 * provider vouches for; artifact roles come from AccessGrants alone.
 */

import { createLocalJWKSet, createRemoteJWKSet, JSONWebKeySet, JWTPayload, JWTVerifyGetKey, jwtVerify } from 'jose';
import { Principal, Scope, ALL_SCOPES, parseScopeClaim } from '../domain/token';

/** Algorithms accepted from identity providers (asymmetric only). */
export const EXTERNAL_ALGORITHMS = ['RS256', 'RS384', 'RS512', 'PS256', 'ES256', 'ES384', 'EdDSA'];

export interface IdentityProviderConfig {
  issuer: string;
  /** Remote key set endpoint (e.g. an OpenID Connect jwks_uri). */
  jwksUri?: string;
  /** Key set held in process, used when no jwksUri is configured. */
  jwks?: JSONWebKeySet;
  audience?: string;
  /** Registry scopes principals from this provider may hold. Defaults to all. */
  grantableScopes?: Scope[];
}

export class IdentityProvider {
  readonly issuer: string;
  private audience?: string;
  private grantable: Scope[];
  private keySet: JWTVerifyGetKey;

  constructor(config: IdentityProviderConfig) {
    this.issuer = config.issuer;
    this.audience = config.audience;
    this.grantable = config.grantableScopes ?? [...ALL_SCOPES];
    if (config.jwksUri) {
      this.keySet = createRemoteJWKSet(new URL(config.jwksUri));
    } else if (config.jwks) {
      this.keySet = createLocalJWKSet(config.jwks);
    } else {
      throw new Error(`Identity provider ${config.issuer} needs a jwksUri or jwks`);
    }
  }

  /**
   * Verify signature, issuer, audience and expiry. Throws jose errors on
   * failure; the token service translates them.
   */
  async verify(raw: string, currentDate?: Date): Promise<Principal> {
    const { payload } = await jwtVerify(raw, this.keySet, {
      issuer: this.issuer,
      audience: this.audience,
      algorithms: EXTERNAL_ALGORITHMS,
      currentDate,
    });
    return this.toPrincipal(payload);
  }

  private toPrincipal(payload: JWTPayload): Principal {
    if (!payload.sub) throw new Error('token has no subject');
    const azp = payload.azp;
    return {
      id: payload.sub,
      issuer: this.issuer,
      authorizedParty: typeof azp === 'string' ? azp : undefined,
      scopes: parseScopeClaim(payload.scope).filter((scope) => this.grantable.includes(scope)),
    };
  }
}
