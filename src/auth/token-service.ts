/**
 * Token Service.
 *
 * Exchanges identity-provider tokens for short-lived registry tokens and
 * verifies those on every request. Registry tokens are stateless: an HS256
 * JWT whose `kid` names the signing key, whose `scope` claim lists the
 * capabilities and whose `act.sub` records the issuer that vouched for the
 * subject. Nothing is stored, so lifetimes are kept short and key rotation
 * is the revocation lever.
 *
 * A scope set is never widened on the way through: issuance fails rather
 * than granting a scope the presented credential does not carry, and a
 * registry token exchanged again can only yield a subset of its own scopes.
 */

import { decodeJwt, decodeProtectedHeader, errors, JWTPayload, jwtVerify, SignJWT } from 'jose';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import {
  RegistryError,
  badSignatureError,
  invalidTokenError,
  scopeEscalationError,
  tokenExpiredError,
} from '../domain/errors';
import {
  DEFAULT_REQUESTED_SCOPES,
  Principal,
  Scope,
  ServiceToken,
  ServiceTokenClaims,
  SubjectTokenType,
  canonicalScopes,
  formatScopes,
  parseScopeClaim,
} from '../domain/token';
import { logger } from '../logger';
import { IdentityProvider } from './identity-provider';
import { KeyRing } from './key-ring';

export const SERVICE_TOKEN_ALGORITHM = 'HS256';

const serviceClaimsSchema = z.object({
  sub: z.string().min(1),
  scope: z.string(),
  jti: z.string().min(1),
  exp: z.number(),
  azp: z.string().optional(),
  act: z.object({ sub: z.string() }).optional(),
});

export interface TokenServiceOptions {
  /** `iss` of registry tokens. */
  issuer: string;
  /** `aud` of registry tokens. */
  audience: string;
  lifetimeSeconds: number;
  keyRing: KeyRing;
  providers: IdentityProvider[];
  now?: () => number;
}

export class TokenService {
  private providers = new Map<string, IdentityProvider>();
  private now: () => number;
  private log = logger.child({ component: 'token-service' });

  constructor(private options: TokenServiceOptions) {
    for (const provider of options.providers) {
      this.providers.set(provider.issuer, provider);
    }
    this.now = options.now ?? Date.now;
  }

  get issuer(): string {
    return this.options.issuer;
  }

  get lifetimeSeconds(): number {
    return this.options.lifetimeSeconds;
  }

  /**
   * Verify a token issued by a configured identity provider and return the
   * principal it identifies. Registry tokens are refused here; they are only
   * exchanged as access tokens.
   */
  async validateExternalToken(raw: string): Promise<Principal> {
    let issuer: string | undefined;
    try {
      issuer = decodeJwt(raw).iss;
    } catch {
      throw new RegistryError(invalidTokenError('malformed token'));
    }
    if (!issuer) throw new RegistryError(invalidTokenError('token has no issuer'));
    if (issuer === this.options.issuer) {
      throw new RegistryError(invalidTokenError(`registry tokens must be exchanged as ${SubjectTokenType.AccessToken}`));
    }

    const provider = this.providers.get(issuer);
    if (!provider) {
      this.log.debug('Token from unknown identity provider', { issuer });
      throw new RegistryError(invalidTokenError(`unknown identity provider ${issuer}`));
    }

    try {
      return await provider.verify(raw, new Date(this.now()));
    } catch (err) {
      const reason = err instanceof errors.JWTExpired ? 'token expired' : err instanceof Error ? err.message : 'verification failed';
      this.log.debug('External token rejected', { issuer, reason });
      throw new RegistryError(invalidTokenError(reason));
    }
  }

  /**
   * Mint a registry token for `principal` carrying exactly `requestedScopes`
   * (canonically ordered). An empty request means the default read scope.
   */
  async issueServiceToken(principal: Principal, requestedScopes: readonly Scope[]): Promise<ServiceToken> {
    const authorized = canonicalScopes(principal.scopes);
    const scopes =
      requestedScopes.length > 0
        ? canonicalScopes(requestedScopes)
        : DEFAULT_REQUESTED_SCOPES.filter((scope) => authorized.includes(scope));

    if (scopes.length === 0 || scopes.some((scope) => !authorized.includes(scope))) {
      throw new RegistryError(scopeEscalationError(requestedScopes.length > 0 ? scopes : [...DEFAULT_REQUESTED_SCOPES], authorized));
    }

    const { id: keyId, key } = this.options.keyRing.current;
    const issuedAt = Math.floor(this.now() / 1000);
    const expiresAt = issuedAt + this.options.lifetimeSeconds;
    const tokenId = uuid();

    const claims: JWTPayload = { scope: formatScopes(scopes), act: { sub: principal.issuer } };
    if (principal.authorizedParty) claims.azp = principal.authorizedParty;

    const token = await new SignJWT(claims)
      .setProtectedHeader({ alg: SERVICE_TOKEN_ALGORITHM, kid: keyId, typ: 'JWT' })
      .setSubject(principal.id)
      .setIssuer(this.options.issuer)
      .setAudience(this.options.audience)
      .setJti(tokenId)
      .setIssuedAt(issuedAt)
      .setExpirationTime(expiresAt)
      .sign(key);

    return { token, tokenId, principalId: principal.id, scopes, keyId, issuedAt, expiresAt };
  }

  async verifyServiceToken(token: string): Promise<ServiceTokenClaims> {
    let kid: string | undefined;
    try {
      const header = decodeProtectedHeader(token);
      if (header.alg !== SERVICE_TOKEN_ALGORITHM) {
        throw new RegistryError(invalidTokenError(`unexpected algorithm ${String(header.alg)}`));
      }
      kid = header.kid;
    } catch (err) {
      if (err instanceof RegistryError) throw err;
      throw new RegistryError(invalidTokenError('malformed token'));
    }
    if (!kid) throw new RegistryError(invalidTokenError('token has no key id'));

    const key = this.options.keyRing.resolve(kid);
    if (!key) {
      this.log.debug('Token signed by unknown or retired key', { kid });
      throw new RegistryError(badSignatureError());
    }

    let payload: unknown;
    try {
      ({ payload } = await jwtVerify(token, key, {
        issuer: this.options.issuer,
        audience: this.options.audience,
        algorithms: [SERVICE_TOKEN_ALGORITHM],
        currentDate: new Date(this.now()),
      }));
    } catch (err) {
      if (err instanceof errors.JWTExpired) throw new RegistryError(tokenExpiredError());
      if (err instanceof errors.JWSSignatureVerificationFailed) throw new RegistryError(badSignatureError());
      throw new RegistryError(invalidTokenError(err instanceof Error ? err.message : 'verification failed'));
    }

    const parsed = serviceClaimsSchema.safeParse(payload);
    if (!parsed.success) throw new RegistryError(invalidTokenError('missing required claims'));
    const claims = parsed.data;
    const scopes = parseScopeClaim(claims.scope);

    return {
      principal: {
        id: claims.sub,
        issuer: claims.act?.sub ?? this.options.issuer,
        authorizedParty: claims.azp,
        scopes,
      },
      scopes,
      tokenId: claims.jti,
      keyId: kid,
      expiresAt: claims.exp,
    };
  }

  /**
   * Validate the subject token and issue a registry token for it. An access
   * token subject is a registry token and yields a principal limited to that
   * token's own scopes.
   */
  async exchange(
    subjectToken: string,
    requestedScopes: readonly Scope[],
    subjectTokenType: SubjectTokenType = SubjectTokenType.Jwt,
  ): Promise<ServiceToken> {
    const principal =
      subjectTokenType === SubjectTokenType.AccessToken
        ? await this.verifyServiceToken(subjectToken).then((claims) => ({ ...claims.principal, scopes: claims.scopes }))
        : await this.validateExternalToken(subjectToken);
    const issued = await this.issueServiceToken(principal, requestedScopes);
    this.log.info('Service token issued', {
      principalId: principal.id,
      issuer: principal.issuer,
      subjectTokenType,
      scopes: formatScopes(issued.scopes),
      tokenId: issued.tokenId,
    });
    return issued;
  }
}
