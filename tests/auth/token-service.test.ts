import { decodeJwt, decodeProtectedHeader, SignJWT } from 'jose';
import { createSecretKey } from 'crypto';
import { KeyRing } from '../../src/auth/key-ring';
import { TokenService } from '../../src/auth/token-service';
import { RegistryError } from '../../src/domain/errors';
import { Scope, SubjectTokenType } from '../../src/domain/token';
import {
  IDP_ISSUER,
  TEST_AUDIENCE,
  TEST_ISSUER,
  TEST_SIGNING_SECRET,
  TestIdentityProvider,
  createTestIdentityProvider,
  principal,
} from '../helpers';

const OTHER_SECRET = 'test-secret-rotated-key-0123456789';

async function codeOf(promise: Promise<unknown>): Promise<string> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof RegistryError) return err.code;
    throw err;
  }
  throw new Error('expected the promise to reject');
}

describe('TokenService', () => {
  let now: number;
  let keyRing: KeyRing;
  let idp: TestIdentityProvider;
  let service: TokenService;

  beforeEach(async () => {
    now = Date.now();
    keyRing = new KeyRing({ id: 'k1', secret: TEST_SIGNING_SECRET }, { graceSeconds: 300, now: () => now });
    idp = await createTestIdentityProvider();
    service = new TokenService({
      issuer: TEST_ISSUER,
      audience: TEST_AUDIENCE,
      lifetimeSeconds: 3600,
      keyRing,
      providers: [idp.provider],
      now: () => now,
    });
  });

  describe('issueServiceToken', () => {
    test('issues the requested scopes in canonical order', async () => {
      const alice = principal('alice', [Scope.ArtifactsRead, Scope.ArtifactsWrite, Scope.ArtifactsWriteMetrics]);
      const issued = await service.issueServiceToken(alice, [Scope.ArtifactsWrite, Scope.ArtifactsRead, Scope.ArtifactsWrite]);

      expect(issued.scopes).toEqual([Scope.ArtifactsRead, Scope.ArtifactsWrite]);
      expect(issued.principalId).toBe('alice');
      expect(issued.keyId).toBe('k1');
      expect(issued.expiresAt - issued.issuedAt).toBe(3600);

      const claims = decodeJwt(issued.token);
      expect(claims.sub).toBe('alice');
      expect(claims.iss).toBe(TEST_ISSUER);
      expect(claims.aud).toBe(TEST_AUDIENCE);
      expect(claims.scope).toBe('artifacts:read artifacts:write');
      expect(claims.act).toEqual({ sub: IDP_ISSUER });
      expect(decodeProtectedHeader(issued.token)).toEqual({ alg: 'HS256', kid: 'k1', typ: 'JWT' });
    });

    test('identical inputs yield identical scope sets', async () => {
      const alice = principal('alice');
      const first = await service.issueServiceToken(alice, [Scope.ArtifactsWrite, Scope.ArtifactsRead]);
      const second = await service.issueServiceToken(alice, [Scope.ArtifactsRead, Scope.ArtifactsWrite]);
      expect(first.scopes).toEqual(second.scopes);
      expect(first.tokenId).not.toBe(second.tokenId);
    });

    test('an empty request defaults to read', async () => {
      const issued = await service.issueServiceToken(principal('alice'), []);
      expect(issued.scopes).toEqual([Scope.ArtifactsRead]);
    });

    test('requesting a scope the principal lacks fails', async () => {
      const alice = principal('alice', [Scope.ArtifactsRead]);
      expect(await codeOf(service.issueServiceToken(alice, [Scope.ArtifactsRead, Scope.ArtifactsWrite]))).toBe(
        'AUTH.SCOPE_ESCALATION',
      );
    });

    test('the read default fails for a principal without read', async () => {
      const writer = principal('w', [Scope.ArtifactsWrite]);
      expect(await codeOf(service.issueServiceToken(writer, []))).toBe('AUTH.SCOPE_ESCALATION');
    });
  });

  describe('verifyServiceToken', () => {
    test('round-trips the principal and scopes', async () => {
      const issued = await service.issueServiceToken(principal('alice'), [Scope.ArtifactsWrite]);
      const claims = await service.verifyServiceToken(issued.token);
      expect(claims.principal.id).toBe('alice');
      expect(claims.principal.issuer).toBe(IDP_ISSUER);
      expect(claims.scopes).toEqual([Scope.ArtifactsWrite]);
      expect(claims.tokenId).toBe(issued.tokenId);
      expect(claims.keyId).toBe('k1');
      expect(claims.expiresAt).toBe(issued.expiresAt);
    });

    test('expired tokens fail with TOKEN_EXPIRED', async () => {
      const issued = await service.issueServiceToken(principal('alice'), []);
      now += 3601 * 1000;
      expect(await codeOf(service.verifyServiceToken(issued.token))).toBe('AUTH.TOKEN_EXPIRED');
    });

    test('tampered tokens fail with BAD_SIGNATURE', async () => {
      const issued = await service.issueServiceToken(principal('alice'), []);
      const [header, , signature] = issued.token.split('.');
      const forgedPayload = Buffer.from(JSON.stringify({ ...decodeJwt(issued.token), scope: 'registry:admin' })).toString('base64url');
      expect(await codeOf(service.verifyServiceToken(`${header}.${forgedPayload}.${signature}`))).toBe('AUTH.BAD_SIGNATURE');
    });

    test('tokens signed under an unknown kid fail with BAD_SIGNATURE', async () => {
      const token = await new SignJWT({ scope: 'artifacts:read' })
        .setProtectedHeader({ alg: 'HS256', kid: 'unknown' })
        .setSubject('alice')
        .setIssuer(TEST_ISSUER)
        .setAudience(TEST_AUDIENCE)
        .setJti('jti-1')
        .setExpirationTime('5m')
        .sign(createSecretKey(Buffer.from(OTHER_SECRET)));
      expect(await codeOf(service.verifyServiceToken(token))).toBe('AUTH.BAD_SIGNATURE');
    });

    test('garbage fails with INVALID_TOKEN', async () => {
      expect(await codeOf(service.verifyServiceToken('not-a-jwt'))).toBe('AUTH.INVALID_TOKEN');
    });

    test('key rotation keeps old tokens valid only for the grace window', async () => {
      const issued = await service.issueServiceToken(principal('alice'), []);
      keyRing.rotate({ id: 'k2', secret: OTHER_SECRET });

      const fresh = await service.issueServiceToken(principal('alice'), []);
      expect(fresh.keyId).toBe('k2');
      expect((await service.verifyServiceToken(issued.token)).keyId).toBe('k1');

      now += 301 * 1000;
      expect(await codeOf(service.verifyServiceToken(issued.token))).toBe('AUTH.BAD_SIGNATURE');
      expect((await service.verifyServiceToken(fresh.token)).keyId).toBe('k2');
    });
  });

  describe('validateExternalToken', () => {
    test('accepts a token from the configured provider', async () => {
      const raw = await idp.sign('alice', 'openid artifacts:read artifacts:write');
      const result = await service.validateExternalToken(raw);
      expect(result).toEqual({
        id: 'alice',
        issuer: IDP_ISSUER,
        authorizedParty: undefined,
        scopes: [Scope.ArtifactsRead, Scope.ArtifactsWrite],
      });
    });

    test('rejects a token from an unknown issuer', async () => {
      const raw = await idp.sign('alice', 'artifacts:read', { issuer: 'https://evil.test' });
      expect(await codeOf(service.validateExternalToken(raw))).toBe('AUTH.INVALID_TOKEN');
    });

    test('rejects an expired provider token', async () => {
      const raw = await idp.sign('alice', 'artifacts:read', { expiresAt: Math.floor(now / 1000) - 60 });
      expect(await codeOf(service.validateExternalToken(raw))).toBe('AUTH.INVALID_TOKEN');
    });

    test('rejects a token signed by a different key', async () => {
      const other = await createTestIdentityProvider();
      const raw = await other.sign('alice', 'artifacts:read');
      expect(await codeOf(service.validateExternalToken(raw))).toBe('AUTH.INVALID_TOKEN');
    });

    test('limits scopes to what the provider may grant', async () => {
      const limited = await createTestIdentityProvider({ grantableScopes: [Scope.ArtifactsRead] });
      const limitedService = new TokenService({
        issuer: TEST_ISSUER,
        audience: TEST_AUDIENCE,
        lifetimeSeconds: 60,
        keyRing,
        providers: [limited.provider],
        now: () => now,
      });
      const raw = await limited.sign('alice', 'artifacts:read registry:admin');
      expect((await limitedService.validateExternalToken(raw)).scopes).toEqual([Scope.ArtifactsRead]);
    });
  });

  describe('exchange', () => {
    test('issues a token for a provider credential', async () => {
      const raw = await idp.sign('alice', 'artifacts:read artifacts:write');
      const issued = await service.exchange(raw, [Scope.ArtifactsWrite]);
      expect(issued.scopes).toEqual([Scope.ArtifactsWrite]);
      expect((await service.verifyServiceToken(issued.token)).principal.id).toBe('alice');
    });

    test('a registry token can be narrowed but not widened', async () => {
      const raw = await idp.sign('alice', 'artifacts:read artifacts:write');
      const readWrite = await service.exchange(raw, [Scope.ArtifactsRead, Scope.ArtifactsWrite]);
      const readOnly = await service.exchange(readWrite.token, [Scope.ArtifactsRead], SubjectTokenType.AccessToken);
      expect(readOnly.scopes).toEqual([Scope.ArtifactsRead]);
      expect(await codeOf(service.exchange(readOnly.token, [Scope.ArtifactsWrite], SubjectTokenType.AccessToken))).toBe(
        'AUTH.SCOPE_ESCALATION',
      );
    });

    test('the subject token type decides how the subject is verified', async () => {
      const raw = await idp.sign('alice', 'artifacts:read artifacts:write');
      const issued = await service.exchange(raw, [Scope.ArtifactsRead]);

      expect(await codeOf(service.exchange(issued.token, [Scope.ArtifactsRead]))).toBe('AUTH.INVALID_TOKEN');
      expect(await codeOf(service.exchange(issued.token, [Scope.ArtifactsRead], SubjectTokenType.Jwt))).toBe('AUTH.INVALID_TOKEN');
      expect(await codeOf(service.exchange(raw, [Scope.ArtifactsRead], SubjectTokenType.AccessToken))).toBe('AUTH.INVALID_TOKEN');
    });

    test('scope escalation: read-only credential cannot obtain admin', async () => {
      const raw = await idp.sign('alice', 'artifacts:read');
      expect(await codeOf(service.exchange(raw, [Scope.ArtifactsRead, Scope.RegistryAdmin]))).toBe('AUTH.SCOPE_ESCALATION');
    });
  });
});
