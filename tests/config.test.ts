import { ConfigError, loadConfig } from '../src/config';
import { Scope } from '../src/domain/token';
import { LogLevel } from '../src/logger';

const SIGNING_KEY = 'test-secret-0123456789abcdef-registry';

function configErrorOf(env: Record<string, string>): ConfigError {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected loadConfig to fail');
}

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({ REGISTRY_SIGNING_KEY: SIGNING_KEY });

    expect(config).toEqual({
      port: 5000,
      logLevel: LogLevel.Info,
      issuer: 'http://localhost:5000',
      audience: 'artifact-registry',
      signingKey: { id: 'primary', secret: SIGNING_KEY },
      previousSigningKey: undefined,
      tokenLifetimeSeconds: 3600,
      keyRotationGraceSeconds: 86400,
      identityProvider: undefined,
      maxContentBytes: 100 * 1024 * 1024,
      storage: {
        backend: 'memory',
        httpEndpoint: undefined,
        httpToken: undefined,
        maxAttempts: 4,
        backoffBaseMs: 200,
        timeoutMs: 30000,
      },
      gcGraceSeconds: 3600,
      tags: [],
    });
  });

  it('reads the seed tag catalog', () => {
    const config = loadConfig({ REGISTRY_SIGNING_KEY: SIGNING_KEY, REGISTRY_TAGS: ' networking, gpu,,networking ' });
    expect(config.tags).toEqual(['networking', 'gpu']);
  });

  it('rejects seed tags longer than the catalog allows', () => {
    const err = configErrorOf({ REGISTRY_SIGNING_KEY: SIGNING_KEY, REGISTRY_TAGS: `gpu,${'x'.repeat(33)}` });
    expect(err.issues).toEqual([`REGISTRY_TAGS: longer than 32 characters: ${'x'.repeat(33)}`]);
  });

  it('coerces numbers and reads the identity provider', () => {
    const config = loadConfig({
      REGISTRY_SIGNING_KEY: SIGNING_KEY,
      PORT: '8080',
      LOG_LEVEL: 'DEBUG',
      IDP_ISSUER: 'https://idp.test',
      IDP_JWKS_URI: 'https://idp.test/.well-known/jwks.json',
      IDP_GRANTABLE_SCOPES: 'artifacts:read, artifacts:write',
      STORAGE_MAX_ATTEMPTS: '2',
    });

    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe(LogLevel.Debug);
    expect(config.storage.maxAttempts).toBe(2);
    expect(config.identityProvider).toEqual({
      issuer: 'https://idp.test',
      jwksUri: 'https://idp.test/.well-known/jwks.json',
      audience: undefined,
      grantableScopes: [Scope.ArtifactsRead, Scope.ArtifactsWrite],
    });
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ REGISTRY_SIGNING_KEY: SIGNING_KEY, IDP_ISSUER: '', STORAGE_HTTP_TOKEN: '' });
    expect(config.identityProvider).toBeUndefined();
    expect(config.storage.httpToken).toBeUndefined();
  });

  it('reads a previous signing key for rotation', () => {
    const config = loadConfig({
      REGISTRY_SIGNING_KEY: SIGNING_KEY,
      REGISTRY_SIGNING_KEY_ID: 'k2',
      REGISTRY_PREVIOUS_SIGNING_KEY: 'test-secret-previous-0123456789abcdef',
      REGISTRY_PREVIOUS_SIGNING_KEY_ID: 'k1',
    });
    expect(config.signingKey.id).toBe('k2');
    expect(config.previousSigningKey).toEqual({ id: 'k1', secret: 'test-secret-previous-0123456789abcdef' });
  });

  it('requires a signing key of at least 32 characters', () => {
    const err = configErrorOf({ REGISTRY_SIGNING_KEY: 'short' });
    expect(err.issues).toEqual(['REGISTRY_SIGNING_KEY: must be at least 32 characters']);
    expect(err.message).toBe('Invalid configuration: REGISTRY_SIGNING_KEY: must be at least 32 characters');
  });

  it('requires an endpoint for the http backend', () => {
    const err = configErrorOf({ REGISTRY_SIGNING_KEY: SIGNING_KEY, STORAGE_BACKEND: 'http' });
    expect(err.issues).toEqual(['STORAGE_HTTP_ENDPOINT: required when STORAGE_BACKEND is http']);
  });

  it('builds the http backend settings', () => {
    const config = loadConfig({
      REGISTRY_SIGNING_KEY: SIGNING_KEY,
      STORAGE_BACKEND: 'http',
      STORAGE_HTTP_ENDPOINT: 'https://objects.test/bucket',
      STORAGE_HTTP_TOKEN: 'test-token',
    });
    expect(config.storage).toMatchObject({ backend: 'http', httpEndpoint: 'https://objects.test/bucket', httpToken: 'test-token' });
  });

  it('requires a JWKS location with an identity provider issuer', () => {
    const err = configErrorOf({ REGISTRY_SIGNING_KEY: SIGNING_KEY, IDP_ISSUER: 'https://idp.test' });
    expect(err.issues).toEqual(['IDP_JWKS_URI: required when IDP_ISSUER is set']);
  });

  it('rejects unknown grantable scopes', () => {
    const err = configErrorOf({
      REGISTRY_SIGNING_KEY: SIGNING_KEY,
      IDP_ISSUER: 'https://idp.test',
      IDP_JWKS_URI: 'https://idp.test/jwks',
      IDP_GRANTABLE_SCOPES: 'artifacts:read artifacts:delete',
    });
    expect(err.issues).toEqual(['IDP_GRANTABLE_SCOPES: unknown scopes: artifacts:delete']);
  });

  it('reports every problem at once', () => {
    const err = configErrorOf({ REGISTRY_SIGNING_KEY: SIGNING_KEY, PORT: 'eighty', STORAGE_BACKEND: 'tape' });
    expect(err.issues.map((issue) => issue.split(':')[0])).toEqual(['PORT', 'STORAGE_BACKEND']);
  });
});
