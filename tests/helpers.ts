/**
 * Shared fixtures for registry tests.
 */

import express from 'express';
import { AddressInfo } from 'net';
import { exportJWK, generateKeyPair, KeyLike, SignJWT } from 'jose';
import { IdentityProvider } from '../src/auth/identity-provider';
import { RegistryConfig, loadConfig } from '../src/config';
import { ArtifactMetadata, Visibility } from '../src/domain/artifact';
import { RegistryError } from '../src/domain/errors';
import { Principal, Scope } from '../src/domain/token';
import { LogEntry, resetLogHandler, setLogHandler } from '../src/logger';

export const TEST_SIGNING_SECRET = 'test-secret-0123456789abcdef-registry';
export const TEST_ISSUER = 'https://registry.test';
export const TEST_AUDIENCE = 'artifact-registry';
export const IDP_ISSUER = 'https://idp.test';

export function testConfig(env: Record<string, string> = {}): RegistryConfig {
  return loadConfig({
    REGISTRY_SIGNING_KEY: TEST_SIGNING_SECRET,
    REGISTRY_SIGNING_KEY_ID: 'k1',
    REGISTRY_ISSUER: TEST_ISSUER,
    REGISTRY_AUDIENCE: TEST_AUDIENCE,
    STORAGE_BACKOFF_BASE_MS: '0',
    REGISTRY_TAGS: 'biology,chemistry',
    ...env,
  });
}

export function sampleMetadata(overrides: Partial<ArtifactMetadata> = {}): ArtifactMetadata {
  return {
    title: 'Protein folding notebook',
    shortDescription: 'Notebook and data for the folding experiment',
    tags: ['biology'],
    authors: [{ fullName: 'Test Author', email: 'author@example.com' }],
    visibility: Visibility.Private,
    linkedProjects: [],
    reproducibility: { enableRequests: false },
    ...overrides,
  };
}

export function principal(id: string, scopes: Scope[] = [Scope.ArtifactsRead, Scope.ArtifactsWrite]): Principal {
  return { id, issuer: IDP_ISSUER, scopes };
}

/** Records every log entry until restored. */
export function captureLogs(): { entries: LogEntry[]; restore: () => void } {
  const entries: LogEntry[] = [];
  setLogHandler((entry) => entries.push(entry));
  return { entries, restore: resetLogHandler };
}

/** An identity provider whose keys live in process. */
export interface TestIdentityProvider {
  provider: IdentityProvider;
  /** Sign an ID token for `subject` carrying `scope` (space separated). */
  sign(subject: string, scope: string, options?: { expiresAt?: number; issuer?: string; audience?: string }): Promise<string>;
}

export async function createTestIdentityProvider(
  options: { audience?: string; grantableScopes?: Scope[] } = {},
): Promise<TestIdentityProvider> {
  const { publicKey, privateKey } = await generateKeyPair('RS256');
  const jwk = await exportJWK(publicKey);
  const provider = new IdentityProvider({
    issuer: IDP_ISSUER,
    jwks: { keys: [{ ...jwk, kid: 'idp-key-1', alg: 'RS256', use: 'sig' }] },
    audience: options.audience,
    grantableScopes: options.grantableScopes,
  });
  return {
    provider,
    sign: (subject, scope, signOptions = {}) => signIdToken(privateKey, subject, scope, signOptions),
  };
}

async function signIdToken(
  key: KeyLike,
  subject: string,
  scope: string,
  options: { expiresAt?: number; issuer?: string; audience?: string },
): Promise<string> {
  const jwt = new SignJWT({ scope })
    .setProtectedHeader({ alg: 'RS256', kid: 'idp-key-1' })
    .setSubject(subject)
    .setIssuer(options.issuer ?? IDP_ISSUER)
    .setIssuedAt()
    .setExpirationTime(options.expiresAt ?? '10m');
  if (options.audience) jwt.setAudience(options.audience);
  return jwt.sign(key);
}

export interface TestResponse {
  status: number;
  headers: Headers;
  body: unknown;
  bytes: Buffer;
}

/** Run one request against the app on an ephemeral port. */
export async function request(
  app: express.Application,
  method: string,
  path: string,
  options: { json?: unknown; raw?: Buffer; form?: Record<string, string>; headers?: Record<string, string> } = {},
): Promise<TestResponse> {
  const server = app.listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  try {
    const { port } = addressOf(server.address());
    const headers: Record<string, string> = { ...options.headers };
    let body: string | Uint8Array | undefined;
    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    } else if (options.raw) {
      headers['Content-Type'] = 'application/octet-stream';
      body = new Uint8Array(options.raw);
    } else if (options.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(options.form).toString();
    }

    const res = await fetch(`http://127.0.0.1:${port}${path}`, { method, headers, body });
    const bytes = Buffer.from(await res.arrayBuffer());
    const isJson = res.headers.get('content-type')?.includes('application/json') ?? false;
    return { status: res.status, headers: res.headers, body: isJson ? JSON.parse(bytes.toString('utf8')) : undefined, bytes };
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}

function addressOf(address: string | AddressInfo | null): AddressInfo {
  if (address === null || typeof address === 'string') throw new Error('server is not listening on a TCP port');
  return address;
}

/** Read a nested field from an untyped JSON body. */
export function field(value: unknown, ...path: Array<string | number>): unknown {
  let current = value;
  for (const key of path) {
    if (typeof current !== 'object' || current === null) return undefined;
    current = Reflect.get(current, key);
  }
  return current;
}

/** Await a promise expected to fail with a RegistryError and return it. */
export async function rejectionOf(promise: Promise<unknown>): Promise<RegistryError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof RegistryError) return err;
    throw err;
  }
  throw new Error('expected the promise to reject');
}
