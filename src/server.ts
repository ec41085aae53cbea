/**
 * Express server configuration.
 *
 * Assembles the registry services from configuration and mounts the REST
 * binding under /api/v1.
 */

import express from 'express';
import { AuditService } from './audit/audit-service';
import { IdentityProvider } from './auth/identity-provider';
import { KeyRing } from './auth/key-ring';
import { TokenService } from './auth/token-service';
import { RegistryConfig, loadConfig } from './config';
import { StorageBackend } from './content/backend';
import { ContentStore } from './content/content-store';
import { maskSecret } from './domain/errors';
import { HttpObjectBackend } from './content/http-backend';
import { MemoryBackend } from './content/memory-backend';
import { ArtifactManager } from './registry/artifact-manager';
import { RegistryService } from './registry/registry-service';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { authenticate, errorHandler } from './api/middleware';
import { createArtifactRoutes } from './api/artifacts';
import { createAdminRoutes, createContentRoutes } from './api/contents';
import { createGrantRoutes } from './api/grants';
import { RateLimitOptions } from './api/rate-limit';
import { createTagRoutes } from './api/tags';
import { createTokenRoutes } from './api/tokens';
import { createVersionRoutes } from './api/versions';
import { logger, setLogLevel } from './logger';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: RegistryConfig;
  store: Store;
  auditService: AuditService;
  keyRing: KeyRing;
  tokenService: TokenService;
  contentStore: ContentStore;
  artifactManager: ArtifactManager;
  registry: RegistryService;
  tokenRateLimit?: RateLimitOptions;
}

/** Replacements for the pieces configuration would otherwise build. */
export interface AppContextOverrides {
  store?: Store;
  backends?: StorageBackend[];
  identityProviders?: IdentityProvider[];
  /** Epoch ms clock for token issue and verification. */
  now?: () => number;
  /** Backoff sleep used between storage retries. */
  sleep?: (ms: number) => Promise<void>;
  tokenRateLimit?: RateLimitOptions;
}

function backendsFor(config: RegistryConfig): StorageBackend[] {
  if (config.storage.backend === 'http' && config.storage.httpEndpoint) {
    return [
      new HttpObjectBackend({
        name: 'http',
        endpoint: config.storage.httpEndpoint,
        token: config.storage.httpToken,
        timeoutMs: config.storage.timeoutMs,
      }),
    ];
  }
  return [new MemoryBackend('memory')];
}

function identityProvidersFor(config: RegistryConfig): IdentityProvider[] {
  const idp = config.identityProvider;
  if (!idp) return [];
  return [new IdentityProvider({ issuer: idp.issuer, jwksUri: idp.jwksUri, audience: idp.audience, grantableScopes: idp.grantableScopes })];
}

/** Create the application context with all services. */
export function createAppContext(config: RegistryConfig = loadConfig(), overrides: AppContextOverrides = {}): AppContext {
  const store = overrides.store ?? createMemoryStore({ tags: config.tags });
  const auditService = new AuditService(store.audit);

  const keyRing = new KeyRing(config.signingKey, {
    graceSeconds: config.keyRotationGraceSeconds,
    previous: config.previousSigningKey ? [config.previousSigningKey] : [],
    now: overrides.now,
  });
  const tokenService = new TokenService({
    issuer: config.issuer,
    audience: config.audience,
    lifetimeSeconds: config.tokenLifetimeSeconds,
    keyRing,
    providers: overrides.identityProviders ?? identityProvidersFor(config),
    now: overrides.now,
  });

  const contentStore = new ContentStore(store.storageObjects, {
    backends: overrides.backends ?? backendsFor(config),
    maxContentBytes: config.maxContentBytes,
    retry: { maxAttempts: config.storage.maxAttempts, backoffBaseMs: config.storage.backoffBaseMs },
    audit: auditService,
    sleep: overrides.sleep,
  });

  const artifactManager = new ArtifactManager(store, auditService);
  const registry = new RegistryService(tokenService, artifactManager, contentStore, {
    gcGraceSeconds: config.gcGraceSeconds,
  });

  return {
    config,
    store,
    auditService,
    keyRing,
    tokenService,
    contentStore,
    artifactManager,
    registry,
    tokenRateLimit: overrides.tokenRateLimit,
  };
}

/** Create and configure the Express application. */
export function createApp(ctx: AppContext): express.Application {
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));

  const health: express.RequestHandler = (_req, res) => {
    res.json({
      status: 'ok',
      version: '0.1.0',
      uptimeMs: Date.now() - startTime,
      storage: ctx.contentStore.backendNames(),
      signingKeys: ctx.keyRing.verifyingKeyIds().length,
    });
  };
  app.get('/health', health);

  const v1 = express.Router();
  v1.get('/health', health);
  v1.use('/token', createTokenRoutes(ctx.registry, ctx.tokenRateLimit));
  v1.use(authenticate(ctx.tokenService));
  v1.use('/artifacts/:id/versions', createVersionRoutes(ctx.registry));
  v1.use('/artifacts/:id/grants', createGrantRoutes(ctx.registry));
  v1.use('/artifacts', createArtifactRoutes(ctx.registry));
  v1.use('/contents', createContentRoutes(ctx.registry));
  v1.use('/tags', createTagRoutes(ctx.registry));
  v1.use('/admin', createAdminRoutes(ctx.registry));
  app.use('/api/v1', v1);

  // Error handler
  app.use(errorHandler);

  return app;
}

/** Load configuration, build the app and listen. */
export function startServer(config: RegistryConfig = loadConfig()) {
  setLogLevel(config.logLevel);
  const ctx = createAppContext(config);
  const app = createApp(ctx);
  const server = app.listen(config.port, () => {
    logger.info('Artifact registry listening', {
      port: config.port,
      issuer: config.issuer,
      storage: ctx.contentStore.backendNames(),
      storageToken: config.storage.httpToken ? maskSecret(config.storage.httpToken) : undefined,
      identityProvider: config.identityProvider?.issuer,
    });
  });
  return { ctx, app, server };
}
