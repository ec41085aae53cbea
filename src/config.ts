/**
 * Runtime configuration, read from environment variables.
 */

import { z } from 'zod';
import { LogLevel, parseLogLevel } from './logger';
import { MIN_SECRET_LENGTH } from './auth/key-ring';
import { TAG_MAX_LENGTH } from './domain/tag';
import { Scope, isScope } from './domain/token';

const MIB = 1024 * 1024;

const integer = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

function tagList(value: string): string[] {
  return [...new Set(value.split(',').map((tag) => tag.trim()).filter((tag) => tag.length > 0))];
}

const envSchema = z
  .object({
    PORT: integer(5000, 0),
    LOG_LEVEL: z.string().default('info'),
    REGISTRY_ISSUER: z.string().url().default('http://localhost:5000'),
    REGISTRY_AUDIENCE: z.string().min(1).default('artifact-registry'),
    REGISTRY_SIGNING_KEY: z.string().min(MIN_SECRET_LENGTH, `must be at least ${MIN_SECRET_LENGTH} characters`),
    REGISTRY_SIGNING_KEY_ID: z.string().min(1).default('primary'),
    REGISTRY_PREVIOUS_SIGNING_KEY: optionalString,
    REGISTRY_PREVIOUS_SIGNING_KEY_ID: optionalString,
    TOKEN_LIFETIME_SECONDS: integer(3600, 1),
    KEY_ROTATION_GRACE_SECONDS: integer(86400),
    IDP_ISSUER: optionalString,
    IDP_JWKS_URI: optionalString.pipe(z.string().url().optional()),
    IDP_AUDIENCE: optionalString,
    IDP_GRANTABLE_SCOPES: optionalString,
    MAX_CONTENT_BYTES: integer(100 * MIB, 1),
    STORAGE_BACKEND: z.enum(['memory', 'http']).default('memory'),
    STORAGE_HTTP_ENDPOINT: optionalString.pipe(z.string().url().optional()),
    STORAGE_HTTP_TOKEN: optionalString,
    STORAGE_MAX_ATTEMPTS: integer(4, 1),
    STORAGE_BACKOFF_BASE_MS: integer(200),
    STORAGE_TIMEOUT_MS: integer(30000, 1),
    GC_GRACE_SECONDS: integer(3600),
    REGISTRY_TAGS: z.string().default(''),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_BACKEND === 'http' && !env.STORAGE_HTTP_ENDPOINT) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['STORAGE_HTTP_ENDPOINT'], message: 'required when STORAGE_BACKEND is http' });
    }
    if (env.IDP_ISSUER && !env.IDP_JWKS_URI) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['IDP_JWKS_URI'], message: 'required when IDP_ISSUER is set' });
    }
    if (env.REGISTRY_PREVIOUS_SIGNING_KEY && !env.REGISTRY_PREVIOUS_SIGNING_KEY_ID) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['REGISTRY_PREVIOUS_SIGNING_KEY_ID'], message: 'required when REGISTRY_PREVIOUS_SIGNING_KEY is set' });
    }
    if (env.REGISTRY_PREVIOUS_SIGNING_KEY && env.REGISTRY_PREVIOUS_SIGNING_KEY.length < MIN_SECRET_LENGTH) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['REGISTRY_PREVIOUS_SIGNING_KEY'], message: `must be at least ${MIN_SECRET_LENGTH} characters` });
    }
    const unknownScopes = (env.IDP_GRANTABLE_SCOPES ?? '').split(/[\s,]+/).filter((scope) => scope && !isScope(scope));
    if (unknownScopes.length > 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['IDP_GRANTABLE_SCOPES'], message: `unknown scopes: ${unknownScopes.join(', ')}` });
    }
    const longTags = tagList(env.REGISTRY_TAGS).filter((tag) => tag.length > TAG_MAX_LENGTH);
    if (longTags.length > 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['REGISTRY_TAGS'], message: `longer than ${TAG_MAX_LENGTH} characters: ${longTags.join(', ')}` });
    }
  });

export interface RegistryConfig {
  port: number;
  logLevel: LogLevel;
  issuer: string;
  audience: string;
  signingKey: { id: string; secret: string };
  previousSigningKey?: { id: string; secret: string };
  tokenLifetimeSeconds: number;
  keyRotationGraceSeconds: number;
  identityProvider?: {
    issuer: string;
    jwksUri: string;
    audience?: string;
    grantableScopes?: Scope[];
  };
  maxContentBytes: number;
  storage: {
    backend: 'memory' | 'http';
    httpEndpoint?: string;
    httpToken?: string;
    maxAttempts: number;
    backoffBaseMs: number;
    timeoutMs: number;
  };
  gcGraceSeconds: number;
  /** Tag catalog the built-in store starts with. */
  tags: string[];
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Parse and validate configuration. Every problem is reported at once. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RegistryConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;

  const grantableScopes = e.IDP_GRANTABLE_SCOPES?.split(/[\s,]+/).filter(isScope);

  return {
    port: e.PORT,
    logLevel: parseLogLevel(e.LOG_LEVEL, LogLevel.Info),
    issuer: e.REGISTRY_ISSUER,
    audience: e.REGISTRY_AUDIENCE,
    signingKey: { id: e.REGISTRY_SIGNING_KEY_ID, secret: e.REGISTRY_SIGNING_KEY },
    previousSigningKey:
      e.REGISTRY_PREVIOUS_SIGNING_KEY && e.REGISTRY_PREVIOUS_SIGNING_KEY_ID
        ? { id: e.REGISTRY_PREVIOUS_SIGNING_KEY_ID, secret: e.REGISTRY_PREVIOUS_SIGNING_KEY }
        : undefined,
    tokenLifetimeSeconds: e.TOKEN_LIFETIME_SECONDS,
    keyRotationGraceSeconds: e.KEY_ROTATION_GRACE_SECONDS,
    identityProvider:
      e.IDP_ISSUER && e.IDP_JWKS_URI
        ? { issuer: e.IDP_ISSUER, jwksUri: e.IDP_JWKS_URI, audience: e.IDP_AUDIENCE, grantableScopes }
        : undefined,
    maxContentBytes: e.MAX_CONTENT_BYTES,
    storage: {
      backend: e.STORAGE_BACKEND,
      httpEndpoint: e.STORAGE_HTTP_ENDPOINT,
      httpToken: e.STORAGE_HTTP_TOKEN,
      maxAttempts: e.STORAGE_MAX_ATTEMPTS,
      backoffBaseMs: e.STORAGE_BACKOFF_BASE_MS,
      timeoutMs: e.STORAGE_TIMEOUT_MS,
    },
    gcGraceSeconds: e.GC_GRACE_SECONDS,
    tags: tagList(e.REGISTRY_TAGS),
  };
}
