/**
 * Request schemas for the REST binding.
 */

import { z } from 'zod';
import { Visibility } from '../domain/artifact';
import { GrantRole } from '../domain/grant';
import { isContentHash } from '../domain/storage-object';
import { TAG_MAX_LENGTH } from '../domain/tag';
import { isScope, Scope, SubjectTokenType } from '../domain/token';
import { isUrn } from '../domain/urn';
import { VersionEventType } from '../domain/version';

export const TOKEN_EXCHANGE_GRANT = 'urn:ietf:params:oauth:grant-type:token-exchange';

const scopeList = z
  .string()
  .optional()
  .transform((value, ctx): Scope[] => {
    const requested = (value ?? '').split(/\s+/).filter((scope) => scope.length > 0);
    const scopes: Scope[] = [];
    for (const scope of requested) {
      if (isScope(scope)) scopes.push(scope);
      else ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown scope ${scope}` });
    }
    return scopes;
  });

export const tokenExchangeSchema = z.object({
  grant_type: z.enum([TOKEN_EXCHANGE_GRANT, 'token_exchange']),
  subject_token: z.string().min(1),
  subject_token_type: z.nativeEnum(SubjectTokenType).default(SubjectTokenType.Jwt),
  scope: scopeList,
});

const authorSchema = z.object({
  fullName: z.string().trim().min(1).max(200),
  affiliation: z.string().trim().max(200).optional(),
  email: z.string().email(),
});

const urn = z.string().trim().toLowerCase().refine(isUrn, 'must be a URN');

const tagName = z.string().trim().min(1).max(TAG_MAX_LENGTH);

const reproducibilitySchema = z
  .object({
    enableRequests: z.boolean(),
    accessHours: z.number().int().min(1).optional(),
  })
  .strict()
  .refine((value) => value.enableRequests || value.accessHours === undefined, {
    message: 'accessHours requires enableRequests',
    path: ['accessHours'],
  });

const metadataFields = {
  title: z.string().trim().min(1).max(200),
  shortDescription: z.string().trim().min(1).max(500),
  longDescription: z.string().max(20_000).optional(),
  tags: z.array(tagName).max(50),
  authors: z.array(authorSchema).min(1).max(100),
  visibility: z.nativeEnum(Visibility),
  linkedProjects: z.array(urn).max(50),
  reproducibility: reproducibilitySchema,
};

export const createArtifactSchema = z.object({
  ...metadataFields,
  tags: metadataFields.tags.default([]),
  visibility: metadataFields.visibility.default(Visibility.Private),
  linkedProjects: metadataFields.linkedProjects.default([]),
  reproducibility: metadataFields.reproducibility.default({ enableRequests: false }),
});

export const updateArtifactSchema = z
  .object({
    title: metadataFields.title.optional(),
    shortDescription: metadataFields.shortDescription.optional(),
    longDescription: metadataFields.longDescription,
    tags: metadataFields.tags.optional(),
    authors: metadataFields.authors.optional(),
    visibility: metadataFields.visibility.optional(),
    linkedProjects: metadataFields.linkedProjects.optional(),
    reproducibility: metadataFields.reproducibility.optional(),
    expectedRevision: z.number().int().min(1).optional(),
  })
  .strict()
  .refine((body) => Object.keys(body).some((key) => key !== 'expectedRevision'), {
    message: 'at least one metadata field is required',
  });

const sequence = z.coerce.number().int().min(1);

export const contentHashSchema = z.string().refine(isContentHash, 'must be a lowercase hex SHA-256 digest');

const versionLinkSchema = z
  .object({
    urn,
    label: z.string().trim().min(1).max(40),
  })
  .strict();

export const createVersionSchema = z
  .object({
    contentHash: contentHashSchema,
    sequence: sequence.optional(),
    links: z.array(versionLinkSchema).max(20).default([]),
  })
  .strict();

export const verifyLinkSchema = z.object({
  urn,
});

export const createTagSchema = z
  .object({
    tag: tagName,
  })
  .strict();

export const uploadQuerySchema = z.object({
  backend: z.string().min(1).optional(),
  sequence: sequence.optional(),
});

export const versionParamsSchema = z.object({
  id: z.string().min(1),
  seq: sequence,
});

export const listArtifactsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export const listVersionsQuerySchema = z.object({
  include_tombstoned: z.enum(['true', 'false']).default('false').transform((value) => value === 'true'),
});

export const putGrantSchema = z.object({
  role: z.nativeEnum(GrantRole),
});

export const transferOwnershipSchema = z.object({
  principalId: z.string().trim().min(1),
});

export const recordEventSchema = z.object({
  eventType: z.nativeEnum(VersionEventType),
});
