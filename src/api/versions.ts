/**
 * Version API routes.
 *
 * POST /artifacts/:id/versions — Create a version (JSON content reference or raw upload)
 * GET /artifacts/:id/versions — List versions
 * GET /artifacts/:id/versions/:seq — Fetch one version
 * DELETE /artifacts/:id/versions/:seq — Tombstone a version
 * GET /artifacts/:id/versions/:seq/content — Download the version's bytes
 * POST /artifacts/:id/versions/:seq/events — Count a launch, citation or fork
 */

import express, { Router } from 'express';
import { Scope } from '../domain/token';
import { RegistryService } from '../registry/registry-service';
import { AuthenticatedRequest, callerOf, parseWith, requireScope, uploadSignal } from './middleware';
import {
  createVersionSchema,
  listVersionsQuerySchema,
  recordEventSchema,
  uploadQuerySchema,
  versionParamsSchema,
} from './schemas';

export function createVersionRoutes(registry: RegistryService): Router {
  const router = Router({ mergeParams: true });
  const read = requireScope(Scope.ArtifactsRead, { allowAnonymous: true });
  const write = requireScope(Scope.ArtifactsWrite);
  const rawBody = express.raw({ type: 'application/octet-stream', limit: registry.contents.maxContentBytes });

  router.post('/', write, rawBody, async (req: AuthenticatedRequest, res, next) => {
    try {
      const body: unknown = req.body;
      const version = Buffer.isBuffer(body) ? await createFromUpload(req, res, body) : await createFromReference(req, body);
      res.status(201).location(`${req.baseUrl}/${version.sequence}`).json({ version });
    } catch (err) {
      next(err);
    }
  });

  async function createFromUpload(req: AuthenticatedRequest, res: express.Response, bytes: Buffer) {
    const { backend, sequence } = parseWith(uploadQuerySchema, req.query);
    return registry.createVersionFromUpload(callerOf(req), req.params.id, bytes, {
      backend,
      requestedSequence: sequence,
      signal: uploadSignal(res),
    });
  }

  async function createFromReference(req: AuthenticatedRequest, body: unknown) {
    const { contentHash, sequence, links } = parseWith(createVersionSchema, body);
    return registry.createVersionFromReference(callerOf(req), req.params.id, contentHash, { requestedSequence: sequence, links });
  }

  router.get('/', read, async (req: AuthenticatedRequest, res, next) => {
    try {
      const { include_tombstoned } = parseWith(listVersionsQuerySchema, req.query);
      const versions = await registry.listVersions(callerOf(req), req.params.id, { includeTombstoned: include_tombstoned });
      res.json({ versions });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:seq', read, async (req: AuthenticatedRequest, res, next) => {
    try {
      const { id, seq } = parseWith(versionParamsSchema, req.params);
      const version = await registry.getVersion(callerOf(req), id, seq);
      res.json({ version });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:seq', write, async (req: AuthenticatedRequest, res, next) => {
    try {
      const { id, seq } = parseWith(versionParamsSchema, req.params);
      await registry.deleteVersion(callerOf(req), id, seq);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  router.get('/:seq/content', read, async (req: AuthenticatedRequest, res, next) => {
    try {
      const { id, seq } = parseWith(versionParamsSchema, req.params);
      const { version, bytes } = await registry.getVersionContent(callerOf(req), id, seq);
      const etag = `"${version.contentHash}"`;
      res.set('ETag', etag);
      res.set('X-Content-SHA256', version.contentHash);
      if (req.get('if-none-match') === etag) {
        res.status(304).end();
        return;
      }
      res.type('application/octet-stream').send(bytes);
    } catch (err) {
      next(err);
    }
  });

  router.post('/:seq/events', requireScope(Scope.ArtifactsWriteMetrics), async (req: AuthenticatedRequest, res, next) => {
    try {
      const { id, seq } = parseWith(versionParamsSchema, req.params);
      const { eventType } = parseWith(recordEventSchema, req.body);
      await registry.recordEvent(callerOf(req), id, seq, eventType);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
