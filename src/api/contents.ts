/**
 * Content API routes.
 *
 * POST /contents — Upload bytes ahead of creating a version
 * POST /admin/contents/:hash/verify — Re-verify a stored object (admin)
 * GET /admin/contents/:hash — Inspect a storage record (admin)
 * POST /admin/contents/gc — Reclaim unreferenced content (admin)
 * POST /admin/artifacts/:id/versions/:seq/links/verify — Mark a version link checked (admin)
 */

import express, { Router } from 'express';
import { RegistryError, storageNotFoundError, validationError } from '../domain/errors';
import { Scope } from '../domain/token';
import { RegistryService } from '../registry/registry-service';
import { AuthenticatedRequest, callerOf, parseWith, requireScope, uploadSignal } from './middleware';
import { contentHashSchema, uploadQuerySchema, verifyLinkSchema, versionParamsSchema } from './schemas';

export function createContentRoutes(registry: RegistryService): Router {
  const router = Router();
  const rawBody = express.raw({ type: 'application/octet-stream', limit: registry.contents.maxContentBytes });

  router.post('/', requireScope(Scope.ArtifactsWrite), rawBody, async (req: AuthenticatedRequest, res, next) => {
    try {
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body)) {
        throw new RegistryError(validationError('Expected an application/octet-stream body'));
      }
      const { backend } = parseWith(uploadQuerySchema, req.query);
      const { object, deduplicated } = await registry.uploadContent(callerOf(req), body, { backend, signal: uploadSignal(res) });
      res.status(201).json({ object, deduplicated });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

export function createAdminRoutes(registry: RegistryService): Router {
  const router = Router();
  router.use(requireScope(Scope.RegistryAdmin));

  router.get('/contents/:hash', async (req: AuthenticatedRequest, res, next) => {
    try {
      const hash = parseWith(contentHashSchema, req.params.hash);
      const object = await registry.contents.describe(hash);
      if (!object) throw new RegistryError(storageNotFoundError(hash));
      res.json({ object });
    } catch (err) {
      next(err);
    }
  });

  router.post('/contents/:hash/verify', async (req: AuthenticatedRequest, res, next) => {
    try {
      const hash = parseWith(contentHashSchema, req.params.hash);
      const valid = await registry.verifyContent(hash);
      res.json({ hash, valid });
    } catch (err) {
      next(err);
    }
  });

  router.post('/contents/gc', async (_req: AuthenticatedRequest, res, next) => {
    try {
      const reclaimed = await registry.collectGarbage();
      res.json({ reclaimed });
    } catch (err) {
      next(err);
    }
  });

  router.post('/artifacts/:id/versions/:seq/links/verify', async (req: AuthenticatedRequest, res, next) => {
    try {
      const { id, seq } = parseWith(versionParamsSchema, req.params);
      const { urn } = parseWith(verifyLinkSchema, req.body);
      const version = await registry.verifyVersionLink(callerOf(req), id, seq, urn);
      res.json({ version });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
