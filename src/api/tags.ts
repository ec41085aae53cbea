/**
 * Tag catalog routes.
 *
 * GET /tags — List the catalog
 * POST /tags — Add a tag (admin)
 */

import { Router } from 'express';
import { Scope } from '../domain/token';
import { RegistryService } from '../registry/registry-service';
import { AuthenticatedRequest, callerOf, parseWith, requireScope } from './middleware';
import { createTagSchema } from './schemas';

export function createTagRoutes(registry: RegistryService): Router {
  const router = Router();

  router.get('/', async (_req: AuthenticatedRequest, res, next) => {
    try {
      const tags = await registry.listTags();
      res.json({ tags });
    } catch (err) {
      next(err);
    }
  });

  router.post('/', requireScope(Scope.RegistryAdmin), async (req: AuthenticatedRequest, res, next) => {
    try {
      const { tag } = parseWith(createTagSchema, req.body);
      const created = await registry.createTag(callerOf(req), tag);
      res.status(201).json({ tag: created });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
