/**
 * Grant API routes.
 *
 * GET /artifacts/:id/grants — List grants (collaborators and owner)
 * PUT /artifacts/:id/grants/:principalId — Assign a collaborator or viewer role
 * DELETE /artifacts/:id/grants/:principalId — Revoke a grant
 */

import { Router } from 'express';
import { Scope } from '../domain/token';
import { RegistryService } from '../registry/registry-service';
import { AuthenticatedRequest, callerOf, parseWith, requireScope } from './middleware';
import { putGrantSchema } from './schemas';

export function createGrantRoutes(registry: RegistryService): Router {
  const router = Router({ mergeParams: true });
  const write = requireScope(Scope.ArtifactsWrite);

  router.get('/', requireScope(Scope.ArtifactsRead), async (req: AuthenticatedRequest, res, next) => {
    try {
      const grants = await registry.listGrants(callerOf(req), req.params.id);
      res.json({ grants });
    } catch (err) {
      next(err);
    }
  });

  router.put('/:principalId', write, async (req: AuthenticatedRequest, res, next) => {
    try {
      const { role } = parseWith(putGrantSchema, req.body);
      const grant = await registry.grantAccess(callerOf(req), req.params.id, req.params.principalId, role);
      res.json({ grant });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:principalId', write, async (req: AuthenticatedRequest, res, next) => {
    try {
      await registry.revokeAccess(callerOf(req), req.params.id, req.params.principalId);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
