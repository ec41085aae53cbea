/**
 * Artifact API routes.
 *
 * GET /artifacts — List artifacts visible to the caller
 * POST /artifacts — Register an artifact
 * GET /artifacts/:id — Artifact with its live versions
 * PATCH /artifacts/:id — Update metadata
 * DELETE /artifacts/:id — Delete the artifact and everything under it
 * POST /artifacts/:id/sharing-key — Issue a new sharing key
 * POST /artifacts/:id/owner — Transfer ownership
 * POST /artifacts/:id/reproduction-requests — Ask to reproduce the artifact's results
 */

import { Router } from 'express';
import { toArtifactDescriptor } from '../domain/artifact';
import { GrantRole } from '../domain/grant';
import { Scope } from '../domain/token';
import { RegistryService } from '../registry/registry-service';
import { AuthenticatedRequest, callerOf, parseWith, requireScope } from './middleware';
import { createArtifactSchema, listArtifactsQuerySchema, transferOwnershipSchema, updateArtifactSchema } from './schemas';

/** Owners and collaborators see the sharing key; nobody else does. */
function canSeeSharingKey(role: GrantRole | null): boolean {
  return role === GrantRole.Owner || role === GrantRole.Collaborator;
}

export function createArtifactRoutes(registry: RegistryService): Router {
  const router = Router();
  const read = requireScope(Scope.ArtifactsRead, { allowAnonymous: true });
  const write = requireScope(Scope.ArtifactsWrite);

  router.get('/', read, async (req: AuthenticatedRequest, res, next) => {
    try {
      const query = parseWith(listArtifactsQuerySchema, req.query);
      const page = await registry.listArtifacts(callerOf(req), query);
      res.json({
        ...page,
        items: page.items.map((artifact) => toArtifactDescriptor(artifact, { includeSharingKey: false })),
      });
    } catch (err) {
      next(err);
    }
  });

  router.post('/', write, async (req: AuthenticatedRequest, res, next) => {
    try {
      const metadata = parseWith(createArtifactSchema, req.body);
      const artifact = await registry.createArtifact(callerOf(req), metadata);
      res.status(201).json({ artifact: toArtifactDescriptor(artifact, { includeSharingKey: true }) });
    } catch (err) {
      next(err);
    }
  });

  router.get('/:id', read, async (req: AuthenticatedRequest, res, next) => {
    try {
      const view = await registry.getArtifact(callerOf(req), req.params.id);
      res.json({
        artifact: toArtifactDescriptor(view.artifact, { includeSharingKey: canSeeSharingKey(view.role) }),
        role: view.role,
        versions: view.versions,
      });
    } catch (err) {
      next(err);
    }
  });

  router.patch('/:id', write, async (req: AuthenticatedRequest, res, next) => {
    try {
      const { expectedRevision, ...patch } = parseWith(updateArtifactSchema, req.body);
      const artifact = await registry.updateArtifact(callerOf(req), req.params.id, patch, expectedRevision);
      res.json({ artifact: toArtifactDescriptor(artifact, { includeSharingKey: true }) });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/:id', write, async (req: AuthenticatedRequest, res, next) => {
    try {
      await registry.deleteArtifact(callerOf(req), req.params.id);
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  router.post('/:id/sharing-key', write, async (req: AuthenticatedRequest, res, next) => {
    try {
      const sharingKey = await registry.rotateSharingKey(callerOf(req), req.params.id);
      res.json({ sharingKey });
    } catch (err) {
      next(err);
    }
  });

  router.post('/:id/owner', write, async (req: AuthenticatedRequest, res, next) => {
    try {
      const { principalId } = parseWith(transferOwnershipSchema, req.body);
      const grant = await registry.transferOwnership(callerOf(req), req.params.id, principalId);
      res.json({ grant });
    } catch (err) {
      next(err);
    }
  });

  router.post('/:id/reproduction-requests', requireScope(Scope.ArtifactsRead), async (req: AuthenticatedRequest, res, next) => {
    try {
      const artifact = await registry.requestReproduction(callerOf(req), req.params.id);
      res.status(202).json({
        reproRequests: artifact.reproRequests,
        accessHours: artifact.reproducibility.accessHours ?? null,
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
