/**
 * Token API routes.
 *
 * POST /token — Exchange an identity provider token for a registry token
 */

import express, { Router } from 'express';
import { SubjectTokenType, formatScopes } from '../domain/token';
import { RegistryService } from '../registry/registry-service';
import { parseWith } from './middleware';
import { rateLimit, RateLimitOptions } from './rate-limit';
import { tokenExchangeSchema } from './schemas';

export function createTokenRoutes(registry: RegistryService, limits?: RateLimitOptions): Router {
  const router = Router();

  router.use(express.urlencoded({ extended: false }));
  router.use(rateLimit(limits));

  /**
   * POST /token
   * Token exchange: form or JSON body with grant_type, subject_token,
   * subject_token_type and a space-separated scope.
   */
  router.post('/', async (req, res, next) => {
    try {
      const body = parseWith(tokenExchangeSchema, req.body);
      const issued = await registry.exchangeToken(body.subject_token, body.scope, body.subject_token_type);

      res.set('Cache-Control', 'no-store');
      res.json({
        access_token: issued.token,
        issued_token_type: SubjectTokenType.AccessToken,
        token_type: 'bearer',
        expires_in: issued.expiresAt - issued.issuedAt,
        scope: formatScopes(issued.scopes),
      });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
