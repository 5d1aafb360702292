import { Router, Request, Response } from 'express';
import type { RouteContext } from './types.js';
import { userFromHeaders } from './identity.js';
import { validate, ConfigurationParams } from './schemas.js';
import { InvalidContextError } from '../../errors.js';

export function configurationRoutes(ctx: RouteContext): Router {
  const router = Router();

  // Editor bootstrap: GET /api/editor/configuration/:contextType/:contextId
  router.get('/api/editor/configuration/:contextType/:contextId', (req: Request, res: Response) => {
    const user = userFromHeaders(req.headers);
    const params = validate(ConfigurationParams, req.params);
    if (!params.success) throw new InvalidContextError(params.error);

    const data = ctx.aggregator.getConfiguration(user, params.data.contextType, params.data.contextId);
    res.json({ success: true, data });
  });

  return router;
}
