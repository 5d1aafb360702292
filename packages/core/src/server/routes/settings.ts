import { Router, Request, Response } from 'express';
import type { RouteContext } from './types.js';
import { userFromHeaders } from './identity.js';
import { requireManager } from './admin.js';
import { validate, ConfigKeyParams, ConfigNamespaceParams, SetConfigValueBody } from './schemas.js';
import { CONFIG_DEFAULTS } from '../../editor/index.js';
import { createChildLogger } from '../../logger.js';

const log = createChildLogger('routes:settings');

export function settingRoutes(ctx: RouteContext): Router {
  const router = Router();

  // Effective values of one namespace: shipped defaults overlaid with stored values.
  router.get('/api/editor/config/:namespace', (req: Request, res: Response) => {
    requireManager(ctx, userFromHeaders(req.headers));
    const params = validate(ConfigNamespaceParams, req.params);
    if (!params.success) {
      res.status(400).json({ success: false, kind: 'invalid_request', error: params.error });
      return;
    }
    const { namespace } = params.data;
    res.json({
      success: true,
      data: { ...CONFIG_DEFAULTS[namespace], ...ctx.db.settings.getByCategory(namespace) },
    });
  });

  router.put('/api/editor/config/:namespace/:key', (req: Request, res: Response) => {
    const user = userFromHeaders(req.headers);
    requireManager(ctx, user);
    const params = validate(ConfigKeyParams, req.params);
    const body = validate(SetConfigValueBody, req.body);
    if (!params.success || !body.success) {
      const error = [params, body].flatMap((r) => (r.success ? [] : [r.error])).join(', ');
      res.status(400).json({ success: false, kind: 'invalid_request', error });
      return;
    }

    const { namespace, key } = params.data;
    ctx.db.settings.set(namespace, key, body.data.value);
    log.info({ namespace, key, userId: user.id }, 'editor setting updated');
    res.json({ success: true });
  });

  // Resets a key to its shipped default.
  router.delete('/api/editor/config/:namespace/:key', (req: Request, res: Response) => {
    const user = userFromHeaders(req.headers);
    requireManager(ctx, user);
    const params = validate(ConfigKeyParams, req.params);
    if (!params.success) {
      res.status(400).json({ success: false, kind: 'invalid_request', error: params.error });
      return;
    }
    const { namespace, key } = params.data;
    ctx.db.settings.delete(namespace, key);
    log.info({ namespace, key, userId: user.id }, 'editor setting reset');
    res.json({ success: true });
  });

  return router;
}
