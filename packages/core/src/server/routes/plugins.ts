import { Router, Request, Response } from 'express';
import type { RouteContext } from './types.js';
import { userFromHeaders } from './identity.js';
import { requireManager } from './admin.js';
import { validate, PluginNameParams, SetPluginEnabledBody } from './schemas.js';
import { PLUGIN_STATE_NAMESPACE } from '../../editor/index.js';
import { NotFoundError } from '../../errors.js';
import { createChildLogger } from '../../logger.js';

const log = createChildLogger('routes:plugins');

export function pluginRoutes(ctx: RouteContext): Router {
  const router = Router();

  router.get('/api/editor/plugins', (req: Request, res: Response) => {
    requireManager(ctx, userFromHeaders(req.headers));
    res.json({ success: true, data: ctx.registry.summarize(ctx.config) });
  });

  router.put('/api/editor/plugins/:name/enabled', (req: Request, res: Response) => {
    const user = userFromHeaders(req.headers);
    requireManager(ctx, user);

    const params = validate(PluginNameParams, req.params);
    if (!params.success || !ctx.registry.get(params.data.name)) {
      throw new NotFoundError(`Unknown editor plugin "${req.params['name'] ?? ''}"`);
    }
    const body = validate(SetPluginEnabledBody, req.body);
    if (!body.success) {
      res.status(400).json({ success: false, kind: 'invalid_request', error: body.error });
      return;
    }

    const { name } = params.data;
    const { enabled } = body.data;
    ctx.db.settings.set(PLUGIN_STATE_NAMESPACE, name, enabled ? '1' : '0');
    log.info({ name, enabled, userId: user.id }, 'editor plugin toggled');
    ctx.emitEvent({ type: 'editor.plugin.toggled', name, enabled });
    res.json({ success: true });
  });

  return router;
}
