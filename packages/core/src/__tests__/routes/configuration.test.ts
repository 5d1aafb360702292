import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { createAppFixture, enrol, type AppFixture } from '../helpers/editor-fixture.js';

describe('GET /api/editor/configuration/:contextType/:contextId', () => {
  let fx: AppFixture;

  beforeEach(() => {
    fx = createAppFixture();
    enrol(fx, 7, 'editingteacher');
    enrol(fx, 8, 'guest');
  });

  afterEach(() => {
    fx.db.close();
  });

  it('returns the configuration for the caller', async () => {
    const res = await request(fx.app).get('/api/editor/configuration/course/42').set('X-User-Id', '7');

    expect(res.status).toBe(200);
    expect(res.body.success).toBe(true);
    expect(res.body.data).toEqual(fx.stack.aggregator.getConfiguration({ id: 7 }, 'course', 42));
    expect(res.body.data.contextId).toBe(fx.course.id);
    expect(res.body.data.branding).toBe(false);
  });

  it('tailors plugins to the caller', async () => {
    const res = await request(fx.app).get('/api/editor/configuration/course/42').set('X-User-Id', '8');

    expect(res.status).toBe(200);
    expect(res.body.data.plugins.map((p: { name: string }) => p.name)).toEqual([
      'accessibilitychecker',
      'equation',
      'html',
      'link',
      'media',
      'premium',
      'recordrtc',
    ]);
  });

  it('rejects requests without a user', async () => {
    const res = await request(fx.app).get('/api/editor/configuration/course/42');

    expect(res.status).toBe(401);
    expect(res.body).toEqual({
      success: false,
      kind: 'unauthenticated',
      error: 'X-User-Id header with a positive user id is required',
    });
  });

  it('rejects a malformed user id', async () => {
    const res = await request(fx.app).get('/api/editor/configuration/course/42').set('X-User-Id', '0');
    expect(res.status).toBe(401);
  });

  it('rejects an unknown context type', async () => {
    const res = await request(fx.app).get('/api/editor/configuration/category/42').set('X-User-Id', '7');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      success: false,
      kind: 'invalid_context',
      error: 'Unknown context type "category", expected one of system, course, module',
    });
  });

  it('rejects a non-numeric context id', async () => {
    const res = await request(fx.app).get('/api/editor/configuration/course/abc').set('X-User-Id', '7');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      success: false,
      kind: 'invalid_context',
      error: 'contextId must be a non-negative integer',
    });
  });

  it('rejects a context id beyond the exact integer range', async () => {
    fx.db.contexts.create('course', 2 ** 53, fx.systemContext.id);

    const res = await request(fx.app)
      .get('/api/editor/configuration/course/9007199254740993')
      .set('X-User-Id', '7');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ success: false, kind: 'invalid_context', error: 'contextId is out of range' });
  });

  it('reports a missing context', async () => {
    const res = await request(fx.app).get('/api/editor/configuration/course/999').set('X-User-Id', '7');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, kind: 'not_found', error: 'No course context for id 999' });
  });

  it('refuses users without access to the context', async () => {
    const res = await request(fx.app).get('/api/editor/configuration/course/42').set('X-User-Id', '99');

    expect(res.status).toBe(403);
    expect(res.body).toEqual({ success: false, kind: 'permission_denied', error: 'User 99 cannot access course 42' });
  });
});
