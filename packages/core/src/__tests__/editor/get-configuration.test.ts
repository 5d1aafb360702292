import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { ConfigStore, PluginBlock } from '@lectern/types';
import defaults from '../../editor/defaults.json' with { type: 'json' };
import { ConfigurationAggregator, PREMIUM_PLUGINS } from '../../editor/index.js';
import { StaticLanguageCatalog } from '../../services/index.js';
import { SYSTEM_CONTEXT_ID } from '../../db/index.js';
import { InvalidContextError, NotFoundError, PermissionError } from '../../errors.js';
import { createEditorFixture, enrol, TEST_STACK_CONFIG, type EditorFixture } from '../helpers/editor-fixture.js';

const TEACHER_ID = 7;
const GUEST_ID = 8;

const equationSettings = () => [
  { name: 'texfilter', value: '1' },
  {
    name: 'libraries',
    value: JSON.stringify([
      {
        key: 'group1',
        groupname: 'Operators',
        elements: defaults.editor_equation.librarygroup1.trim().split('\n'),
        active: true,
      },
      { key: 'group2', groupname: 'Arrows', elements: defaults.editor_equation.librarygroup2.trim().split('\n') },
      {
        key: 'group3',
        groupname: 'Greek symbols',
        elements: defaults.editor_equation.librarygroup3.trim().split('\n'),
      },
      { key: 'group4', groupname: 'Advanced', elements: defaults.editor_equation.librarygroup4.trim().split('\n') },
    ]),
  },
  { name: 'texdocsurl', value: 'https://docs.example.com/editor/en/Using_TeX_Notation' },
];

const aiPlacementSettings = [
  { name: 'policyagreed', value: '0' },
  { name: 'generate_text', value: '1' },
  { name: 'generate_image', value: '1' },
];

const h5pSettings = [
  { name: 'embedallowed', value: '1' },
  { name: 'uploadallowed', value: '1' },
];

const premiumSettings = [{ name: 'premiumplugins', value: PREMIUM_PLUGINS.join(',') }];

const recordRtcSettings = [
  { name: 'videoallowed', value: '1' },
  { name: 'audioallowed', value: '1' },
  { name: 'screenallowed', value: '0' },
  { name: 'pausingallowed', value: '0' },
  { name: 'allowedtypes', value: 'audio,video' },
  { name: 'audiobitrate', value: '128000' },
  { name: 'videobitrate', value: '2500000' },
  { name: 'screenbitrate', value: '2500000' },
  { name: 'audiotimelimit', value: '120' },
  { name: 'videotimelimit', value: '120' },
  { name: 'screentimelimit', value: '120' },
  { name: 'maxrecsize', value: '52428800' },
  { name: 'videoscreenwidth', value: '1280' },
  { name: 'videoscreenheight', value: '720' },
];

const installedLanguages = [
  { lang: 'en', name: 'English (en)' },
  { lang: 'fr', name: 'Français (fr)' },
];

class RecordingConfigStore implements ConfigStore {
  readonly reads: string[] = [];

  constructor(private inner: ConfigStore) {}

  get(namespace: string, key: string): string | null {
    this.reads.push(`${namespace}/${key}`);
    return this.inner.get(namespace, key);
  }
}

describe('ConfigurationAggregator.getConfiguration', () => {
  let fixture: EditorFixture;

  beforeEach(() => {
    fixture = createEditorFixture();
    enrol(fixture, TEACHER_ID, 'editingteacher');
    enrol(fixture, GUEST_ID, 'guest');
  });

  afterEach(() => {
    fixture.db.close();
  });

  function run(userId: number, contextType = 'course', contextId = 42) {
    return fixture.stack.aggregator.getConfiguration({ id: userId }, contextType, contextId);
  }

  it('returns every visible plugin for an editing teacher', () => {
    const result = run(TEACHER_ID);

    expect(result.contextId).toBe(fixture.course.id);
    expect(result.branding).toBe(false);
    expect(result.extendedValidElements).toBe('script[*]');
    expect(result.installedLanguages).toEqual(installedLanguages);

    const plugins: PluginBlock[] = [
      { name: 'accessibilitychecker', settings: [] },
      { name: 'aiplacement', settings: aiPlacementSettings },
      { name: 'equation', settings: equationSettings() },
      { name: 'h5p', settings: h5pSettings },
      { name: 'html', settings: [] },
      { name: 'link', settings: [] },
      { name: 'media', settings: [] },
      { name: 'premium', settings: premiumSettings },
      { name: 'recordrtc', settings: recordRtcSettings },
    ];
    expect(result.plugins).toEqual(plugins);
  });

  it('drops capability-gated plugins for a guest but keeps the global settings', () => {
    const teacher = run(TEACHER_ID);
    const result = run(GUEST_ID);

    expect(result.contextId).toBe(fixture.course.id);
    expect(result.branding).toBe(teacher.branding);
    expect(result.extendedValidElements).toBe(teacher.extendedValidElements);
    expect(result.installedLanguages).toEqual(teacher.installedLanguages);

    const plugins: PluginBlock[] = [
      { name: 'accessibilitychecker', settings: [] },
      { name: 'equation', settings: equationSettings() },
      { name: 'html', settings: [] },
      { name: 'link', settings: [] },
      { name: 'media', settings: [] },
      { name: 'premium', settings: premiumSettings },
      { name: 'recordrtc', settings: recordRtcSettings },
    ];
    expect(result.plugins).toEqual(plugins);
  });

  it('is deterministic for unchanged state', () => {
    expect(JSON.stringify(run(TEACHER_ID))).toBe(JSON.stringify(run(TEACHER_ID)));
  });

  it('omits a disabled plugin even when the user holds its capability', () => {
    fixture.db.settings.set('editor_plugins', 'h5p', '0');

    const names = run(TEACHER_ID).plugins.map((p) => p.name);
    expect(names).not.toContain('h5p');
    expect(names).toContain('equation');
  });

  it('includes autosave once it is re-enabled, in registration order', () => {
    fixture.db.settings.set('editor_plugins', 'autosave', '1');

    expect(run(TEACHER_ID).plugins.map((p) => p.name).slice(0, 4)).toEqual([
      'accessibilitychecker',
      'aiplacement',
      'autosave',
      'equation',
    ]);
  });

  it('omits AI placement when the placement is switched off site-wide', () => {
    fixture.db.settings.set('aiplacement_editor', 'enabled', '0');

    expect(run(TEACHER_ID).plugins.map((p) => p.name)).not.toContain('aiplacement');
  });

  it('omits premium when no API key is configured', () => {
    fixture.db.settings.set('editor_premium', 'apikey', '');

    expect(run(TEACHER_ID).plugins.map((p) => p.name)).not.toContain('premium');
  });

  it('does not read configuration of plugins the user cannot see', () => {
    const recording = new RecordingConfigStore(fixture.stack.config);
    const aggregator = new ConfigurationAggregator({
      ...fixture.stack,
      contexts: fixture.db.contexts,
      config: recording,
      languages: new StaticLanguageCatalog(TEST_STACK_CONFIG.languages),
    });
    const policySpy = vi.spyOn(fixture.stack.services.ai, 'hasUserAgreedToPolicy');
    const capabilitySpy = vi.spyOn(fixture.stack.services.permissions, 'userHasCapability');

    aggregator.getConfiguration({ id: GUEST_ID }, 'course', 42);

    expect(recording.reads.filter((r) => r.startsWith('aiplacement_editor/'))).toEqual([]);
    expect(policySpy).not.toHaveBeenCalled();
    expect(capabilitySpy.mock.calls.map(([, capability]) => capability)).not.toContain('h5p:deploy');
    expect(recording.reads).toContain('editor_recordrtc/screensize');
  });

  it('mirrors the language catalog order exactly', () => {
    const languages = [
      { code: 'zh_cn', name: 'Chinese (zh_cn)' },
      { code: 'de', name: 'Deutsch (de)' },
      { code: 'en', name: 'English (en)' },
    ];
    const aggregator = new ConfigurationAggregator({
      ...fixture.stack,
      contexts: fixture.db.contexts,
      languages: new StaticLanguageCatalog(languages),
    });

    expect(aggregator.getConfiguration({ id: TEACHER_ID }, 'course', 42).installedLanguages).toEqual([
      { lang: 'zh_cn', name: 'Chinese (zh_cn)' },
      { lang: 'de', name: 'Deutsch (de)' },
      { lang: 'en', name: 'English (en)' },
    ]);
  });

  it('inherits course roles in a module context', () => {
    const mod = fixture.db.contexts.create('module', 501, fixture.course.id);

    const result = run(TEACHER_ID, 'module', 501);
    expect(result.contextId).toBe(mod.id);
    expect(result.plugins.map((p) => p.name)).toContain('h5p');
  });

  it('defaults branding to on when it was never configured', () => {
    fixture.db.settings.delete('editor', 'branding');

    expect(run(TEACHER_ID).branding).toBe(true);
  });

  describe('errors', () => {
    it('rejects an unknown context type', () => {
      expect(() => run(TEACHER_ID, 'category', 42)).toThrow(InvalidContextError);
    });

    it('rejects a negative or fractional context id', () => {
      expect(() => run(TEACHER_ID, 'course', -1)).toThrow(InvalidContextError);
      expect(() => run(TEACHER_ID, 'course', 4.2)).toThrow(InvalidContextError);
    });

    it('rejects ids too large to be exact', () => {
      fixture.db.contexts.create('course', 2 ** 53, SYSTEM_CONTEXT_ID);

      expect(() => run(TEACHER_ID, 'course', 2 ** 53)).toThrow(
        'Context id must be a non-negative safe integer, got 9007199254740992',
      );
    });

    it('reports a missing course as not found', () => {
      expect(() => run(TEACHER_ID, 'course', 999)).toThrow(NotFoundError);
    });

    it('refuses a user with no role in the context', () => {
      expect(() => run(99)).toThrow(PermissionError);
    });

    it('refuses a course user at system level', () => {
      expect(() => run(TEACHER_ID, 'system', 0)).toThrow(PermissionError);
    });

    it('carries a machine-readable kind', () => {
      try {
        run(TEACHER_ID, 'course', 999);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(NotFoundError);
        if (err instanceof NotFoundError) {
          expect(err.kind).toBe('not_found');
          expect(err.message).toBe('No course context for id 999');
        }
      }
    });
  });
});
