import type {
  ConfigStore,
  ConfigurationResponse,
  Context,
  ContextResolver,
  EditorServices,
  EditorUser,
  InstalledLanguage,
  LanguageCatalog,
  PluginBlock,
} from '@lectern/types';
import { InvalidContextError, NotFoundError, PermissionError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { CONTEXT_LEVELS, isContextLevel } from './context-levels.js';
import { isTruthySetting } from './config-store.js';
import type { EditorPluginDescriptor, PluginBuildContext, PluginRegistry } from './registry.js';

const log = createChildLogger('editor:configuration');

export const GLOBAL_NAMESPACE = 'editor';
export const VIEW_CAPABILITY = 'context:view';

export interface ConfigurationAggregatorDeps {
  contexts: ContextResolver;
  config: ConfigStore;
  languages: LanguageCatalog;
  services: EditorServices;
  registry: PluginRegistry;
}

/**
 * Builds the editor bootstrap payload for one user in one context. Read-only:
 * every call resolves the context and reads the stores afresh.
 */
export class ConfigurationAggregator {
  constructor(private deps: ConfigurationAggregatorDeps) {}

  getConfiguration(user: EditorUser, contextType: string, contextId: number): ConfigurationResponse {
    const context = this.resolveContext(user, contextType, contextId);
    const { config } = this.deps;

    return {
      contextId: context.id,
      branding: isTruthySetting(config.get(GLOBAL_NAMESPACE, 'branding')),
      extendedValidElements: config.get(GLOBAL_NAMESPACE, 'extended_valid_elements') ?? '',
      installedLanguages: this.installedLanguages(),
      plugins: this.pluginBlocks({ context, user, config, services: this.deps.services }),
    };
  }

  private resolveContext(user: EditorUser, contextType: string, contextId: number): Context {
    if (!isContextLevel(contextType)) {
      throw new InvalidContextError(
        `Unknown context type "${contextType}", expected one of ${CONTEXT_LEVELS.join(', ')}`,
      );
    }
    // Ids past 2^53 have already been rounded and could name a neighbouring context.
    if (!Number.isSafeInteger(contextId) || contextId < 0) {
      throw new InvalidContextError(`Context id must be a non-negative safe integer, got ${contextId}`);
    }

    const context = this.deps.contexts.resolve(contextType, contextId);
    if (!context) {
      throw new NotFoundError(`No ${contextType} context for id ${contextId}`);
    }
    if (!this.deps.services.permissions.userHasCapability(user, VIEW_CAPABILITY, context)) {
      throw new PermissionError(`User ${user.id} cannot access ${contextType} ${contextId}`);
    }
    return context;
  }

  private installedLanguages(): InstalledLanguage[] {
    return this.deps.languages.listInstalledTranslations().map((t) => ({ lang: t.code, name: t.name }));
  }

  private pluginBlocks(ctx: PluginBuildContext): PluginBlock[] {
    const blocks: PluginBlock[] = [];
    for (const plugin of this.deps.registry.entries()) {
      const skip = this.skipReason(plugin, ctx);
      if (skip) {
        log.debug({ plugin: plugin.name, userId: ctx.user.id, contextId: ctx.context.id, skip }, 'plugin omitted');
        continue;
      }
      blocks.push({ name: plugin.name, settings: plugin.buildSettings(ctx) });
    }
    return blocks;
  }

  // Checks run cheapest-first; a plugin the user cannot see never has its own settings read.
  private skipReason(plugin: EditorPluginDescriptor, ctx: PluginBuildContext): string | null {
    if (!this.deps.registry.isEnabled(plugin.name, ctx.config)) return 'disabled';

    const required = plugin.requiredCapabilities ?? [];
    if (
      required.length > 0 &&
      !required.some((cap) => this.deps.services.permissions.userHasCapability(ctx.user, cap, ctx.context))
    ) {
      return 'capability';
    }

    if (plugin.isAvailable && !plugin.isAvailable(ctx)) return 'unavailable';
    return null;
  }
}
