import type { EditorPluginDescriptor, PluginBuildContext } from '../registry.js';
import { flag, pluginConfig, setting } from './shared.js';

const LIBRARY_GROUPS = ['group1', 'group2', 'group3', 'group4'] as const;

interface LibraryGroup {
  key: string;
  groupname: string;
  elements: string[];
  active?: true;
}

function libraryGroups(ctx: PluginBuildContext): LibraryGroup[] {
  return LIBRARY_GROUPS.map((key, index) => {
    const group: LibraryGroup = {
      key,
      groupname: ctx.services.strings.getString(`library${key}`, 'editor_equation'),
      elements: pluginConfig(ctx, 'equation', `library${key}`).trim().split('\n'),
    };
    // The first tab is open when the dialog loads.
    if (index === 0) group.active = true;
    return group;
  });
}

export const equationPlugin: EditorPluginDescriptor = {
  name: 'equation',
  buildSettings: (ctx) => [
    setting('texfilter', flag(ctx.services.filters.isFilterActive('tex', ctx.context))),
    setting('libraries', JSON.stringify(libraryGroups(ctx))),
    setting('texdocsurl', ctx.services.docs.getDocsUrl('Using_TeX_Notation')),
  ],
};
