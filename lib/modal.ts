import type { ModalAllowList, RequestContext } from './types';
import { getPluginSetting, splitListSetting } from './settings';

/**
 * Which module names and resource types the site admin allows to open in a modal.
 * Tablets, phones and legacy browsers never get modals.
 * Read from config on every call so admin changes apply immediately.
 */
export async function allowedModalModules(ctx: RequestContext): Promise<ModalAllowList> {
  const { device } = ctx;
  if (device.type === 'mobile' || device.type === 'tablet' || device.legacyBrowser) {
    return { resources: [], modules: [] };
  }
  const [resources, modules] = await Promise.all([
    getPluginSetting(ctx.config, 'modalresources'),
    getPluginSetting(ctx.config, 'modalmodules'),
  ]);
  return { resources: splitListSetting(resources), modules: splitListSetting(modules) };
}
