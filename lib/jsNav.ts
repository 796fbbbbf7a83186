import type { RequestContext } from './types';
import { getPluginSetting, isEnabledSetting } from './settings';

export const STOP_JS_NAV_PREF = 'format_tiles_stopjsnav';

// Animated tile navigation: user hasn't opted out, site has it on, browser isn't IE
export async function usingJsNav(ctx: RequestContext): Promise<boolean> {
  const stopped = await ctx.preferences.get(STOP_JS_NAV_PREF);
  if (isEnabledSetting(stopped)) return false;
  const siteEnabled = isEnabledSetting(await getPluginSetting(ctx.config, 'usejavascriptnav'));
  return siteEnabled && !ctx.device.legacyBrowser;
}

export async function setJsNavPreference(ctx: RequestContext, enabled: boolean): Promise<void> {
  await ctx.preferences.set(STOP_JS_NAV_PREF, enabled ? null : '1');
}
