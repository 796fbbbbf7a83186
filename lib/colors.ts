import type { RequestContext } from './types';
import { DEFAULT_TILE_COLOUR, getPluginSetting, isEnabledSetting } from './settings';

const HEX_RE = /^#[a-f0-9]{6}$/i;

export function isHexColour(v?: string | null): v is string {
  return !!v && HEX_RE.test(v);
}

/**
 * Base colour for a course's tiles.
 * With followthemecolour off: the course colour, else the plugin default.
 * With it on: the theme's brandcolor (boost, moove...), else its themecolor (essential).
 * Anything that isn't a 6-digit hex ends at the built-in default.
 */
export async function getTileBaseColour(ctx: RequestContext, courseColour?: string | null): Promise<string> {
  let result: string | null;
  if (!isEnabledSetting(await getPluginSetting(ctx.config, 'followthemecolour'))) {
    result = courseColour ? courseColour : await getPluginSetting(ctx.config, 'tilecolour1');
  } else {
    const theme = `theme_${ctx.themeName}`;
    result = await ctx.config.get(theme, 'brandcolor');
    if (!result) result = await ctx.config.get(theme, 'themecolor');
  }
  return isHexColour(result) ? result : DEFAULT_TILE_COLOUR;
}
