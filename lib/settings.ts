import type { ConfigStore } from './types';

export const PLUGIN = 'format_tiles';
export const DEFAULT_TILE_COLOUR = '#1670CC';

export type PluginSetting =
  | 'modalmodules'
  | 'modalresources'
  | 'usejavascriptnav'
  | 'fittilestowidth'
  | 'followthemecolour'
  | 'tilecolour1';

export const DEFAULT_SETTINGS: Record<PluginSetting, string> = {
  modalmodules: 'page',
  modalresources: 'pdf,url,html',
  usejavascriptnav: '1',
  fittilestowidth: '1',
  followthemecolour: '0',
  tilecolour1: DEFAULT_TILE_COLOUR,
};

// Settings are strings; '', '0' and unset all mean off
export function isEnabledSetting(v: string | null | undefined): boolean {
  return v !== null && v !== undefined && v !== '' && v !== '0';
}

export function getPluginSetting(config: ConfigStore, name: PluginSetting): Promise<string | null> {
  return config.get(PLUGIN, name);
}

export function splitListSetting(v: string | null): string[] {
  return v ? v.split(',') : [];
}

/**
 * Write defaults for any plugin setting that has never been set.
 * Reads never fall back to these, so an admin clearing a setting sticks.
 */
export async function installDefaultSettings(config: ConfigStore): Promise<number> {
  let written = 0;
  for (const [name, value] of Object.entries(DEFAULT_SETTINGS)) {
    const cur = await config.get(PLUGIN, name);
    if (cur === null) {
      await config.set(PLUGIN, name, value);
      written++;
    }
  }
  return written;
}
