import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { RequestContext } from './types';

export const VERSION_FILE = path.join(process.cwd(), 'version.json');

const versionSchema = z.object({
  component: z.string().optional(),
  version: z.number().int().optional(),
  release: z.string().default(''),
  requires: z.number().int().optional(),
});

// "4.3.2 (Build: 20231211)" -> 4.3; no match -> 0
export function parseRelease(release?: string | null): number {
  const m = (release || '').match(/^(\d+\.\d+)/);
  return m ? parseFloat(m[1]) : 0;
}

export async function getPlatformRelease(ctx: RequestContext): Promise<number> {
  return parseRelease(await ctx.config.get('core', 'release'));
}

export async function getPluginRelease(file: string = VERSION_FILE): Promise<number> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (e: unknown) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return 0;
    throw e;
  }
  const parsed = versionSchema.parse(JSON.parse(raw));
  return parseRelease(parsed.release);
}
