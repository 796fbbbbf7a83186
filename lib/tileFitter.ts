import type { RequestContext } from './types';
import { NotFoundError } from './errors';
import { getPluginSetting, isEnabledSetting } from './settings';
import { usingJsNav } from './jsNav';

export const SKIP_WIDTH_CHECK_KEY = 'tiles_skip_width_check';

export function sessionWidthKey(courseId: number): string {
  return `tiles_width_${courseId}`;
}

function requestFlag(params: URLSearchParams, name: string): boolean {
  const n = parseInt(params.get(name) || '', 10);
  return !isNaN(n) && n !== 0;
}

/**
 * Inline CSS that keeps tiles from jumping around while the tile script fits them to the screen.
 *
 * First visit: tiles start hidden, the script measures the width and reports it back (setSessionWidth).
 * Later visits: the stored width is applied up front so nothing moves after load.
 * A user stuck behind the loading icon can pass ?skipcheck=1 to turn this off for the session.
 */
export async function getTilefitterExtraCss(ctx: RequestContext, courseId: number): Promise<string> {
  if (!(await usingJsNav(ctx))) return '';
  if (!isEnabledSetting(await getPluginSetting(ctx.config, 'fittilestowidth'))) return '';
  if (ctx.device.type === 'mobile') return '';
  if (requestFlag(ctx.params, 'skipcheck') || ctx.session.has(SKIP_WIDTH_CHECK_KEY)) {
    ctx.session.set(SKIP_WIDTH_CHECK_KEY, 1);
    return '';
  }

  const width = Number(ctx.session.get(sessionWidthKey(courseId)) ?? 0) || 0;
  if (width === 0) {
    // Opacity is lifted by the tile script once it has measured
    return `.format-tiles.course-${courseId}.jsenabled:not(.editing) ul.tiles {opacity: 0;}`;
  }
  return `.format-tiles.course-${courseId}.jsenabled ul.tiles {max-width: ${width}px;}`;
}

export async function setSessionWidth(ctx: RequestContext, courseId: number, width: number): Promise<void> {
  if (!Number.isInteger(width) || width < 0) throw new RangeError(`Invalid tile width: ${width}`);
  const course = await ctx.catalog.getCourse(courseId);
  if (!course) throw new NotFoundError('Course', courseId);
  if (width === 0) {
    ctx.session.delete(sessionWidthKey(courseId));
    return;
  }
  ctx.session.set(sessionWidthKey(courseId), width);
}
