import { TextFormat, type ContentRecord, type RequestContext, type TextFilter, type TextFormatId } from './types';
import { NotFoundError } from './errors';
import { getCourseModInfo } from './courseModInfo';

export const PLUGINFILE_PLACEHOLDER = '@@PLUGINFILE@@/';

export type FormatOptions = {
  noclean?: boolean; // trusted author: skip cleaning
  overflowdiv?: boolean; // wrap in a scrollable container
  contextId?: number | null; // filters only run with a context
};

export function rewritePluginfileUrls(
  text: string,
  wwwroot: string,
  file: string,
  contextId: number,
  component: string,
  filearea: string,
  itemId: number | null,
): string {
  let base = `${wwwroot}/${file}/${contextId}/${component}/${filearea}/`;
  if (itemId !== null) base += `${itemId}/`;
  return text.split(PLUGINFILE_PLACEHOLDER).join(base);
}

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

function textToHtml(text: string): string {
  return `<div class="text_to_html">${text.replace(/\r?\n/g, '<br />')}</div>`;
}

export function cleanHtml(html: string): string {
  return html
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, '')
    .replace(/\s+on[a-z]+\s*=\s*("[^"]*"|'[^']*'|[^\s>]+)/gi, '');
}

export function formatText(text: string, format: TextFormatId, options: FormatOptions = {}, filters: TextFilter[] = []): string {
  let html = text;
  switch (format) {
    case TextFormat.HTML:
      break;
    case TextFormat.MOODLE:
      html = textToHtml(text);
      break;
    case TextFormat.PLAIN:
    case TextFormat.MARKDOWN:
      html = textToHtml(escapeHtml(text));
      break;
  }
  if (!options.noclean) html = cleanHtml(html);
  const contextId = options.contextId;
  if (contextId !== null && contextId !== undefined) {
    for (const f of filters) html = f.filter(html, contextId);
  }
  if (options.overflowdiv) html = `<div class="no-overflow">${html}</div>`;
  return html;
}

/**
 * HTML for a module's own content (for now, a page shown in a modal).
 * @@PLUGINFILE@@ references in intro and content are rewritten to real file URLs first.
 */
export function formatCmContentText(ctx: RequestContext, modname: string, record: ContentRecord, contextId: number): string {
  const component = `mod_${modname}`;
  let text = '';
  if (record.intro !== undefined && record.intro !== null) {
    text += rewritePluginfileUrls(record.intro, ctx.wwwroot, 'pluginfile.php', contextId, component, 'intro', null);
  }
  if (record.content !== undefined && record.content !== null) {
    const content = rewritePluginfileUrls(record.content, ctx.wwwroot, 'pluginfile.php', contextId, component, 'content', record.revision ?? null);
    text += `<div>${content}</div>`;
  }
  return formatText(text, record.contentFormat, { noclean: true, overflowdiv: true, contextId }, ctx.filters);
}

// Page body for the modal; null when the page is hidden from this user
export async function getModPageHtml(ctx: RequestContext, courseId: number, cmid: number): Promise<string | null> {
  const info = await getCourseModInfo(ctx, courseId, cmid);
  if (!info) return null;
  if (info.modname !== 'page') throw new NotFoundError('Page', cmid);
  const cm = await ctx.catalog.getCourseModule(courseId, cmid);
  const record = cm ? await ctx.catalog.getContentRecord('page', cm.instance) : null;
  if (!record) throw new NotFoundError('Page', cmid);
  return formatCmContentText(ctx, 'page', record, info.moduleContextId);
}
