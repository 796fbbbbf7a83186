import type { RequestContext, StoredFile } from './types';

// Keys come from uploaded files; lookups must not reach Object.prototype
const ICON_BY_MIMETYPE = new Map<string, string>([
  ['powerpoint', 'ppt'],
  ['document', 'doc'],
  ['spreadsheet', 'xls'],
  ['archive', 'zip'],
  ['application/pdf', 'pdf'],
  ['mp3', 'mp3'],
  ['mpeg', 'mp4'],
  ['image/jpeg', 'image'],
  ['image/png', 'image'],
  ['image/gif', 'image'],
  ['image/svg+', 'image'],
  ['text/plain', 'txt'],
  ['text/html', 'html'],
]);

const OFFICE_ALIASES = new Map<string, string>([
  ['docx', 'doc'],
  ['odf', 'doc'],
  ['xlsx', 'xls'],
  ['ods', 'xls'],
  ['pptx', 'ppt'],
  ['odp', 'ppt'],
]);

function fileExtension(filename: string): string {
  const i = filename.lastIndexOf('.');
  return i >= 0 ? filename.slice(i + 1) : '';
}

// First real file in a resource's content area, in storage order
export async function getModResourceFile(ctx: RequestContext, modContextId: number): Promise<StoredFile | null> {
  const files = await ctx.files.getAreaFiles(modContextId, 'mod_resource', 'content');
  for (const f of files) {
    if (f.filesize && f.filename !== '.' && f.mimetype) return f;
  }
  return null;
}

/**
 * Short file type for a resource module, e.g. 'pdf' or 'doc', so sub-tiles can show the right icon.
 * MIME type first, then the filename extension.
 */
export async function getModResourceIconName(ctx: RequestContext, modContextId: number): Promise<string | null> {
  const file = await getModResourceFile(ctx, modContextId);
  if (!file) return null;
  const ext = ICON_BY_MIMETYPE.get(file.mimetype ?? '') ?? fileExtension(file.filename);
  return OFFICE_ALIASES.get(ext) ?? ext;
}

export function pluginFileUrl(wwwroot: string, file: StoredFile): string {
  const name = encodeURIComponent(file.filename);
  return `${wwwroot}/pluginfile.php/${file.contextId}/${file.component}/${file.filearea}/${file.itemId}${file.filepath}${name}`;
}
