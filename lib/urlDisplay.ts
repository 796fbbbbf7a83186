import { UrlDisplay, type UrlDisplayMode, type UrlRecord } from './types';

const MIME_BY_EXT: Record<string, string> = {
  gif: 'image/gif',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  svg: 'image/svg+xml',
  swf: 'application/x-shockwave-flash',
  flv: 'video/x-flv',
  wmv: 'video/x-ms-wm',
  mov: 'video/quicktime',
  mpeg: 'video/mpeg',
  mpg: 'video/mpeg',
  mp4: 'video/mp4',
  mp3: 'audio/mp3',
  ra: 'audio/x-realaudio-plugin',
  zip: 'application/zip',
  tar: 'application/x-tar',
  gz: 'application/g-zip',
  pdf: 'application/pdf',
  htm: 'text/html',
  html: 'text/html',
};

const DOWNLOAD_TYPES = new Set(['application/zip', 'application/x-tar', 'application/g-zip', 'application/pdf', 'text/html']);
const EMBED_TYPES = new Set([
  'image/gif', 'image/jpeg', 'image/png', 'image/svg+xml',
  'application/x-shockwave-flash', 'video/x-flv', 'video/x-ms-wm', 'video/quicktime', 'video/mpeg', 'video/mp4',
  'audio/mp3', 'audio/x-realaudio-plugin', 'x-realaudio-plugin',
]);

export function guessUrlMimetype(fullUrl: string): string {
  let u = fullUrl;
  // Drop the *file.php serving prefix so the served file's own extension counts
  const served = u.match(/^(.*)\/[a-z]*file\.php(?:\?file=)?(\/[^&?#]*)/);
  if (served) u = served[1] + served[2];
  u = u.split('#')[0];
  if (u.includes('.php')) return 'text/html';
  if (u.endsWith('/')) return 'text/html';
  if (u.includes('//') && u.split('/').length - 1 === 2) return 'text/html';
  const bare = u.split('?')[0];
  const m = bare.match(/\.([a-z0-9]+)$/i);
  return (m && MIME_BY_EXT[m[1].toLowerCase()]) || 'document/unknown';
}

/**
 * How a URL module will actually be shown.
 * An explicit display mode wins; AUTO is resolved from the link target.
 */
export function urlFinalDisplayType(url: UrlRecord, wwwroot: string): UrlDisplayMode {
  if (url.display !== UrlDisplay.AUTO) return url.display;
  const ext = url.externalUrl;
  // Local pages with navigation
  if (ext.startsWith(wwwroot) && !ext.includes('file.php') && ext.includes('.php')) return UrlDisplay.OPEN;
  const mimetype = guessUrlMimetype(ext);
  if (DOWNLOAD_TYPES.has(mimetype)) return UrlDisplay.DOWNLOAD;
  if (EMBED_TYPES.has(mimetype)) return UrlDisplay.EMBED;
  return UrlDisplay.OPEN;
}

const YOUTUBE_RE = /^https?:\/\/(?:www\.|m\.)?(?:youtube\.com\/(?:watch\?(?:.*&)?v=|embed\/|v\/)|youtu\.be\/)([\w-]{6,})/i;
const VIMEO_RE = /^https?:\/\/(?:www\.|player\.)?vimeo\.com\/(?:video\/)?(\d+)/i;

// Provider embed URL for video links, '' when there is none
export function checkModifyEmbeddedUrl(url: string): string {
  const yt = url.match(YOUTUBE_RE);
  if (yt) return `https://www.youtube.com/embed/${yt[1]}`;
  const vimeo = url.match(VIMEO_RE);
  if (vimeo) return `https://player.vimeo.com/video/${vimeo[1]}`;
  return '';
}
