import type { DeviceInfo, DeviceType } from './types';

// iPads report "Mobile" too, so tablets are matched first
const TABLET_RE = /iPad|Tablet|Kindle|Silk|PlayBook|Android(?!.*Mobile)/i;
const MOBILE_RE = /Mobile|iPhone|iPod|Android|Windows Phone|BlackBerry|Opera Mini|IEMobile/i;
const LEGACY_RE = /MSIE |Trident\//;

export function detectDeviceType(userAgent?: string | null): DeviceType {
  const ua = (userAgent || '').trim();
  if (!ua) return 'default';
  if (TABLET_RE.test(ua)) return 'tablet';
  if (MOBILE_RE.test(ua)) return 'mobile';
  return 'default';
}

export function isLegacyBrowser(userAgent?: string | null): boolean {
  return LEGACY_RE.test(userAgent || '');
}

export function detectDevice(userAgent?: string | null): DeviceInfo {
  return { type: detectDeviceType(userAgent), legacyBrowser: isLegacyBrowser(userAgent) };
}
