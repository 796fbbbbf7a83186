import type { NextRequest, NextResponse } from 'next/server';
import type { RequestContext, RequestUser } from './types';
import { createConfigStore, createCourseCatalog, createFileStorage, createPreferenceStore } from './storage';
import { openSession, SESSION_COOKIE } from './session';
import { detectDevice } from './useragent';

const WWWROOT = (process.env.WWWROOT || 'http://localhost:3000').replace(/\/+$/, '');
const GUEST: RequestUser = { id: 0, isGuest: true };

// The platform's auth layer forwards the signed-in user id; no header means guest
function resolveUser(req: NextRequest): RequestUser {
  const raw = req.headers.get('x-user-id');
  const id = raw ? parseInt(raw, 10) : NaN;
  return !isNaN(id) && id > 0 ? { id, isGuest: false } : GUEST;
}

export type OpenedContext = { ctx: RequestContext; sessionId: string; newSession: boolean };

export async function buildRequestContext(req: NextRequest): Promise<OpenedContext> {
  const user = resolveUser(req);
  const session = openSession(req.cookies.get(SESSION_COOKIE)?.value);
  const config = createConfigStore();
  const themeName = (await config.get('core', 'theme')) || 'boost';
  const ctx: RequestContext = {
    user,
    device: detectDevice(req.headers.get('user-agent')),
    config,
    preferences: createPreferenceStore(user),
    session: session.store,
    catalog: createCourseCatalog(user),
    files: createFileStorage(),
    filters: [],
    params: req.nextUrl.searchParams,
    wwwroot: WWWROOT,
    themeName,
  };
  return { ctx, sessionId: session.id, newSession: session.created };
}

export function noStore(res: NextResponse, opened?: OpenedContext): NextResponse {
  res.headers.set('Cache-Control', 'no-store, no-cache, must-revalidate, max-age=0');
  res.headers.set('Pragma', 'no-cache');
  if (opened?.newSession) res.cookies.set(SESSION_COOKIE, opened.sessionId, { httpOnly: true, sameSite: 'lax', path: '/' });
  return res;
}
