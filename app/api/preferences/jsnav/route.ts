import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { ensureSchema } from '@/lib/storage';
import { buildRequestContext, noStore } from '@/lib/context';
import { setJsNavPreference, usingJsNav } from '@/lib/jsNav';

export const dynamic = 'force-dynamic';
export const runtime = 'nodejs';

export async function POST(req: NextRequest) {
  await ensureSchema();
  const schema = z.object({ enabled: z.boolean() });
  const parsed = schema.safeParse(await req.json().catch(() => null));
  if (!parsed.success) return noStore(new NextResponse('Invalid preference body', { status: 400 }));
  const opened = await buildRequestContext(req);
  await setJsNavPreference(opened.ctx, parsed.data.enabled);
  return noStore(NextResponse.json({ usingJsNav: await usingJsNav(opened.ctx) }), opened);
}
