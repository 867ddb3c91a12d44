import { NextResponse } from 'next/server';
import { buildClearPredicate, isCacheScope } from '@/services/cache';
import { getTranscriptCache } from '@/workflows/runtime';
import { getErrorMessage, isPipelineError } from '@/lib/errors';

export const dynamic = 'force-dynamic';

function parseDays(raw: string | null): number | undefined | null {
  if (raw === null || raw.trim() === '') {
    return undefined;
  }
  const days = Number(raw);
  return Number.isFinite(days) && days >= 0 ? days : null;
}

export async function GET() {
  try {
    const stats = await getTranscriptCache().stats();
    return NextResponse.json(stats, { status: 200 });
  } catch (error) {
    console.error('[api][cache] unable to read cache stats.', error);
    return NextResponse.json(
      { error: getErrorMessage(error), code: isPipelineError(error) ? error.code : undefined },
      { status: 503 }
    );
  }
}

export async function DELETE(request: Request) {
  const params = new URL(request.url).searchParams;
  const olderThanDays = parseDays(params.get('olderThanDays'));
  if (olderThanDays === null) {
    return NextResponse.json(
      { error: 'olderThanDays must be a non-negative number.', code: 'INVALID_INPUT' },
      { status: 400 }
    );
  }
  const rawScope = params.get('scope')?.trim() || 'all';
  if (!isCacheScope(rawScope)) {
    return NextResponse.json(
      { error: 'scope must be one of all, transcripts or metadata.', code: 'INVALID_INPUT' },
      { status: 400 }
    );
  }
  const videoId = params.get('videoId')?.trim() || undefined;

  try {
    const removed = await getTranscriptCache().clear(
      buildClearPredicate({ olderThanDays, videoId }, Date.now()),
      rawScope
    );
    return NextResponse.json({ removed }, { status: 200 });
  } catch (error) {
    console.error('[api][cache] unable to clear cache.', error);
    return NextResponse.json(
      { error: getErrorMessage(error), code: isPipelineError(error) ? error.code : undefined },
      { status: 503 }
    );
  }
}
