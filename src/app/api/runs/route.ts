import { NextResponse } from 'next/server';
import { createRun, listRuns } from '@/data/run-store';
import { PayloadValidationError, parseRunPayload } from '@/features/runs/run-payload';
import { isPipelineError } from '@/lib/errors';
import { startRun } from '@/workflows/runtime';

export const dynamic = 'force-dynamic';

export async function GET() {
  const runs = await listRuns();
  return NextResponse.json(runs, { status: 200 });
}

export async function POST(request: Request) {
  try {
    let parsedJson: unknown;
    try {
      parsedJson = await request.json();
    } catch {
      throw new PayloadValidationError('Request body must be valid JSON.');
    }

    const payload = parseRunPayload(parsedJson);
    const run =
      payload.kind === 'playlist'
        ? await createRun({ source: { kind: 'playlist', url: payload.url }, options: payload.options })
        : await createRun({
            source: { kind: 'urls', count: payload.videoIds.length },
            options: payload.options,
            videoIds: payload.videoIds
          });

    void startRun(run.id).catch((error) => {
      console.error(`[api][runs] failed to start run ${run.id}.`, error);
    });

    return NextResponse.json({ runId: run.id, status: run.status }, { status: 202 });
  } catch (error) {
    if (error instanceof PayloadValidationError) {
      return NextResponse.json(
        { error: error.message, code: 'INVALID_INPUT', details: error.details },
        { status: 400 }
      );
    }

    console.error('[api][runs] unable to create run.', error);
    return NextResponse.json(
      { error: 'Unable to create run.', code: isPipelineError(error) ? error.code : 'INTERNAL_ERROR' },
      { status: 500 }
    );
  }
}
