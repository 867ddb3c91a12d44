import React from 'react';
import { getRuntimeWarnings } from '@/config/env';
import { listRuns } from '@/data/run-store';
import { LiveRunsTable } from '@/features/runs/live-runs-table';
import { NewRunForm } from './new-run-form';

export const dynamic = 'force-dynamic';

export default async function RunsPage() {
  const runs = await listRuns();
  const warnings = getRuntimeWarnings();

  return (
    <main className="container">
      {warnings.length > 0 && (
        <section className="card runs-warnings">
          {warnings.map((warning) => (
            <p key={warning} className="small">
              {warning}
            </p>
          ))}
        </section>
      )}
      <NewRunForm />
      <LiveRunsTable initialRuns={runs} />
    </main>
  );
}
