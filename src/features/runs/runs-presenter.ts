import { formatStageName } from '@/lib/pipeline-stages';
import type { RunItemRecord, RunRecord } from '@/types/run';

export type RunsByDayGroup = {
  dayKey: string;
  dayLabel: string;
  runs: RunRecord[];
};

export function formatTime(iso?: string): string {
  if (!iso) return 'n/a';

  return new Intl.DateTimeFormat('en-US', {
    hour: 'numeric',
    minute: '2-digit'
  }).format(new Date(iso));
}

function formatDayLabel(date: Date, includeYear: boolean): string {
  return new Intl.DateTimeFormat('en-US', {
    weekday: 'long',
    month: 'short',
    day: 'numeric',
    ...(includeYear ? { year: 'numeric' } : {})
  }).format(date);
}

export function groupRunsByDay(runs: RunRecord[]): RunsByDayGroup[] {
  const dayKeyFormatter = new Intl.DateTimeFormat('en-CA', {
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  });
  const grouped = new Map<string, { date: Date; runs: RunRecord[] }>();

  for (const run of runs) {
    const createdDate = new Date(run.createdAt);
    const dayKey = dayKeyFormatter.format(createdDate);
    const existing = grouped.get(dayKey);
    if (existing) {
      existing.runs.push(run);
      continue;
    }
    grouped.set(dayKey, { date: createdDate, runs: [run] });
  }

  const groups = Array.from(grouped.entries()).map(([dayKey, value]) => ({
    dayKey,
    date: value.date,
    runs: value.runs
  }));

  return groups.map((group, index) => {
    const previous = groups[index - 1]?.date;
    const next = groups[index + 1]?.date;
    const year = group.date.getFullYear();
    const month = group.date.getMonth();
    const isYearBoundary =
      (previous && previous.getFullYear() !== year) || (next && next.getFullYear() !== year);
    const includeYear = Boolean(isYearBoundary && (month === 11 || month === 0));

    return {
      dayKey: group.dayKey,
      dayLabel: formatDayLabel(group.date, includeYear),
      runs: group.runs
    };
  });
}

export function getSourceLabel(run: RunRecord): string {
  if (run.source.kind === 'playlist') return `Playlist ${run.source.url}`;
  return run.source.count === 1 ? '1 video' : `${run.source.count} videos`;
}

export function getProgressSummary(run: RunRecord): string {
  const { counts } = run;
  const tally = `${counts.succeeded} ok, ${counts.partial} partial, ${counts.failed} failed`;

  if (run.status === 'pending') return 'Queued';
  if (run.status === 'running') return `${counts.completed}/${counts.total} done (${tally})`;
  if (run.status === 'failed') {
    return `Failed at ${formatStageName(run.error?.stage ?? 'batch')}`;
  }
  if (run.status === 'cancelled') return `Cancelled after ${counts.completed}/${counts.total} (${tally})`;
  return `Completed: ${tally}`;
}

export function getItemSymbol(status: RunItemRecord['status']): string {
  if (status === 'success') return '✓';
  if (status === 'failed') return '×';
  if (status === 'partial') return '½';
  if (status === 'running') return '•';
  return '';
}

export function getItemErrorLine(item: RunItemRecord): string | null {
  if (!item.error) return null;
  const hint = item.error.operatorHint ? ` ${item.error.operatorHint}` : '';
  return `${formatStageName(item.error.stage)} · ${item.error.code}: ${item.error.message}${hint}`;
}

export type ItemGrouping = 'channel' | 'date';

export type ItemGroup = {
  label: string;
  /** 1-based positions in the run's item list. */
  positions: number[];
};

export function parseItemGrouping(value: string | undefined): ItemGrouping | null {
  return value === 'channel' || value === 'date' ? value : null;
}

/** Groups finished items by channel or upload date in first-seen order. Unfinished items are left out. */
export function groupItems(items: RunItemRecord[], by: ItemGrouping): ItemGroup[] {
  const groups = new Map<string, number[]>();
  items.forEach((item, index) => {
    if (item.status === 'pending' || item.status === 'running') return;
    const label = (by === 'channel' ? item.channel : item.publishedAt) || 'Unknown';
    const positions = groups.get(label);
    if (positions) {
      positions.push(index + 1);
    } else {
      groups.set(label, [index + 1]);
    }
  });
  return Array.from(groups, ([label, positions]) => ({ label, positions }));
}

export function isRunActiveStatus(run: RunRecord): boolean {
  return run.status === 'pending' || run.status === 'running';
}
