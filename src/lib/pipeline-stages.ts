import type { PipelineStageName } from '@/types/run';

export function formatStageName(stage: PipelineStageName | 'batch'): string {
  return stage
    .split('_')
    .map((p) => p[0]?.toUpperCase() + p.slice(1))
    .join(' ');
}
