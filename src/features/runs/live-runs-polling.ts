import type { RunRecord } from '@/types/run';

export const ACTIVE_POLL_DELAY_MS = 2_000;
export const IDLE_POLL_DELAY_MS = 15_000;
export const HIDDEN_POLL_DELAY_MS = 30_000;

export function getNextPollDelayMs(isDocumentHidden: boolean, runs: readonly RunRecord[]): number {
  if (isDocumentHidden) return HIDDEN_POLL_DELAY_MS;
  return runs.some((run) => run.status === 'pending' || run.status === 'running')
    ? ACTIVE_POLL_DELAY_MS
    : IDLE_POLL_DELAY_MS;
}

/** Drops responses that arrive after a newer request or after unmount. */
export function shouldApplyPollResult(input: {
  cancelled: boolean;
  activeRequestSeq: number;
  responseSeq: number;
  aborted: boolean;
}): boolean {
  if (input.cancelled || input.aborted) return false;
  return input.responseSeq === input.activeRequestSeq;
}
