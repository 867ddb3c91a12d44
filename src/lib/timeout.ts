import { PipelineError } from '@/lib/errors';

/**
 * Runs `task` with a signal that aborts after `timeoutMs` or when `parent` aborts.
 * A timeout surfaces as a retryable TIMEOUT error; a parent abort as CANCELLED.
 */
export async function withTimeout<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw new PipelineError({ code: 'CANCELLED', message: `${label} was cancelled.` });
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onParentAbort: (() => void) | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new PipelineError({
          code: 'TIMEOUT',
          message: `${label} timed out after ${timeoutMs}ms.`
        })
      );
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        controller.abort();
        reject(new PipelineError({ code: 'CANCELLED', message: `${label} was cancelled.` }));
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([task(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) {
      parent.removeEventListener('abort', onParentAbort);
    }
  }
}
