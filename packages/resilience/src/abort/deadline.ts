export type DeadlineOutcome<T> =
  | { status: 'cancelled' }
  | { status: 'completed'; value: T }
  | { status: 'timed_out' };

export interface DeadlineOptions {
  signal?: AbortSignal | undefined;
  timeoutMs: number;
}

/**
 * Run `work` under a deadline and an optional caller signal.
 *
 * `work` receives a signal that aborts on whichever comes first. When that
 * happens the outcome settles immediately; whatever `work` later produces is
 * discarded. A rejection from `work` before the deadline is rethrown.
 */
export async function runWithDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions
): Promise<DeadlineOutcome<T>> {
  if (options.signal?.aborted) {
    return { status: 'cancelled' };
  }

  const controller = new AbortController();
  let abortedBy: 'cancelled' | 'timed_out' | undefined;
  const abort = (reason: 'cancelled' | 'timed_out') => {
    if (abortedBy) return;
    abortedBy = reason;
    controller.abort();
  };

  const timer = setTimeout(() => abort('timed_out'), options.timeoutMs);
  const onCallerAbort = () => abort('cancelled');
  options.signal?.addEventListener('abort', onCallerAbort, { once: true });

  const aborted = new Promise<{ kind: 'aborted' }>((resolve) => {
    controller.signal.addEventListener('abort', () => resolve({ kind: 'aborted' }), { once: true });
  });

  try {
    const settled = work(controller.signal).then(
      (value) => ({ kind: 'value' as const, value }),
      (error: unknown) => ({ error, kind: 'error' as const })
    );
    const winner = await Promise.race([settled, aborted]);

    if (winner.kind === 'aborted') {
      return { status: abortedBy ?? 'cancelled' };
    }
    if (winner.kind === 'error') {
      throw winner.error;
    }
    return { status: 'completed', value: winner.value };
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', onCallerAbort);
  }
}
