/**
 * @description Races a pending operation against an abort signal.
 * @description When the signal fires first, `onAbort` runs (to tear down whatever the
 * operation is waiting on) and the returned promise rejects with the signal's reason.
 */
export const raceWithAbort = <T>(
  operation: Promise<T>,
  signal: AbortSignal | undefined,
  onAbort?: () => void
): Promise<T> => {
  if (!signal) {
    return operation;
  }

  if (signal.aborted) {
    onAbort?.();
    // the operation may still settle; keep its rejection from going unhandled
    operation.catch(() => undefined);
    return Promise.reject(signal.reason);
  }

  return new Promise<T>((resolve, reject) => {
    const abortListener = () => {
      onAbort?.();
      reject(signal.reason);
    };
    signal.addEventListener('abort', abortListener, { once: true });

    operation.then(
      (value) => {
        signal.removeEventListener('abort', abortListener);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', abortListener);
        reject(error);
      }
    );
  });
};

/**
 * @description Returns a signal that aborts as soon as any of the given signals does.
 */
export const anySignal = (
  ...signals: Array<AbortSignal | undefined>
): AbortSignal => {
  const controller = new AbortController();

  for (const signal of signals) {
    if (!signal) continue;
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    signal.addEventListener('abort', () => controller.abort(signal.reason), {
      once: true,
    });
  }

  return controller.signal;
};

/**
 * @description Returns a signal that aborts when the process receives SIGINT or SIGTERM.
 * @description `release` removes the handlers once the guarded work is over.
 */
export const shutdownSignal = (): {
  signal: AbortSignal;
  release: () => void;
} => {
  const controller = new AbortController();

  const onSignal = (name: NodeJS.Signals) => {
    const reason = new Error(`received ${name}, aborting`);
    reason.name = 'AbortError';
    controller.abort(reason);
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  return {
    signal: controller.signal,
    release: () => {
      process.removeListener('SIGINT', onSignal);
      process.removeListener('SIGTERM', onSignal);
    },
  };
};
