export function createAbortError(message = "Operation aborted"): Error {
  const error = new Error(message);
  error.name = "AbortError";
  return error;
}

export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if (error.name === "AbortError") {
    return true;
  }

  const message = error.message.toLowerCase();
  return message.includes("aborted") || message.includes("cancelled") || message.includes("canceled");
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message.trim();
  }
  return String(error);
}

function abortReasonMessage(signal: AbortSignal, fallback: string): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason.message;
  }
  return typeof reason === "string" ? reason : fallback;
}

export function throwIfAborted(signal: AbortSignal | undefined, fallback = "Operation aborted"): void {
  if (signal?.aborted) {
    throw createAbortError(abortReasonMessage(signal, fallback));
  }
}

export interface MergedAbortSignal {
  signal: AbortSignal | undefined;
  /** Detaches from the source signals. Long-lived sources otherwise keep one listener per merge. */
  dispose: () => void;
}

export function mergeAbortSignals(signals: Array<AbortSignal | undefined>): MergedAbortSignal {
  const active = signals.filter((signal): signal is AbortSignal => Boolean(signal));
  if (active.length <= 1) {
    return { signal: active[0], dispose: () => undefined };
  }

  const controller = new AbortController();
  const detach = () => {
    for (const signal of active) {
      signal.removeEventListener("abort", abort);
    }
  };
  const abort = () => {
    detach();
    if (!controller.signal.aborted) {
      controller.abort(createAbortError());
    }
  };

  for (const signal of active) {
    if (signal.aborted) {
      abort();
      break;
    }
    signal.addEventListener("abort", abort, { once: true });
  }

  return { signal: controller.signal, dispose: detach };
}

/**
 * Resolves after `ms`, or rejects with an AbortError as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(createAbortError(abortReasonMessage(signal, "Sleep aborted")));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      const reason = signal ? abortReasonMessage(signal, "Sleep aborted") : "Sleep aborted";
      reject(createAbortError(reason));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
