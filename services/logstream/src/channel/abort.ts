export interface AbortWait {
  /** Resolves once the signal aborts; never settles without a signal. */
  promise: Promise<void>;
  dispose(): void;
}

export function whenAborted(signal?: AbortSignal): AbortWait {
  if (!signal) {
    return { promise: new Promise<void>(() => undefined), dispose: () => undefined };
  }
  if (signal.aborted) {
    return { promise: Promise.resolve(), dispose: () => undefined };
  }
  let onAbort: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    onAbort = () => resolve();
    signal.addEventListener("abort", onAbort, { once: true });
  });
  return {
    promise,
    dispose: () => signal.removeEventListener("abort", onAbort)
  };
}
