/** Anything that can deliver process signals; the process itself by default. */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export type SignalListener = (signal: NodeJS.Signals) => void;

/**
 * Installs `listener` for each signal for as long as the server runs. Returns a
 * function that restores the previous state. Handlers must only flip flags.
 */
export function captureSignals(
  source: SignalSource,
  signals: readonly NodeJS.Signals[],
  listener: SignalListener,
): () => void {
  const installed: NodeJS.Signals[] = [];
  for (const sig of signals) {
    try {
      source.on(sig, listener);
      installed.push(sig);
    } catch (e: unknown) {
      // some signals cannot be caught on every platform
      if (!(e instanceof Error)) throw e;
    }
  }
  return () => {
    for (const sig of installed) source.off(sig, listener);
  };
}
