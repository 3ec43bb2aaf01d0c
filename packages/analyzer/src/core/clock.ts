/**
 * High-resolution timer function.
 * Prefers performance.now() when available, falls back to Date.now().
 * Initialized once at module load.
 */
export const nowMs = (() => {
  const maybePerf = typeof globalThis !== 'undefined' ? globalThis.performance : undefined;
  return maybePerf && typeof maybePerf.now === 'function'
    ? () => maybePerf.now()
    : () => Date.now();
})();

/** Convert milliseconds to nanoseconds for instrumentation hooks */
export const toNs = (ms: number) => Math.round(ms * 1_000_000);

/**
 * Run `execute`, reporting its duration to `hook` when one is installed.
 * The hook also fires when `execute` throws.
 */
export function instrumentSync<T>(
  hook: ((durationNs: number) => void) | undefined,
  execute: () => T
): T {
  if (!hook) return execute();

  const start = nowMs();
  try {
    return execute();
  } finally {
    hook(toNs(nowMs() - start));
  }
}
