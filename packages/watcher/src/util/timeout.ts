/** Raised when an external call takes longer than its budget */
export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Run `call` with an AbortSignal that fires after `ms`. The call is expected
 * to cancel its request on abort; either way the result rejects with
 * TimeoutError once the budget is spent.
 */
export async function withTimeout<T>(
  call: (signal: AbortSignal) => Promise<T>,
  ms: number,
  label: string,
): Promise<T> {
  const signal = AbortSignal.timeout(ms);
  let onAbort: (() => void) | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    onAbort = () => reject(new TimeoutError(label, ms));
    signal.addEventListener("abort", onAbort, { once: true });
  });

  try {
    return await Promise.race([call(signal), timeout]);
  } finally {
    if (onAbort) signal.removeEventListener("abort", onAbort);
  }
}
