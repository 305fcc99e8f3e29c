/**
 * Invocation context threaded through every handler and middleware.
 *
 * The stack never inspects the signal itself; middleware and terminal
 * handlers that block are expected to honor it.
 */

export interface Context {
  readonly signal: AbortSignal;
}

const backgroundContext: Context = {
  signal: new AbortController().signal,
};

/** Root context. Never aborts. */
export function background(): Context {
  return backgroundContext;
}

/**
 * Derive a context that aborts when `cancel` is called or when the parent
 * aborts, whichever comes first.
 */
export function withCancel(parent: Context): {
  ctx: Context;
  cancel: (reason?: unknown) => void;
} {
  const ctrl = new AbortController();
  const onAbort = () => ctrl.abort(parent.signal.reason);

  if (parent.signal.aborted) {
    ctrl.abort(parent.signal.reason);
  } else {
    parent.signal.addEventListener("abort", onAbort, { once: true });
    ctrl.signal.addEventListener(
      "abort",
      () => parent.signal.removeEventListener("abort", onAbort),
      { once: true },
    );
  }

  return {
    ctx: { ...parent, signal: ctrl.signal },
    cancel: (reason?: unknown) => ctrl.abort(reason),
  };
}

/**
 * Derive a context that aborts after `timeoutMs`. The abort reason is an
 * Error named "TimeoutError". Call `cancel` once done to release the timer.
 */
export function withTimeout(parent: Context, timeoutMs: number): {
  ctx: Context;
  cancel: () => void;
} {
  const { ctx, cancel } = withCancel(parent);
  const timer = setTimeout(() => {
    const err = new Error(`Context deadline of ${timeoutMs}ms exceeded`);
    err.name = "TimeoutError";
    cancel(err);
  }, timeoutMs);

  return {
    ctx,
    cancel: () => {
      clearTimeout(timer);
      cancel();
    },
  };
}
