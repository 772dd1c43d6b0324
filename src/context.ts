/**
 * Operation Context
 *
 * Cancellation and deadline of a call against the cluster, owned by the
 * caller and passed down explicitly. The manifest pipeline and the inventory
 * rules are synchronous and never take one.
 */

import { OperationCancelledError } from "./errors";

export interface OperationContext {
  signal?: AbortSignal;
  deadline?: Date;
}

export const BACKGROUND: OperationContext = {};

/** Largest delay setTimeout accepts (2^31 - 1 ms). */
export const MAX_TIMER_DELAY = 0x7fffffff;

function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) {
    return reason.message;
  }
  return reason === undefined ? "aborted" : String(reason);
}

export function checkContext(ctx: OperationContext): void {
  if (ctx.signal?.aborted) {
    throw new OperationCancelledError(abortReason(ctx.signal));
  }
  if (ctx.deadline && ctx.deadline.getTime() <= Date.now()) {
    throw new OperationCancelledError("deadline exceeded");
  }
}

/**
 * Run `fn`, rejecting with OperationCancelledError as soon as the context is
 * aborted or its deadline passes. The underlying call is not interrupted;
 * its result is ignored.
 */
export async function runWithContext<T>(
  ctx: OperationContext,
  fn: () => Promise<T>,
): Promise<T> {
  checkContext(ctx);
  if (!ctx.signal && !ctx.deadline) {
    return fn();
  }

  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const cancelled = new Promise<never>((_, reject) => {
    const { signal, deadline } = ctx;
    if (signal) {
      onAbort = () => reject(new OperationCancelledError(abortReason(signal)));
      signal.addEventListener("abort", onAbort, { once: true });
    }
    if (deadline) {
      // Timers overflow past MAX_TIMER_DELAY; far deadlines are re-armed.
      const arm = () => {
        const remaining = Math.max(0, deadline.getTime() - Date.now());
        timer = setTimeout(() => {
          if (remaining > MAX_TIMER_DELAY) {
            arm();
            return;
          }
          reject(new OperationCancelledError("deadline exceeded"));
        }, Math.min(remaining, MAX_TIMER_DELAY));
      };
      arm();
    }
  });

  try {
    return await Promise.race([fn(), cancelled]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
    if (onAbort) {
      ctx.signal?.removeEventListener("abort", onAbort);
    }
  }
}
