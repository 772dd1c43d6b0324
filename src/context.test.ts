import {
  BACKGROUND,
  MAX_TIMER_DELAY,
  checkContext,
  runWithContext,
} from "./context";
import { OperationCancelledError } from "./errors";

// ============================================================================
// checkContext Tests
// ============================================================================

describe("checkContext", () => {
  it("should pass for the background context", () => {
    expect(() => checkContext(BACKGROUND)).not.toThrow();
  });

  it("should throw once the signal is aborted", () => {
    const controller = new AbortController();
    controller.abort(new Error("shutting down"));
    expect(() => checkContext({ signal: controller.signal })).toThrow(
      "operation cancelled: shutting down",
    );
  });

  it("should throw once the deadline has passed", () => {
    expect(() => checkContext({ deadline: new Date(Date.now() - 1000) })).toThrow(
      "operation cancelled: deadline exceeded",
    );
  });
});

// ============================================================================
// runWithContext Tests
// ============================================================================

describe("runWithContext", () => {
  it("should return the result of the call", async () => {
    await expect(runWithContext(BACKGROUND, async () => 42)).resolves.toBe(42);
  });

  it("should propagate errors of the call", async () => {
    const ctx = { signal: new AbortController().signal };
    await expect(
      runWithContext(ctx, async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
  });

  it("should not start the call when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort("stopped");
    const fn = jest.fn(async () => 1);

    await expect(
      runWithContext({ signal: controller.signal }, fn),
    ).rejects.toThrow(OperationCancelledError);
    expect(fn).not.toHaveBeenCalled();
  });

  it("should reject when aborted while the call is pending", async () => {
    const controller = new AbortController();
    const pending = runWithContext(
      { signal: controller.signal },
      () => new Promise<number>(() => undefined),
    );
    controller.abort("stopped");

    await expect(pending).rejects.toThrow("operation cancelled: stopped");
  });

  it("should reject when the deadline passes", async () => {
    const pending = runWithContext(
      { deadline: new Date(Date.now() + 20) },
      () => new Promise<number>(() => undefined),
    );

    await expect(pending).rejects.toThrow(
      "operation cancelled: deadline exceeded",
    );
  });

  it("should not cancel a call whose deadline is beyond the timer range", async () => {
    const thirtyDays = 30 * 24 * 60 * 60 * 1000;
    const result = runWithContext(
      { deadline: new Date(Date.now() + thirtyDays) },
      () => new Promise<string>((resolve) => setTimeout(() => resolve("done"), 50)),
    );

    await expect(result).resolves.toBe("done");
  });

  it("should re-arm the timer for far deadlines", async () => {
    jest.useFakeTimers();
    try {
      const now = Date.now();
      const pending = runWithContext(
        { deadline: new Date(now + MAX_TIMER_DELAY + 1000) },
        () => new Promise<number>(() => undefined),
      );
      const settled = jest.fn();
      pending.catch(settled);

      await jest.advanceTimersByTimeAsync(MAX_TIMER_DELAY);
      expect(settled).not.toHaveBeenCalled();

      await jest.advanceTimersByTimeAsync(1000);
      expect(settled).toHaveBeenCalledWith(
        new OperationCancelledError("deadline exceeded"),
      );
    } finally {
      jest.useRealTimers();
    }
  });

  it("should clear the deadline timer after completion", async () => {
    const clearSpy = jest.spyOn(global, "clearTimeout");
    await runWithContext({ deadline: new Date(Date.now() + 60_000) }, async () => 1);
    expect(clearSpy).toHaveBeenCalled();
    clearSpy.mockRestore();
  });
});
