import { describe, test, expect, vi, afterEach } from "vitest";
import { withTimeout } from "./timeout.ts";
import { WriteError } from "./errors.ts";

describe("withTimeout()", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  test("resolves with the value when the promise settles in time", async () => {
    await expect(
      withTimeout(Promise.resolve(42), 100, () => new WriteError("late")),
    ).resolves.toBe(42);
  });

  test("passes through rejections", async () => {
    await expect(
      withTimeout(
        Promise.reject(new Error("boom")),
        100,
        () => new WriteError("late"),
      ),
    ).rejects.toThrow("boom");
  });

  test("rejects with the timeout error when the promise hangs", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(
      new Promise<void>(() => {}),
      2000,
      () => new WriteError("Write timed out after 2s"),
    );
    const assertion = expect(pending).rejects.toThrow(WriteError);
    await vi.advanceTimersByTimeAsync(2000);
    await assertion;
  });
});
