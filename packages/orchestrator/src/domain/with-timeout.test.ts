import { AnalysisTimeoutError } from "@depintel/core";
import { afterEach, describe, expect, it, vi } from "vitest";
import { withTimeout } from "./with-timeout.js";

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the work when it finishes in time", async () => {
    await expect(withTimeout(Promise.resolve(42), 1_000)).resolves.toBe(42);
  });

  it("rejects with a timeout error when the work stalls", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<number>(() => {}), 500);
    const assertion = expect(pending).rejects.toBeInstanceOf(AnalysisTimeoutError);

    await vi.advanceTimersByTimeAsync(500);

    await assertion;
  });

  it("passes through failures of the work itself", async () => {
    await expect(withTimeout(Promise.reject(new Error("lookup failed")), 1_000)).rejects.toThrow("lookup failed");
  });
});
