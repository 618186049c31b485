import { CanceledError } from "axios";
import { describe, expect, it } from "vitest";
import { CircuitBreaker, CircuitOpenError, errorMessage, isRetryable, withRetry } from "../../utils";

describe("withRetry", () => {
  it("retries until the action succeeds", async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls += 1;
        if (calls < 3) {
          throw new Error("flaky");
        }
        return "done";
      },
      { retries: 2, initialDelayMs: 1 }
    );

    expect(result).toBe("done");
    expect(calls).toBe(3);
  });

  it("gives up after the configured retries", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw new Error("down");
        },
        { retries: 1, initialDelayMs: 1 }
      )
    ).rejects.toThrow("down");
    expect(calls).toBe(2);
  });

  it("does not retry a cancelled request", async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls += 1;
          throw new CanceledError("aborted");
        },
        { retries: 3, initialDelayMs: 1 }
      )
    ).rejects.toBeInstanceOf(CanceledError);
    expect(calls).toBe(1);
  });

  it("abandons the backoff once the signal aborts", async () => {
    const controller = new AbortController();
    let calls = 0;
    const pending = withRetry(
      async () => {
        calls += 1;
        throw new Error("flaky");
      },
      { retries: 2, initialDelayMs: 60_000, signal: controller.signal }
    );
    setTimeout(() => controller.abort(new Error("stop")), 5);

    await expect(pending).rejects.toThrow("stop");
    expect(calls).toBe(1);
  });
});

describe("isRetryable", () => {
  it("treats cancellations as final and other failures as transient", () => {
    expect(isRetryable(new CanceledError("aborted"))).toBe(false);
    expect(isRetryable(new Error("socket hang up"))).toBe(true);
  });
});

describe("CircuitBreaker", () => {
  it("opens after repeated failures and short-circuits further calls", async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2, cooldownMs: 60_000 });
    let calls = 0;
    const failing = async (): Promise<string> => {
      calls += 1;
      throw new Error("upstream");
    };

    await expect(breaker.exec(failing)).rejects.toThrow("upstream");
    await expect(breaker.exec(failing)).rejects.toThrow("upstream");
    await expect(breaker.exec(failing)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(calls).toBe(2);
    expect(breaker.isOpen).toBe(true);
  });

  it("stays closed when calls are cancelled by the caller", async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 3, cooldownMs: 60_000 });
    const cancelled = async (): Promise<string> => {
      throw new CanceledError("aborted");
    };

    for (let i = 0; i < 3; i += 1) {
      await expect(breaker.exec(cancelled)).rejects.toBeInstanceOf(CanceledError);
    }

    expect(breaker.isOpen).toBe(false);
    await expect(breaker.exec(async () => "summary")).resolves.toBe("summary");
  });
});

describe("errorMessage", () => {
  it("reads messages from errors and stringifies anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
