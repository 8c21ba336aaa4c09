import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ExhaustedRetriesError, TransientNetworkError } from "../../core/errors";
import { DEFAULT_MAX_ATTEMPTS, withFailureLogging, withRetry } from "../../core/retry";
import { ConsoleSpies, createTestLogger, silenceConsole } from "../helpers/fakes";

describe("withRetry", () => {
  let output: ConsoleSpies;

  beforeEach(() => {
    output = silenceConsole();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("returns the first success without retrying", async () => {
    const operation = vi.fn().mockResolvedValue("ok");

    await expect(withRetry(operation, { operationName: "op", logger: createTestLogger() })()).resolves.toBe("ok");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("succeeds on invocation k+1 after k failures", async () => {
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new Error("boom 1"))
      .mockRejectedValueOnce(new Error("boom 2"))
      .mockRejectedValueOnce(new Error("boom 3"))
      .mockResolvedValue("payload");

    const result = await withRetry(operation, { operationName: "op", logger: createTestLogger(), maxAttempts: 5 })();

    expect(result).toBe("payload");
    expect(operation).toHaveBeenCalledTimes(4);
  });

  it("stops after maxAttempts and surfaces the last error with the attempt count", async () => {
    const last = new TransientNetworkError("HTTP 503 while fetching https://x.test", { url: "https://x.test", status: 503 });
    const operation = vi.fn().mockRejectedValueOnce(new Error("first")).mockRejectedValue(last);

    const error = await withRetry(operation, { operationName: "fetch_post", logger: createTestLogger(), maxAttempts: 3 })().catch(
      (caught: unknown) => caught,
    );

    expect(operation).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(ExhaustedRetriesError);
    if (error instanceof ExhaustedRetriesError) {
      expect(error.attempts).toBe(3);
      expect(error.lastError).toBe(last);
      expect(error.operationName).toBe("fetch_post");
      expect(error.message).toBe("fetch_post failed after 3 attempt(s): HTTP 503 while fetching https://x.test");
    }
  });

  it("defaults to five attempts", async () => {
    const operation = vi.fn().mockRejectedValue(new Error("down"));

    await expect(withRetry(operation, { operationName: "op", logger: createTestLogger() })()).rejects.toBeInstanceOf(
      ExhaustedRetriesError,
    );
    expect(DEFAULT_MAX_ATTEMPTS).toBe(5);
    expect(operation).toHaveBeenCalledTimes(5);
  });

  it("rounds a fractional attempt limit down and reports the attempts made", async () => {
    const operation = vi.fn().mockRejectedValue(new Error("down"));

    const error = await withRetry(operation, { operationName: "op", logger: createTestLogger(), maxAttempts: 2.5 })().catch(
      (caught: unknown) => caught,
    );

    expect(operation).toHaveBeenCalledTimes(2);
    expect(error).toBeInstanceOf(ExhaustedRetriesError);
    if (error instanceof ExhaustedRetriesError) {
      expect(error.attempts).toBe(2);
      expect(error.message).toBe("op failed after 2 attempt(s): down");
    }
  });

  it("logs every failed attempt with its context", async () => {
    const operation = vi.fn().mockRejectedValueOnce(new Error("flaky")).mockResolvedValue(1);

    await withRetry(operation, {
      operationName: "download_attachment",
      logger: createTestLogger(),
      maxAttempts: 2,
      fields: { postId: "9001" },
    })();

    const failures = output.logLines().filter((line) => line.msg === "retry_attempt_failed");
    expect(failures).toHaveLength(1);
    expect(failures[0]).toMatchObject({
      level: "warn",
      operation: "download_attachment",
      attempt: 1,
      maxAttempts: 2,
      error: "flaky",
      postId: "9001",
    });
  });

  it("waits a linearly growing delay between attempts when configured", async () => {
    vi.useFakeTimers();
    const operation = vi.fn().mockRejectedValue(new Error("down"));

    const run = withRetry(operation, { operationName: "op", logger: createTestLogger(), maxAttempts: 3, retryDelayMs: 100 })();
    const assertion = expect(run).rejects.toBeInstanceOf(ExhaustedRetriesError);

    await vi.advanceTimersByTimeAsync(99);
    expect(operation).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(operation).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(200);
    expect(operation).toHaveBeenCalledTimes(3);
    await assertion;
  });
});

describe("withFailureLogging", () => {
  let output: ConsoleSpies;

  beforeEach(() => {
    output = silenceConsole();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("logs the final error and rethrows it unchanged", async () => {
    const failure = new Error("gone");
    const wrapped = withFailureLogging(() => Promise.reject(failure), {
      logger: createTestLogger(),
      event: "post_resolve_failed",
      fields: { postId: "7" },
    });

    await expect(wrapped()).rejects.toBe(failure);
    expect(output.errorLines()).toEqual([
      expect.objectContaining({ level: "error", msg: "post_resolve_failed", postId: "7", errorName: "Error", error: "gone" }),
    ]);
  });

  it("composes with withRetry", async () => {
    const operation = vi.fn().mockRejectedValue(new Error("down"));
    const logger = createTestLogger();
    const wrapped = withFailureLogging(withRetry(operation, { operationName: "op", logger, maxAttempts: 2 }), {
      logger,
      event: "op_failed",
    });

    await expect(wrapped()).rejects.toBeInstanceOf(ExhaustedRetriesError);
    expect(operation).toHaveBeenCalledTimes(2);
    expect(output.errorLines()[0]).toMatchObject({ msg: "op_failed", errorName: "ExhaustedRetriesError" });
  });
});
