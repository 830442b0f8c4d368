import { describe, it } from "node:test";
import assert from "node:assert";
import { withRetry } from "./retry.js";

function recorder() {
  const sleeps: number[] = [];
  return {
    sleeps,
    sleep: async (ms: number) => {
      sleeps.push(ms);
    },
  };
}

describe("withRetry", () => {
  it("should return the value after exactly maxRetries backoff sleeps", async () => {
    const { sleeps, sleep } = recorder();
    let calls = 0;

    const result = await withRetry(
      async () => {
        calls += 1;
        if (calls <= 3) throw new Error("429 Too Many Requests");
        return "ok";
      },
      { maxRetries: 3, initialDelayMs: 1_000, maxDelayMs: 60_000, backoffMultiplier: 2, sleep },
    );

    assert.strictEqual(result, "ok");
    assert.strictEqual(calls, 4);
    assert.deepStrictEqual(sleeps, [1_100, 2_200, 4_400]);
  });

  it("should rethrow a non-retriable error at once without sleeping", async () => {
    const { sleeps, sleep } = recorder();
    let calls = 0;
    const fatal = new Error("400 Bad Request");

    await assert.rejects(
      withRetry(
        async () => {
          calls += 1;
          throw fatal;
        },
        { sleep },
      ),
      (error: unknown) => error === fatal,
    );
    assert.strictEqual(calls, 1);
    assert.deepStrictEqual(sleeps, []);
  });

  it("should rethrow the last error once retries are spent", async () => {
    const { sleeps, sleep } = recorder();
    let calls = 0;

    await assert.rejects(
      withRetry(
        async () => {
          calls += 1;
          throw new Error(`503 attempt ${calls}`);
        },
        { maxRetries: 2, initialDelayMs: 1_000, backoffMultiplier: 2, sleep },
      ),
      { message: "503 attempt 3" },
    );
    assert.strictEqual(calls, 3);
    assert.deepStrictEqual(sleeps, [1_100, 2_200]);
  });

  it("should fall back to the defaults for options passed as undefined", async () => {
    let calls = 0;

    const result = await withRetry(
      async () => {
        calls += 1;
        if (calls === 1) throw new Error("503 Service Unavailable");
        return "ok";
      },
      { maxRetries: 1, initialDelayMs: 0, sleep: undefined, label: undefined },
    );

    assert.strictEqual(result, "ok");
    assert.strictEqual(calls, 2);
  });

  it("should cap each wait at maxDelayMs", async () => {
    const { sleeps, sleep } = recorder();

    await assert.rejects(
      withRetry(
        async () => {
          throw new Error("RESOURCE_EXHAUSTED");
        },
        { maxRetries: 4, initialDelayMs: 1_000, maxDelayMs: 3_000, backoffMultiplier: 2, sleep },
      ),
    );
    assert.deepStrictEqual(sleeps, [1_100, 2_200, 3_000, 3_000]);
  });
});
