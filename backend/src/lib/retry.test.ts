import assert from "node:assert/strict";
import test from "node:test";
import { quietLogger } from "./logger";
import { backoffDelay, withRetry } from "./retry";

const policy = { attempts: 3, baseDelayMs: 2000, maxDelayMs: 10000 };

test("backoffDelay doubles and caps", () => {
  assert.equal(backoffDelay(policy, 1), 2000);
  assert.equal(backoffDelay(policy, 2), 4000);
  assert.equal(backoffDelay(policy, 3), 8000);
  assert.equal(backoffDelay(policy, 4), 10000);
});

test("withRetry retries until the operation succeeds", async () => {
  const waits: number[] = [];
  let calls = 0;
  const result = await withRetry(
    "search",
    async () => {
      calls += 1;
      if (calls < 3) {
        throw new Error("connection reset");
      }
      return "ok";
    },
    policy,
    quietLogger(),
    async (ms) => {
      waits.push(ms);
    }
  );

  assert.equal(result, "ok");
  assert.equal(calls, 3);
  assert.deepEqual(waits, [2000, 4000]);
});

test("withRetry rethrows the last error once attempts run out", async () => {
  let calls = 0;
  await assert.rejects(
    withRetry(
      "upsert",
      async () => {
        calls += 1;
        throw new Error(`failure ${calls}`);
      },
      policy,
      quietLogger(),
      async () => undefined
    ),
    /failure 3/
  );
  assert.equal(calls, 3);
});
