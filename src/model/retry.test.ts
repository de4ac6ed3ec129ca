// pattern: Imperative Shell

import { describe, it, expect } from "vitest";
import { callWithRetry } from "./retry.js";

const NO_BACKOFF = 0;

describe("callWithRetry", () => {
  describe("success path", () => {
    it("should call function once if successful on first attempt", async () => {
      let callCount = 0;

      const result = await callWithRetry(
        async () => {
          callCount++;
          return "success";
        },
        () => false
      );

      expect(result).toBe("success");
      expect(callCount).toBe(1);
    });
  });

  describe("retryable errors", () => {
    it("should give up after 3 attempts and rethrow the last error", async () => {
      let callCount = 0;

      await expect(
        callWithRetry(
          async () => {
            callCount++;
            throw new Error(`attempt ${callCount}`);
          },
          () => true,
          undefined,
          NO_BACKOFF
        )
      ).rejects.toThrow("attempt 3");

      expect(callCount).toBe(3);
    });

    it("should succeed after retrying", async () => {
      let callCount = 0;

      const result = await callWithRetry(
        async () => {
          callCount++;
          if (callCount < 2) {
            throw new Error("retry me");
          }
          return "success after retry";
        },
        (error) => error instanceof Error && error.message === "retry me",
        undefined,
        NO_BACKOFF
      );

      expect(result).toBe("success after retry");
      expect(callCount).toBe(2);
    });
  });

  describe("non-retryable errors", () => {
    it("should throw immediately and report the attempt", async () => {
      const attempts: Array<number> = [];

      await expect(
        callWithRetry(
          async () => {
            throw new Error("bad request");
          },
          () => false,
          (_error, attempt) => attempts.push(attempt),
          NO_BACKOFF
        )
      ).rejects.toThrow("bad request");

      expect(attempts).toEqual([0]);
    });
  });
});
