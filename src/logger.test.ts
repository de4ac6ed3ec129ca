// pattern: Imperative Shell

import { describe, it, expect } from "vitest";
import { createLogger, formatTimestamp } from "./logger.js";

const fixedNow = () => new Date(2025, 2, 7, 9, 5, 3);

describe("createLogger", () => {
  it("formats lines with timestamp, level and scope", () => {
    const lines: Array<string> = [];
    const logger = createLogger("nudge.agent", { now: fixedNow, write: (line) => lines.push(line) });

    logger.info("state generate -> use_tools");

    expect(lines).toEqual(["2025-03-07 09:05:03 - INFO - nudge.agent - state generate -> use_tools"]);
  });

  it("drops debug lines unless enabled", () => {
    const lines: Array<string> = [];
    const quiet = createLogger("a", { now: fixedNow, write: (line) => lines.push(line) });
    const verbose = createLogger("b", { now: fixedNow, write: (line) => lines.push(line), debug: true });

    quiet.debug("hidden");
    verbose.debug("shown");

    expect(lines).toEqual(["2025-03-07 09:05:03 - DEBUG - b - shown"]);
  });

  it("appends the error message", () => {
    const lines: Array<string> = [];
    const logger = createLogger("poller", { now: fixedNow, write: (line) => lines.push(line) });

    logger.error("poll failed", new Error("connection refused"));

    expect(lines).toEqual(["2025-03-07 09:05:03 - ERROR - poller - poll failed: connection refused"]);
  });

  it("nests child scopes", () => {
    const lines: Array<string> = [];
    const logger = createLogger("nudge", { now: fixedNow, write: (line) => lines.push(line) });

    logger.child("tools").warn("dropped call");

    expect(lines).toEqual(["2025-03-07 09:05:03 - WARN - nudge.tools - dropped call"]);
  });
});

describe("formatTimestamp", () => {
  it("zero-pads every field", () => {
    expect(formatTimestamp(new Date(2024, 0, 2, 3, 4, 5))).toBe("2024-01-02 03:04:05");
  });
});
