import { describe, it, expect } from "vitest";
import { constants } from "os";
import { exitCodeOf } from "./process-exit.js";

describe("exitCodeOf", () => {
  it("returns the exit code as is", () => {
    expect(exitCodeOf({ exitCode: 0, signal: null })).toBe(0);
    expect(exitCodeOf({ exitCode: 2, signal: null })).toBe(2);
  });

  it("maps a signal to 128 + its number", () => {
    expect(exitCodeOf({ exitCode: null, signal: "SIGTERM" })).toBe(128 + constants.signals.SIGTERM);
  });

  it("falls back to 1 with neither code nor signal", () => {
    expect(exitCodeOf({ exitCode: null, signal: null })).toBe(1);
  });
});
